/**
 * Synthetic local variable names for compiled expressions.
 *
 * One allocator lives for one compilation pass and is handed to whatever
 * needs fresh names (`Var.foreach`). A name is never handed out twice by the
 * same allocator, and names reserved by the caller are skipped.
 */

import { invariant } from '../dev/invariant';

export class NameAllocator {
  private counter = 0;
  private readonly used = new Set<string>();

  constructor(private readonly prefix = 'x') {
    invariant(
      /^[A-Za-z_$][\w$]*$/.test(prefix),
      'NameAllocator prefix must be a valid identifier',
      { prefix }
    );
  }

  next(): string {
    let name: string;
    do {
      name = `${this.prefix}_${this.counter++}`;
    } while (this.used.has(name));
    this.used.add(name);
    return name;
  }

  /** Claim a caller-chosen name so `next()` never returns it. */
  reserve(name: string): void {
    invariant(!this.used.has(name), `Name '${name}' is already allocated`);
    this.used.add(name);
  }

  has(name: string): boolean {
    return this.used.has(name);
  }

  get size(): number {
    return this.used.size;
  }
}
