/**
 * Background task supervisor
 *
 * Background handlers run outside the per-token lock. Their view is
 * read-only; `self.exclusive(fn)` takes the lock, reloads the tree, runs `fn`
 * against a writable view, flushes a delta and persists before releasing.
 * Event specs a task yields or returns are dispatched as ordinary events
 * before the task resumes.
 *
 * Sibling brackets (e.g. under Promise.all) queue on the lock; a bracket
 * opened from inside another one fails with ImmutableStateError.
 *
 * Failures never reach the client: they are logged. A bracket opened after
 * the token's state was evicted fails with ConcurrentAccessError and the
 * mutation is dropped.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import {
  ConcurrentAccessError,
  ImmutableStateError,
  tryWithLogging,
} from '../common/errors';
import { normalizeEvents, type EventSpec, type RouterData } from '../events/event';
import { logger } from '../dev/logger';
import {
  isHandlerIterator,
  type HandlerOutput,
  type PreparedHandler,
  type ViewSource,
} from '../state/define';
import { buildDelta, isEmptyDelta } from '../state/delta';
import type { StateManager } from '../state/manager';
import type { StateNode } from '../state/node';
import { createViewSource, type ExclusiveRunner } from '../state/proxy';
import type { SerializerRegistry } from '../state/serializers';
import type { StateUpdate } from './updates';

export interface BackgroundTask {
  token: string;
  /** Full name of the state the handler belongs to. */
  state: string;
  /** Full handler name, for logs. */
  handler: string;
  prepared: PreparedHandler;
  /** The token's tree at spawn time; read until the first bracket. */
  tree: StateNode;
  router: RouterData;
}

export interface BackgroundSupervisorOptions {
  manager: StateManager;
  serializers: SerializerRegistry;
  send: (token: string, update: StateUpdate) => Promise<void>;
  dispatchSpecs: (
    token: string,
    specs: readonly EventSpec[],
    router: RouterData
  ) => Promise<void>;
}

// The task whose exclusive() body is running in the current async context.
const openBracket = new AsyncLocalStorage<BackgroundTask>();

export class BackgroundSupervisor {
  private readonly tasks = new Set<Promise<unknown>>();

  constructor(private readonly options: BackgroundSupervisorOptions) {}

  /** Tasks still running. */
  get size(): number {
    return this.tasks.size;
  }

  spawn(task: BackgroundTask): void {
    const running = tryWithLogging(() => this.run(task), {
      message: `[Tether] Background task '${task.handler}' for token '${task.token}' failed`,
      level: (error) =>
        error instanceof ConcurrentAccessError ? 'warn' : 'error',
    });
    this.tasks.add(running);
    void running.then(() => {
      this.tasks.delete(running);
    });
  }

  /** Wait for every running task, including tasks spawned while waiting. */
  async drain(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.all([...this.tasks]);
    }
  }

  private async run(task: BackgroundTask): Promise<void> {
    const { manager } = this.options;
    let current = task.tree.getSubstate(task.state);

    const exclusive: ExclusiveRunner = async <R>(
      fn: (views: ViewSource) => R | Promise<R>
    ): Promise<R> => {
      if (openBracket.getStore() === task) {
        throw new ImmutableStateError(
          `exclusive() sections cannot be nested (in '${task.handler}')`
        );
      }
      return manager.lock.run(task.token, async () => {
        if (!(await manager.hasState(task.token))) {
          throw new ConcurrentAccessError(task.token);
        }
        const tree = await manager.getState(task.token);
        const node = tree.getSubstate(task.state);
        current = node;
        try {
          return await openBracket.run(task, () =>
            fn(createViewSource(() => node, { mode: 'mutable' }))
          );
        } finally {
          await this.flush(task, tree);
          await manager.setState(task.token, tree);
        }
      });
    };

    const views = createViewSource(() => current, {
      mode: 'readonly',
      readonlyReason: `Background handler '${task.handler}' may only modify state inside exclusive()`,
      exclusive,
    });

    const output: HandlerOutput = task.prepared(views);
    if (isHandlerIterator(output)) {
      for (;;) {
        const step = await output.next();
        await this.forward(task, step.value);
        if (step.done) return;
      }
    }
    await this.forward(task, await output);
  }

  private async forward(task: BackgroundTask, value: unknown): Promise<void> {
    const specs = normalizeEvents(value);
    if (specs.length === 0) return;
    await this.options.dispatchSpecs(task.token, specs, task.router);
  }

  private async flush(task: BackgroundTask, tree: StateNode): Promise<void> {
    let update: StateUpdate;
    try {
      const delta = buildDelta(tree, this.options.serializers);
      if (isEmptyDelta(delta)) return;
      update = { delta, events: [], processing: false };
    } catch (error) {
      logger.error(
        `[Tether] Could not build the delta for background task '${task.handler}':`,
        error
      );
      return;
    }
    await this.options.send(task.token, update);
  }
}
