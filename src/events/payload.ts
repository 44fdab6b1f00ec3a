/**
 * Payload binding: positional or keyword payloads onto a handler's declared
 * argument names, then validation against its zod schema.
 */

import type { z } from 'zod';
import { EventPayloadError } from '../common/errors';

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Map a payload onto `argNames`. Arrays bind positionally, objects by name.
 * Extra positional values or unknown names fail with EventPayloadError.
 */
export function bindPayload(
  handler: string,
  argNames: readonly string[],
  payload: unknown
): Record<string, unknown> {
  if (payload === undefined || payload === null) return {};

  if (Array.isArray(payload)) {
    if (payload.length > argNames.length) {
      throw new EventPayloadError(
        handler,
        `expected at most ${argNames.length} argument(s), got ${payload.length}`
      );
    }
    const bound: Record<string, unknown> = {};
    payload.forEach((value: unknown, i) => {
      const name = argNames[i];
      if (name !== undefined) bound[name] = value;
    });
    return bound;
  }

  if (!isPlainRecord(payload)) {
    throw new EventPayloadError(
      handler,
      `payload must be an object or an array, got ${typeof payload}`
    );
  }

  const unknown = Object.keys(payload).filter((k) => !argNames.includes(k));
  if (unknown.length > 0) {
    throw new EventPayloadError(
      handler,
      `unexpected argument(s) ${unknown.map((k) => `'${k}'`).join(', ')}`
    );
  }
  return { ...payload };
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

/**
 * Validate bound arguments. Returns the parsed (possibly transformed) value.
 */
export function validatePayload<S extends z.ZodTypeAny>(
  handler: string,
  schema: S,
  args: Record<string, unknown>
): z.output<S> {
  const result = schema.safeParse(args);
  if (!result.success) {
    throw new EventPayloadError(handler, formatIssues(result.error));
  }
  return result.data;
}
