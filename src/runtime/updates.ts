import type { EventSpec } from '../events/event';
import type { Delta } from '../state/node';

/** A client-side event forwarded to the client (console log, alert, error, ...). */
export interface ClientEvent {
  name: string;
  payload: Record<string, unknown>;
}

/** One outbound message for a client. */
export interface StateUpdate {
  delta: Delta;
  events: ClientEvent[];
  /** True while more steps of the current chain are still to come. */
  processing: boolean;
}

export type UpdateSink = (
  token: string,
  update: StateUpdate
) => void | Promise<void>;

export function toClientEvent(spec: EventSpec): ClientEvent {
  return { name: spec.handler, payload: { ...spec.args } };
}
