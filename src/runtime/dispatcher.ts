/**
 * Event dispatcher
 *
 * Turns one inbound event into a chain of steps and a stream of updates:
 *
 *   Idle -> Resolving -> Executing -> (Yielding <-> Executing) -> Draining -> Idle
 *
 * Key rules:
 * - The token lock is held for the whole chain of an ordinary event.
 * - A delta is flushed after every step: the body up to each yield, and the
 *   body up to its return.
 * - Yielded specs are drained, in order and as their own steps, before the
 *   generator resumes; client events among them are sent before it resumes
 *   too. Returned specs run after the returning step's delta.
 * - A failure aborts the chain. Changes made so far are still flushed and the
 *   client gets an `_error` event; earlier deltas stay applied.
 * - Every chain ends with one update carrying `processing: false`.
 * - Loading or saving the tree never rejects the dispatch: the failure is
 *   logged and the client gets an `_error` event.
 */

import {
  ComputedVarError,
  ConcurrentAccessError,
  EventPayloadError,
  HandlerExecutionError,
  HandlerNotFoundError,
  ImmutableStateError,
  SerializationError,
  StateNotFoundError,
  UnknownVarError,
  toErrorInfo,
} from '../common/errors';
import {
  errorEvent,
  isClientEventName,
  normalizeEvents,
  type Event,
  type EventLike,
  type EventSpec,
  type RouterData,
} from '../events/event';
import { bindPayload } from '../events/payload';
import { assertDispatchPrecondition } from '../dev/invariant';
import { logger } from '../dev/logger';
import {
  isHandlerIterator,
  type HandlerIterator,
  type HandlerOutput,
  type PreparedHandler,
} from '../state/define';
import { buildDelta, isEmptyDelta, type Delta } from '../state/delta';
import type { StateManager } from '../state/manager';
import type { StateNode } from '../state/node';
import { createViewSource } from '../state/proxy';
import type { StateRegistry } from '../state/registry';
import type { SerializerRegistry } from '../state/serializers';
import { BackgroundSupervisor } from './background';
import {
  toClientEvent,
  type ClientEvent,
  type StateUpdate,
  type UpdateSink,
} from './updates';

export const HYDRATE = 'hydrate';

/** Maps a chain failure to the client events sent in its place. */
export type BackendErrorHandler = (
  error: unknown
) => EventLike | readonly EventLike[] | null | undefined;

export interface DispatcherOptions {
  registry: StateRegistry;
  manager: StateManager;
  sink: UpdateSink;
  serializers: SerializerRegistry;
  maxChainDepth: number;
  onBackendError?: BackendErrorHandler;
}

interface Step {
  name: string;
  payload: Record<string, unknown> | readonly unknown[];
}

interface Chain {
  token: string;
  tree: StateNode;
  router: RouterData;
  /** Client events waiting for the next update. */
  pending: ClientEvent[];
}

// Errors that already say what went wrong; anything else is wrapped.
const TAXONOMY = [
  ComputedVarError,
  ConcurrentAccessError,
  HandlerExecutionError,
  ImmutableStateError,
  SerializationError,
  StateNotFoundError,
  UnknownVarError,
];

function asExecutionError(handler: string, error: unknown): unknown {
  if (TAXONOMY.some((type) => error instanceof type)) return error;
  return new HandlerExecutionError(handler, error);
}

function toStep(spec: EventSpec): Step {
  return { name: spec.handler, payload: { ...spec.args } };
}

function toRecord(
  payload: Record<string, unknown> | readonly unknown[]
): Record<string, unknown> {
  return Array.isArray(payload) ? { args: [...payload] } : { ...payload };
}

export class Dispatcher {
  readonly background: BackgroundSupervisor;
  private readonly registry: StateRegistry;
  private readonly manager: StateManager;
  private readonly sink: UpdateSink;
  private readonly serializers: SerializerRegistry;
  private readonly maxChainDepth: number;
  private readonly onBackendError?: BackendErrorHandler;

  constructor(options: DispatcherOptions) {
    this.registry = options.registry;
    this.manager = options.manager;
    this.sink = options.sink;
    this.serializers = options.serializers;
    this.maxChainDepth = options.maxChainDepth;
    this.onBackendError = options.onBackendError;
    this.background = new BackgroundSupervisor({
      manager: this.manager,
      serializers: this.serializers,
      send: (token, update) => this.send(token, update),
      dispatchSpecs: (token, specs, router) =>
        this.dispatchSpecs(token, specs, router),
    });
  }

  /** Name of the built-in hydration event. */
  get hydrateEvent(): string {
    return `${this.registry.root.fullName}.${HYDRATE}`;
  }

  async dispatch(event: Event): Promise<void> {
    if (event.name === this.hydrateEvent) {
      const storage = Array.isArray(event.payload) ? {} : event.payload;
      return this.hydrate(event.token, storage, event.routerData);
    }
    await this.runChain(
      event.token,
      [{ name: event.name, payload: event.payload }],
      event.routerData
    );
  }

  /** Run specs as one chain for `token`, e.g. specs yielded by a background task. */
  async dispatchSpecs(
    token: string,
    specs: readonly EventSpec[],
    router: RouterData
  ): Promise<void> {
    await this.runChain(token, specs.map(toStep), router);
  }

  /**
   * Apply client storage values and router data, then send the full state.
   * `storage` is keyed by each storage var's client key.
   */
  async hydrate(
    token: string,
    storage: Record<string, unknown>,
    router: RouterData
  ): Promise<void> {
    await this.manager.lock.run(token, async () => {
      const tree = await this.load(token);
      if (!tree) return;
      tree.context.router = router;

      for (const descriptor of this.registry.storageVars()) {
        if (!Object.prototype.hasOwnProperty.call(storage, descriptor.key)) {
          continue;
        }
        const node = tree.getSubstate(descriptor.state);
        const schema = node.definition.shape[descriptor.var];
        if (!schema) continue;
        const result = schema.safeParse(storage[descriptor.key]);
        if (!result.success) {
          logger.warn(
            `[Tether] Ignoring client ${descriptor.kind} value for '${descriptor.key}': ${result.error.message}`
          );
          continue;
        }
        node.set(descriptor.var, result.data);
      }

      let delta: Delta = {};
      const events: ClientEvent[] = [];
      try {
        delta = tree.dict(this.serializers);
      } catch (error) {
        logger.error(`[Tether] Hydration failed for token '${token}':`, error);
        events.push(toClientEvent(errorEvent(toErrorInfo(error))));
      }
      tree.clean();
      await this.send(token, { delta, events, processing: false });
      await this.save(token, tree);
    });
  }

  private async runChain(
    token: string,
    steps: readonly Step[],
    router: RouterData
  ): Promise<void> {
    await this.manager.lock.run(token, async () => {
      const tree = await this.load(token);
      if (!tree) return;
      tree.context.router = router;
      const chain: Chain = { token, tree, router, pending: [] };

      try {
        for (const step of steps) {
          await this.runStep(chain, step, 0);
        }
      } catch (error) {
        this.fail(chain, error);
      }
      await this.emit(chain, false);
      await this.save(token, tree);
    });
  }

  private async load(token: string): Promise<StateNode | null> {
    try {
      return await this.manager.getState(token);
    } catch (error) {
      logger.error(`[Tether] Could not load state for token '${token}':`, error);
      await this.sendError(token, error);
      return null;
    }
  }

  private async save(token: string, tree: StateNode): Promise<void> {
    try {
      await this.manager.setState(token, tree);
    } catch (error) {
      logger.error(`[Tether] Could not save state for token '${token}':`, error);
      await this.sendError(token, error);
    }
  }

  private async sendError(token: string, error: unknown): Promise<void> {
    await this.send(token, {
      delta: {},
      events: [toClientEvent(errorEvent(toErrorInfo(error)))],
      processing: false,
    });
  }

  private async runStep(chain: Chain, step: Step, depth: number): Promise<void> {
    assertDispatchPrecondition(
      depth <= this.maxChainDepth,
      `Event chain deeper than ${this.maxChainDepth} steps at '${step.name}'`
    );

    if (isClientEventName(step.name)) {
      chain.pending.push({ name: step.name, payload: toRecord(step.payload) });
      return;
    }

    const resolved = this.registry.resolveHandler(step.name);
    if (!resolved) {
      logger.warn(`[Tether] ${new HandlerNotFoundError(step.name).message}`);
      return;
    }
    const { definition, entry } = resolved;

    let prepared: PreparedHandler;
    try {
      prepared = entry.prepare(
        bindPayload(entry.fullName, entry.argNames, step.payload)
      );
    } catch (error) {
      if (!(error instanceof EventPayloadError)) throw error;
      logger.warn(`[Tether] ${error.message}`);
      chain.pending.push(toClientEvent(errorEvent(toErrorInfo(error))));
      return;
    }

    if (entry.background) {
      this.background.spawn({
        token: chain.token,
        state: definition.fullName,
        handler: entry.fullName,
        prepared,
        tree: chain.tree,
        router: chain.router,
      });
      return;
    }

    const node = chain.tree.getSubstate(definition.fullName);
    let output: HandlerOutput;
    try {
      output = prepared(createViewSource(() => node, { mode: 'mutable' }));
    } catch (error) {
      throw asExecutionError(entry.fullName, error);
    }

    if (isHandlerIterator(output)) {
      await this.drive(chain, entry.fullName, output, depth);
      return;
    }

    let result: unknown;
    try {
      result = await output;
    } catch (error) {
      throw asExecutionError(entry.fullName, error);
    }
    await this.emit(chain, true);
    await this.followUp(chain, entry.fullName, result, depth);
  }

  private async drive(
    chain: Chain,
    handler: string,
    iterator: HandlerIterator,
    depth: number
  ): Promise<void> {
    let finished = false;
    try {
      for (;;) {
        let step: IteratorResult<unknown, unknown>;
        try {
          step = await iterator.next();
        } catch (error) {
          finished = true;
          throw asExecutionError(handler, error);
        }
        finished = step.done === true;
        await this.emit(chain, true);
        await this.followUp(chain, handler, step.value, depth);
        if (finished) return;
        // Client events from the yield go out before the body resumes.
        await this.emit(chain, true);
      }
    } finally {
      if (!finished) {
        try {
          await iterator.return(undefined);
        } catch (error) {
          logger.warn(
            `[Tether] Handler '${handler}' failed while being stopped:`,
            error
          );
        }
      }
    }
  }

  private async followUp(
    chain: Chain,
    handler: string,
    value: unknown,
    depth: number
  ): Promise<void> {
    let specs: EventSpec[];
    try {
      specs = normalizeEvents(value);
    } catch (error) {
      throw new HandlerExecutionError(handler, error);
    }
    for (const spec of specs) {
      await this.runStep(chain, toStep(spec), depth + 1);
    }
  }

  private fail(chain: Chain, error: unknown): void {
    logger.error(
      `[Tether] Event chain for token '${chain.token}' aborted:`,
      error
    );
    let specs: EventSpec[] = [errorEvent(toErrorInfo(error))];
    if (this.onBackendError) {
      try {
        specs = normalizeEvents(this.onBackendError(error));
      } catch (hookError) {
        logger.error('[Tether] onBackendError failed:', hookError);
      }
    }
    for (const spec of specs) {
      if (spec.isClientEvent) {
        chain.pending.push(toClientEvent(spec));
      } else {
        logger.warn(
          `[Tether] onBackendError returned server event '${spec.handler}'; only client events are sent`
        );
      }
    }
  }

  /**
   * Flush the chain's dirty state and pending client events. Intermediate
   * updates with nothing in them are skipped; the final one is always sent.
   */
  private async emit(chain: Chain, processing: boolean): Promise<void> {
    let delta: Delta;
    try {
      delta = buildDelta(chain.tree, this.serializers);
    } catch (error) {
      if (processing) throw error;
      logger.error(
        `[Tether] Could not build the final delta for token '${chain.token}':`,
        error
      );
      delta = {};
      chain.pending.push(toClientEvent(errorEvent(toErrorInfo(error))));
    }
    const events = chain.pending.splice(0);
    if (processing && isEmptyDelta(delta) && events.length === 0) return;
    await this.send(chain.token, { delta, events, processing });
  }

  private async send(token: string, update: StateUpdate): Promise<void> {
    try {
      await this.sink(token, update);
    } catch (error) {
      logger.error(`[Tether] Update sink failed for token '${token}':`, error);
    }
  }
}
