/**
 * App facade
 *
 * The surface a transport talks to: validate inbound messages, dispatch
 * them, hydrate new clients, evict sessions and shut down cleanly. Updates go
 * out through the `sink` the transport provides.
 *
 * @example
 * ```ts
 * const app = createApp({
 *   states: [App, App_Todos],
 *   sink: (token, update) => socket(token).send(JSON.stringify(update)),
 * });
 * await app.handleMessage(JSON.parse(frame));
 * ```
 */

import { z } from 'zod';
import { InvalidMessageError } from '../common/errors';
import { loadConfig, type Config, type ConfigInput } from '../config';
import { emptyRouterData, type Event, type RouterData } from '../events/event';
import { formatIssues } from '../events/payload';
import { setLogLevel } from '../dev/logger';
import type { StateDefinitionLike } from '../state/define';
import {
  DiskStateManager,
  MemoryStateManager,
  type StateManager,
} from '../state/manager';
import type { StateNode } from '../state/node';
import { StateRegistry } from '../state/registry';
import {
  defaultSerializers,
  type SerializerRegistry,
} from '../state/serializers';
import type { StorageDescriptor } from '../vars/storage';
import { Dispatcher, type BackendErrorHandler } from './dispatcher';
import type { UpdateSink } from './updates';

const routerDataSchema = z.object({
  path: z.string().default('/'),
  query: z.record(z.string()).default({}),
  headers: z.record(z.string()).default({}),
  client_ip: z.string().nullable().default(null),
  session_id: z.string().nullable().default(null),
});

const messageSchema = z.object({
  token: z.string().min(1),
  name: z.string().min(1),
  payload: z
    .union([z.record(z.unknown()), z.array(z.unknown())])
    .default({}),
  router_data: routerDataSchema.default({}),
});

/** Inbound wire message, before validation defaults apply. */
export type InboundMessage = z.input<typeof messageSchema>;

export interface AppOptions {
  states: readonly StateDefinitionLike[];
  sink: UpdateSink;
  config?: ConfigInput;
  /** Replaces the manager selected by `config.stateManager`. */
  manager?: StateManager;
  serializers?: SerializerRegistry;
  onBackendError?: BackendErrorHandler;
  /** Clock used for token expiration, in milliseconds. */
  now?: () => number;
}

export interface App {
  readonly config: Config;
  readonly registry: StateRegistry;
  readonly manager: StateManager;
  /** Validate a raw message (object or JSON text) and dispatch it. */
  handleMessage(raw: unknown): Promise<void>;
  dispatch(event: Event): Promise<void>;
  /** Apply client storage values and send the full state. */
  hydrate(
    token: string,
    storage?: Record<string, unknown>,
    router?: RouterData
  ): Promise<void>;
  /** Drop a client's state. Running background tasks cannot bring it back. */
  evict(token: string): Promise<void>;
  getState(token: string): Promise<StateNode>;
  /** Storage vars the client reports on hydration. */
  storageDescriptors(): readonly StorageDescriptor[];
  /** Number of background tasks still running. */
  backgroundTasks(): number;
  /** Wait for background tasks, then release the state manager. */
  shutdown(): Promise<void>;
}

export function parseMessage(raw: unknown): Event {
  let value = raw;
  if (typeof raw === 'string') {
    try {
      value = JSON.parse(raw);
    } catch (error) {
      throw new InvalidMessageError(
        `Message is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }
  const result = messageSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidMessageError(
      `Invalid message: ${formatIssues(result.error)}`
    );
  }
  const { token, name, payload, router_data: router } = result.data;
  return {
    token,
    name,
    payload,
    routerData: {
      path: router.path,
      query: router.query,
      headers: router.headers,
      clientIp: router.client_ip,
      sessionId: router.session_id,
    },
  };
}

export function createApp(options: AppOptions): App {
  const config = loadConfig(options.config);
  setLogLevel(config.logLevel);

  const registry = new StateRegistry(options.states);
  const serializers = options.serializers ?? defaultSerializers;
  const managerOptions = {
    tokenExpiration: config.tokenExpiration,
    now: options.now,
  };
  const manager =
    options.manager ??
    (config.stateManager === 'disk'
      ? new DiskStateManager(registry, {
          ...managerOptions,
          stateDir: config.stateDir,
          serializers,
        })
      : new MemoryStateManager(registry, managerOptions));

  const dispatcher = new Dispatcher({
    registry,
    manager,
    sink: options.sink,
    serializers,
    maxChainDepth: config.maxChainDepth,
    onBackendError: options.onBackendError,
  });

  return {
    config,
    registry,
    manager,
    handleMessage: async (raw) => dispatcher.dispatch(parseMessage(raw)),
    dispatch: (event) => dispatcher.dispatch(event),
    hydrate: (token, storage = {}, router = emptyRouterData()) =>
      dispatcher.hydrate(token, storage, router),
    evict: (token) => manager.lock.run(token, () => manager.evict(token)),
    getState: (token) => manager.getState(token),
    storageDescriptors: () => registry.storageVars(),
    backgroundTasks: () => dispatcher.background.size,
    async shutdown() {
      await dispatcher.background.drain();
      await manager.close();
    },
  };
}
