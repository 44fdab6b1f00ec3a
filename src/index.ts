/**
 * Tether: reactive state & expression runtime
 *
 * Server-held state trees per client, driven by events and answered with
 * deltas, plus the Var expression system used to render client-side
 * bindings.
 */

// Expressions
export { Var, VarSlice } from './vars/var';
export type { VarInit, CreateOptions, OperationOptions } from './vars/var';
export { NameAllocator } from './vars/names';
export { describeType, inferType, defaultForType } from './vars/types';
export type { VarType } from './vars/types';
export { clientStorage, getClientStorage } from './vars/storage';
export type {
  ClientStorageOptions,
  StorageDescriptor,
  StorageKind,
} from './vars/storage';

// State
export { defineState, StateDefinition, SETVAR } from './state/define';
export type {
  AnyStateDefinition,
  BackgroundView,
  ComputedOptions,
  StateView,
  ViewHelpers,
} from './state/define';
export { StateRegistry } from './state/registry';
export { StateNode } from './state/node';
export type { Delta, TreeSnapshot } from './state/node';
export { buildDelta, isEmptyDelta } from './state/delta';
export {
  SerializerRegistry,
  createSerializerRegistry,
  defaultSerializers,
} from './state/serializers';
export type { JsonValue } from './state/serializers';
export {
  MemoryStateManager,
  DiskStateManager,
  BaseStateManager,
} from './state/manager';
export type { StateManager, StateManagerOptions } from './state/manager';

// Events
export {
  EventSpec,
  consoleLog,
  windowAlert,
  redirect,
  setClipboard,
  removeCookie,
  clearLocalStorage,
  removeLocalStorage,
  errorEvent,
} from './events/event';
export type { Event, EventRef, EventLike, RouterData } from './events/event';
export {
  TRIGGERS,
  EVENT_ARG,
  bindTrigger,
  formatEventSpec,
  formatTriggerHandler,
} from './events/triggers';

// Runtime
export { createApp, parseMessage } from './runtime/app';
export type { App, AppOptions, InboundMessage } from './runtime/app';
export { TokenLock } from './runtime/lock';
export type {
  ClientEvent,
  StateUpdate,
  UpdateSink,
} from './runtime/updates';
export type { BackendErrorHandler } from './runtime/dispatcher';

// Configuration & diagnostics
export { loadConfig } from './config';
export type { Config, ConfigInput } from './config';
export { logger, setLogLevel } from './dev/logger';
export type { LogLevel } from './dev/logger';
export * from './common/errors';
