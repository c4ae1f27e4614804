export { resolveArity } from './arity.js';
export { dispatch, raiseFailures } from './dispatcher.js';
export {
  ObserverRegistry,
  type LiveObserver,
  type ObserverRef,
  type ObserverRefFactory,
  type ObserverRegistryOptions,
} from './registry.js';
export type {
  AnyObserver,
  Notification,
  Observer,
  ObserverArity,
  ObserverOptions,
} from './types.js';
