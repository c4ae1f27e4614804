export {
  ObservableObject,
  defineObservable,
  type ObservableClass,
  type ObservableInstance,
  type PropertyChange,
  type PropertyObserver,
} from './observable-object.js';
export {
  ObservableProperty,
  changeHookName,
  observableProperty,
  type ChangeHooks,
  type PropertyDeclarations,
  type PropertyName,
} from './observable-property.js';
