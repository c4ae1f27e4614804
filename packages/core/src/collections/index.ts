export {
  DictModificationType,
  ObservableDict,
  type DictChange,
  type DictChangeType,
  type DictObserver,
} from './observable-dict.js';
export {
  ListModificationType,
  ObservableList,
  type ListChange,
  type ListChangeType,
  type ListObserver,
} from './observable-list.js';
