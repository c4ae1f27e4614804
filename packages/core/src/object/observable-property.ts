import { InvalidArgumentError, UnboundPropertyError } from '../errors/observa-error.js';

/** String keys of a property map */
export type PropertyName<P> = Extract<keyof P, string>;

/**
 * Class-level declaration of one observable property.
 *
 * A property only knows its name and default value; the current value of
 * each instance lives on that instance. The name is assigned once, when the
 * property is declared on a class through {@link defineObservable} or an
 * {@link ObservableObject} constructor.
 *
 * @typeParam T - Value type of the property
 *
 * @example
 * ```typescript
 * const Person = defineObservable({
 *   name: observableProperty(''),
 *   age: observableProperty(0),
 *   nickname: observableProperty<string | null>(null),
 * });
 * ```
 */
export class ObservableProperty<T> {
  private boundName: string | null = null;

  constructor(readonly defaultValue: T) {}

  /**
   * Name the property was declared under.
   *
   * @throws {@link UnboundPropertyError} before the property is declared on a class
   */
  get name(): string {
    if (this.boundName === null) {
      throw new UnboundPropertyError();
    }
    return this.boundName;
  }

  get isBound(): boolean {
    return this.boundName !== null;
  }

  /**
   * Assign the property's name. Declaring the same property object again
   * under the same name is allowed; under another name it is not.
   */
  bind(name: string): this {
    if (this.boundName !== null && this.boundName !== name) {
      throw new InvalidArgumentError(
        `Property already declared as "${this.boundName}", cannot redeclare it as "${name}"`,
        { name, boundName: this.boundName }
      );
    }
    this.boundName = name;
    return this;
  }
}

/**
 * Declare an observable property with a default value.
 */
export function observableProperty<T>(defaultValue: T): ObservableProperty<T> {
  return new ObservableProperty(defaultValue);
}

/**
 * Declarations for every property of a property map.
 */
export type PropertyDeclarations<P> = {
  readonly [K in keyof P]: ObservableProperty<P[K]>;
};

/**
 * Optional change hooks an observable class may implement. For a property
 * `age` the hook is `onAgeChanged(previous, next)`; it runs on every write
 * to `age`, before any registered observer.
 *
 * @example
 * ```typescript
 * interface Props { age: number }
 *
 * class Person extends defineObservable<Props>({ age: observableProperty(0) })
 *   implements ChangeHooks<Props>
 * {
 *   onAgeChanged(previous: number, next: number): void {
 *     console.log(`age ${previous} -> ${next}`);
 *   }
 * }
 * ```
 */
export type ChangeHooks<P> = {
  [K in PropertyName<P> as `on${Capitalize<K>}Changed`]?: (previous: P[K], next: P[K]) => void;
};

/** Name of the change hook for a property */
export function changeHookName(property: string): string {
  return `on${property.charAt(0).toUpperCase()}${property.slice(1)}Changed`;
}
