/**
 * Framework errors.
 *
 * Every error here signals a defect in a component definition. None of them
 * is caught inside the core.
 */

export class SteepError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SteepError';
  }
}

/** `view` or `update` called on a component that does not define it. */
export class NotImplementedError extends SteepError {
  constructor(
    readonly component: string,
    readonly method: string,
  ) {
    super(`${component} must implement #${method}`);
    this.name = 'NotImplementedError';
  }
}

/** A dynamic child selector produced something that is not a component class. */
export class InvalidChildTypeError extends SteepError {
  constructor(
    readonly component: string,
    readonly selector: string,
    readonly actualType: string,
  ) {
    super(`Invalid child type from ${component}#${selector}: expected a Model class, got ${actualType}`);
    this.name = 'InvalidChildTypeError';
  }
}

/** A dynamic child selector names a method the component does not have. */
export class MethodNotFoundError extends SteepError {
  constructor(
    readonly component: string,
    readonly selector: string,
  ) {
    super(`Method not found: ${component}#${selector} is not defined`);
    this.name = 'MethodNotFoundError';
  }
}

/** Name the runtime type of a value for error messages. */
export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'function') {
    return value.name ? `function ${value.name}` : 'anonymous function';
  }
  if (typeof value === 'object') {
    const ctor: unknown = Reflect.get(value, 'constructor');
    if (typeof ctor === 'function' && ctor.name) return ctor.name;
    return 'object';
  }
  return typeof value;
}
