export type OptionsErrorKind = 'MissingParameter' | 'InvalidParameter' | 'InvalidParameterValue';

/**
 * Base class for data errors: the options themselves are missing, unexpected
 * or malformed. Callers can branch on `kind` or use `instanceof`.
 */
export abstract class OptionsError extends Error {
  abstract readonly kind: OptionsErrorKind;

  constructor(
    /** Name of the offending option. */
    readonly parameter: string,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** A mandatory field or list has no occurrence left in the index. */
export class MissingParameterError extends OptionsError {
  readonly kind = 'MissingParameter';

  constructor(parameter: string) {
    super(parameter, `Parameter '${parameter}' is missing`);
  }
}

/** An occurrence was never consumed by any decode call. */
export class InvalidParameterError extends OptionsError {
  readonly kind = 'InvalidParameter';

  constructor(parameter: string) {
    super(parameter, `Invalid parameter '${parameter}'`);
  }
}

/** An occurrence exists but its value does not parse as the requested type. */
export class InvalidParameterValueError extends OptionsError {
  readonly kind = 'InvalidParameterValue';

  constructor(
    parameter: string,
    /** Human-readable description of what was expected. */
    readonly expected: string,
  ) {
    super(parameter, `Parameter '${parameter}' expects ${expected}`);
  }
}

/**
 * The caller drove the visitor out of protocol (nested lists, a list-only
 * call outside a list, a presence query mid-list...). This is a programming
 * error, never a consequence of the option values.
 */
export class VisitorProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'VisitorProtocolError';
  }
}
