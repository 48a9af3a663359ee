'use strict';

/**
 * Raised while a machine is running, for conditions no well-typed program
 * can produce (an unknown head movement handed in from untyped code).
 * Halting outcomes are never reported this way.
 */
class TMRuntimeError extends Error {
  public readonly problemValue: unknown;

  constructor (message: string, problemValue?: unknown) {
    super(message);

    this.name = 'TMRuntimeError';
    this.problemValue = problemValue;

    Object.setPrototypeOf(this, TMRuntimeError.prototype);
  }
}

export default TMRuntimeError;
