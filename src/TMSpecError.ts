'use strict';

import _ from './lodash-mixins';

export interface TMSpecErrorDetails {
  problemValue?: unknown;
  validationErrors?: string[];
}

/**
 * Raised when plain data handed to the construction or configuration layer
 * does not describe a machine: a malformed instruction, a bad run option,
 * YAML that does not load.
 */
class TMSpecError extends Error {
  public readonly reason: string;
  public readonly details: TMSpecErrorDetails;

  constructor (reason: string, details?: TMSpecErrorDetails) {
    super(describe(reason, details || {}));

    this.name = 'TMSpecError';

    this.reason = reason;
    this.details = details || {};

    // https://github.com/Microsoft/TypeScript-wiki/blob/master/Breaking-Changes.md#extending-built-ins-like-error-array-and-map-may-no-longer-work
    // Set the prototype explicitly.
    Object.setPrototypeOf(this, TMSpecError.prototype);
  }
}

// one line for the reason, one per validation error
function describe (reason: string, details: TMSpecErrorDetails): string {
  let problemValue = _.isUndefined(details.problemValue)
    ? ''
    : ': ' + JSON.stringify(details.problemValue);
  let sentences = [reason + problemValue]
    .concat(_.map(details.validationErrors, (e) => '  - ' + e))
    .filter(_.identity);
  return sentences.join('\n');
}

export default TMSpecError;
