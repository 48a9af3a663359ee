'use strict';

import * as yup from 'yup';
import _ from './lodash-mixins';

import State from './State';
import Program from './Program';
import { ProgramSpecSchema } from './TransitionSpec';
import type { Instruction, ProgramSpec } from './TransitionSpec';
import TMSpecError from './TMSpecError';
export { TMSpecError };

export interface ParsedProgram {
  program: Program;
  start: State;
}

/**
 * Validate `obj` against `schema`, collecting every failure into one
 * TMSpecError rather than stopping at the first.
 */
export function validate<S extends yup.AnySchema> (schema: S, obj: unknown, reason: string): yup.InferType<S> {
  try {
    return schema.validateSync(obj, { abortEarly: false });
  } catch (e) {
    if (e instanceof yup.ValidationError)
      throw new TMSpecError(reason, {
        validationErrors: e.errors
      });
    throw e;
  }
}

/**
 * Build a program from plain data, such as a machine description that went
 * through JSON:
 *
 *     {
 *       start: 'scan',
 *       finalStates: ['done'],
 *       instructions: [
 *         { from: 'scan', read: '?', to: 'scan', write: '?', move: 'R' },
 *       ]
 *     }
 *
 * States named in `finalStates` are final wherever they appear. Only the
 * shape is checked; a program that gets stuck or never halts still parses.
 */
export function parseProgram (obj: unknown): ParsedProgram {
  let spec: ProgramSpec = validate(ProgramSpecSchema, obj, 'Validation Error');

  let states = _.memoize((name: string) => new State(name, _.contains(spec.finalStates, name)));
  let instructions = spec.instructions.map((instruct): Instruction => ({
    from: states(instruct.from),
    read: instruct.read,
    to: states(instruct.to),
    write: instruct.write,
    move: instruct.move,
  }));

  return {
    program: new Program(instructions, { blank: spec.blank, wildcard: spec.wildcard }),
    start: states(spec.start),
  };
}
