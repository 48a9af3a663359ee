import _ from "./lodash-mixins";

import type Program from './Program';
import type { Instruction, TapeSymbol } from './TransitionSpec';

export function toStringArray (val: unknown): string[] {
  if (_.isNil(val))
    return [];
  if (_.isString(val))
    return [val];
  else
    return _.castArray(val).map(String);
}

export function splitToStringArray (val: unknown): TapeSymbol[] {
  if (_.isNil(val))
    return [];
  if (_.isString(val))
    return val.split("");
  if (_.isArray(val))
    return val.map(String);
  else
    return String(val).split("");
}

export interface ShadowedInstruction {
  /** Never matched: every symbol it reads is claimed first by `by`. */
  instruction: Instruction;
  by: Instruction;
  index: number;
}

/**
 * Instructions that can never fire because an earlier instruction for the
 * same state reads the same symbol or the wildcard.
 */
export function findShadowedInstructions (program: Program): ShadowedInstruction[] {
  return _.chain(program.instructions)
    .map((instruction, index): ShadowedInstruction | null => {
      let by = _.find(_.take(program.instructions, index), (earlier) =>
        earlier.from.is(instruction.from)
        && (earlier.read === program.wildcard || earlier.read === instruction.read));
      return by ? { instruction, by, index } : null;
    })
    .compact()
    .value();
}

export function label (instruct: Instruction): string {
  return instruct.from.name + '->' + instruct.to.name + ': '
    + instruct.read + '↦' + instruct.write + ',' + instruct.move;
}

/** Logs shadowed instructions; true when there are none. */
export function checkReachable (program: Program): boolean {
  let shadowed = findShadowedInstructions(program);
  if (_.isEmpty(shadowed)) return true;

  console.log("Unreachable instructions in TM:");
  _.forEach(shadowed, ({ instruction, by, index }) =>
    console.log('#' + index + ' ' + label(instruction) + ' shadowed by ' + label(by)));
  return false;
}
