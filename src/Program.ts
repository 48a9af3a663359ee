'use strict';

import _ from './lodash-mixins';
import type State from './State';
import { DEFAULT_BLANK, DEFAULT_WILDCARD } from './TransitionSpec';
import type { Alphabet, Instruction, InstructionTuple, TapeSymbol } from './TransitionSpec';

/**
 * An instruction table: an ordered list of transitions.
 *
 * Matching is a linear scan in declaration order and the first hit wins. A
 * wildcard read placed before a specific read for the same state therefore
 * shadows the specific one; nothing reorders rules by specificity (see
 * `findShadowedInstructions` for a diagnostic).
 */
export default class Program {
  public readonly instructions: readonly Instruction[];
  public readonly blank: TapeSymbol;
  public readonly wildcard: TapeSymbol;

  constructor (instructions: readonly Instruction[], alphabet: Partial<Alphabet> = {}) {
    this.instructions = Object.freeze(instructions.map((i) => Object.freeze({ ...i })));
    this.blank = alphabet.blank ?? DEFAULT_BLANK;
    this.wildcard = alphabet.wildcard ?? DEFAULT_WILDCARD;
  }

  public static of (tuples: readonly InstructionTuple[], alphabet: Partial<Alphabet> = {}): Program {
    return new Program(
      tuples.map(([from, read, to, write, move]): Instruction => ({ from, read, to, write, move })),
      alphabet);
  }

  /** The first instruction for `state` that reads `symbol` or the wildcard. */
  public match (state: State, symbol: TapeSymbol): Instruction | undefined {
    return _.find(this.instructions, (instruct) =>
      instruct.from.is(state) && this.reads(instruct, symbol));
  }

  public reads (instruct: Instruction, symbol: TapeSymbol): boolean {
    return instruct.read === symbol || instruct.read === this.wildcard;
  }

  /** Every state mentioned by an instruction, in order of first appearance. */
  public get states (): State[] {
    return _.chain(this.instructions)
      .flatMap((instruct) => [instruct.from, instruct.to])
      .uniqBy((s) => s.name)
      .value();
  }

  public get alphabet (): Alphabet {
    return { blank: this.blank, wildcard: this.wildcard };
  }
}
