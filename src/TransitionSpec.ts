import * as yup from "yup";
import type State from "./State";
import { toStringArray } from "./parser-utils";

/** The implicit background of every cell the head has never visited. */
export const DEFAULT_BLANK = '#';

/** Matches any symbol when read; leaves the cell unchanged when written. */
export const DEFAULT_WILDCARD = '?';

export type TapeSymbol = string;

/** Left, Right, Stay. */
export const MOVES = ['L', 'R', 'S'] as const;
export type Move = typeof MOVES[number];

export interface Alphabet {
  blank: TapeSymbol;
  wildcard: TapeSymbol;
}

export interface Instruction {
  readonly from: State;
  readonly read: TapeSymbol;
  readonly to: State;
  readonly write: TapeSymbol;
  readonly move: Move;
}

/** (from, read, to, write, move), in the order instructions are written down. */
export type InstructionTuple = readonly [State, TapeSymbol, State, TapeSymbol, Move];

export let SymbolSchema = yup
  .string()
  .length(1, '${path} must be a single character');

export let TMInstructionSchema = yup.object({
  from: yup.string().required(),
  read: SymbolSchema.required(),
  to: yup.string().required(),
  write: SymbolSchema.required(),
  move: yup
    .mixed<Move>()
    .oneOf(MOVES, '${path} must be one of ' + JSON.stringify(MOVES))
    .required(),
});

export type TMInstructionSpec = yup.InferType<typeof TMInstructionSchema>;

export let ProgramSpecSchema = yup.object({
  start: yup.string().required(),
  finalStates: yup
    .array()
    .of(yup.string().required())
    // a single state name is accepted too
    .transform((value, originalValue) => toStringArray(originalValue))
    .default([]),
  blank: SymbolSchema.default(DEFAULT_BLANK),
  wildcard: SymbolSchema.default(DEFAULT_WILDCARD),
  instructions: yup.array().of(TMInstructionSchema).required(),
});

export type ProgramSpec = yup.InferType<typeof ProgramSpecSchema>;
