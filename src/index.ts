export { default as Tape } from './Tape';
export type { TapeCell } from './Tape';
export { default as State, state, finalState } from './State';
export { default as Program } from './Program';
export { default as TM } from './TM';
export { StateAutomaton, MachineStatus } from './StateAutomaton';
export type { Configuration, RunResult, RunOptions, StepObserver } from './StateAutomaton';
export { DEFAULT_BLANK, DEFAULT_WILDCARD, MOVES } from './TransitionSpec';
export type {
  Move, Alphabet, Instruction, InstructionTuple, TapeSymbol, ProgramSpec, TMInstructionSpec,
} from './TransitionSpec';
export { parseProgram, TMSpecError } from './parser';
export type { ParsedProgram } from './parser';
export { default as TMRuntimeError } from './TMRuntimeError';
export { loadConfig, resolveConfig } from './config';
export type { RunConfig } from './config';
export { findShadowedInstructions, checkReachable } from './parser-utils';
export type { ShadowedInstruction } from './parser-utils';
export {
  formatTape, formatVerdict, formatResult, formatExecution, formatConfiguration,
} from './render';
export { execute, runAll, report, machineFor } from './runner';
export type { Execution } from './runner';
export { default as StateGraph } from './state-diagram/StateGraph';
export type { Vertex, LayoutEdge } from './state-diagram/StateGraph';
