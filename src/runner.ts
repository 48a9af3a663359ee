'use strict';

import _ from './lodash-mixins';
import type State from './State';
import Tape from './Tape';
import type Program from './Program';
import TM from './TM';
import { resolveConfig } from './config';
import type { RunConfig } from './config';
import type { RunOptions, RunResult } from './StateAutomaton';
import { formatConfiguration, formatExecution } from './render';
import type { TapeSymbol } from './TransitionSpec';

export interface Execution {
  initial: Tape;
  result: RunResult;
}

export function machineFor (program: Program, start: State, input: string | readonly TapeSymbol[]): TM {
  return new TM(program, start, Tape.from(input, program.alphabet));
}

/**
 * Run one machine to completion, or for at most `config.maxSteps` steps.
 * With `config.trace` every configuration is logged as it is reached.
 */
export function execute (
  program: Program,
  start: State,
  input: string | readonly TapeSymbol[],
  config: Partial<RunConfig> = {}): Execution
{
  let { maxSteps, trace } = resolveConfig(config);
  let tm = machineFor(program, start, input);
  let initial = tm.configuration.tape;

  let options: RunOptions = trace
    ? { onStep: (c, steps) => console.log('#' + steps + ' ' + formatConfiguration(c)) }
    : {};
  let result = _.isNil(maxSteps) ? tm.run(options) : tm.runFor(maxSteps, options);

  return { initial, result };
}

/** One fresh machine per input; they share nothing but the program. */
export function runAll (
  program: Program,
  start: State,
  inputs: ReadonlyArray<string | readonly TapeSymbol[]>,
  config: Partial<RunConfig> = {}): Execution[]
{
  return inputs.map((input) => execute(program, start, input, config));
}

export function report (executions: Execution[]): string[] {
  return _.flatMap(executions, ({ initial, result }) => formatExecution(initial, result));
}
