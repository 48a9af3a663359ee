'use strict';

import type Tape from './Tape';
import { MachineStatus } from './StateAutomaton';
import type { Configuration, RunResult } from './StateAutomaton';

export const SEPARATOR = '-------------';

/** `x y [h] z`: cells separated by spaces, the head cell bracketed. */
export function formatTape (tape: Tape): string {
  return tape.render()
    .map(({ symbol, isHead }) => isHead ? '[' + symbol + ']' : symbol)
    .join(' ');
}

export function formatVerdict (result: RunResult): string {
  return result.state.isFinal ? 'Input accepted.' : 'Input not accepted.';
}

// a Running result stopped on its step budget, not on a halt
export function formatStop (result: RunResult): string {
  return result.status === MachineStatus.running
    ? 'Step budget exhausted in state ' + result.state.name
    : 'Machine halted in state ' + result.state.name;
}

export function formatResult (result: RunResult): string[] {
  return [
    formatVerdict(result),
    formatStop(result),
    'Final tape configuration:',
    formatTape(result.tape),
  ];
}

export function formatExecution (initial: Tape, result: RunResult): string[] {
  return [
    SEPARATOR,
    'Initial tape:',
    formatTape(initial),
  ].concat(formatResult(result));
}

export function formatConfiguration (config: Configuration): string {
  return config.state.name + ': ' + formatTape(config.tape);
}
