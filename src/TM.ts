'use strict';

import _ from './lodash-mixins';
import TMSpecError from './TMSpecError';
import type State from './State';
import type Tape from './Tape';
import type Program from './Program';
import type { Instruction } from './TransitionSpec';
import { formatTape } from './render';
import { StateAutomaton, MachineStatus } from "./StateAutomaton";
import type { Configuration, RunOptions, RunResult } from "./StateAutomaton";

export default class TM extends StateAutomaton {
  public readonly program: Program;
  private current: State;
  private readonly tape: Tape;
  private stepCount: number = 0;

  /**
   * Construct a Turing machine.
   * @param program  Instruction table, consulted first-match-wins.
   * @param start    The state to start in.
   * @param tape     The tape to use. The machine owns it from here on. Its
   *                 blank and wildcard must be the program's.
   */
  constructor (program: Program, start: State, tape: Tape) {
    super();

    if (!_.isEqual(tape.alphabet, program.alphabet)) {
      throw new TMSpecError('Tape and program disagree on blank or wildcard', {
        problemValue: { tape: tape.alphabet, program: program.alphabet },
      });
    }

    this.program = program;
    this.current = start;
    this.tape = tape;
  }

  public get state (): State { return this.current; }

  public get steps (): number { return this.stepCount; }

  public toString (): string {
    return this.current.name + '\n' + formatTape(this.tape);
  }

  /** The instruction the next step would apply; undefined once halted. */
  public get nextInstruction (): Instruction | undefined {
    if (this.current.isFinal) { return undefined; }
    return this.program.match(this.current, this.tape.read());
  }

  // final states halt before the program is consulted
  public get status (): MachineStatus {
    if (this.current.isFinal) { return MachineStatus.accepted; }
    if (this.nextInstruction === undefined) { return MachineStatus.stuck; }
    return MachineStatus.running;
  }

  public step (): boolean {
    let instruct = this.nextInstruction;
    if (instruct === undefined) { return false; }

    this.tape.write(instruct.write);
    this.tape.move(instruct.move);
    this.current = instruct.to;
    this.stepCount++;

    return true;
  }

  /** Run until the machine halts. Does not return if it never does. */
  public run (options: RunOptions = {}): RunResult {
    while (this.step()) {
      this.notify(options);
    }
    return this.result();
  }

  /**
   * Run at most `maxSteps` further steps. The result reports `Running` when
   * the budget ran out first.
   */
  public runFor (maxSteps: number, options: RunOptions = {}): RunResult {
    let budget = maxSteps;
    while (budget > 0 && this.step()) {
      budget--;
      this.notify(options);
    }
    return this.result();
  }

  public get configuration (): Configuration {
    return {
      state: this.current,
      tape: this.tape.clone(),
      program: this.program,
    };
  }

  public result (): RunResult {
    return {
      status: this.status,
      state: this.current,
      tape: this.tape.clone(),
      steps: this.stepCount,
    };
  }

  private notify (options: RunOptions): void {
    if (options.onStep) { options.onStep(this.configuration, this.stepCount); }
  }
}
