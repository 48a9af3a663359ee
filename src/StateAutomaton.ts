import type State from "./State";
import type Tape from "./Tape";
import type Program from "./Program";

export enum MachineStatus {
  running = 'Running',
  accepted = 'Accepted',
  stuck = 'Stuck',
}

/** A snapshot of a machine between two steps. */
export interface Configuration {
  readonly state: State;
  readonly tape: Tape;
  readonly program: Program;
}

export interface RunResult {
  readonly status: MachineStatus;
  readonly state: State;
  readonly tape: Tape;
  readonly steps: number;
}

export type StepObserver = (config: Configuration, steps: number) => void;

export interface RunOptions {
  /** Called after every applied instruction, with a copy of the tape. */
  onStep?: StepObserver;
}

export abstract class StateAutomaton {
  public abstract get state(): State;

  public abstract toString(): string;

  /**
   * Step to the next configuration according to the transition function.
   * @return true if an instruction was applied, false if the machine halted
   */
  public abstract step(): boolean;

  public abstract get status(): MachineStatus;

  public get isHalted(): boolean { return this.status !== MachineStatus.running; }
}
