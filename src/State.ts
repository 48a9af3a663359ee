'use strict';

/**
 * A machine state. States are compared by name, so two `State` values with
 * the same name stand for the same state of a program.
 */
export default class State {
  public readonly name: string;
  public readonly isFinal: boolean;

  constructor (name: string, isFinal: boolean = false) {
    this.name = name;
    this.isFinal = isFinal;
    Object.freeze(this);
  }

  public is (other: State): boolean {
    return this.name === other.name;
  }

  public toString (): string {
    return this.name;
  }
}

export function state (name: string): State {
  return new State(name);
}

export function finalState (name: string): State {
  return new State(name, true);
}
