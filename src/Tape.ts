'use strict';

import _ from './lodash-mixins';
import TMRuntimeError from './TMRuntimeError';
import { DEFAULT_BLANK, DEFAULT_WILDCARD, MOVES } from './TransitionSpec';
import type { Alphabet, TapeSymbol } from './TransitionSpec';
import { splitToStringArray } from './parser-utils';

export interface TapeCell {
  symbol: TapeSymbol;
  isHead: boolean;
}

/**
 * An unbounded two-sided tape.
 *
 * The cells left of the head and right of the head live on two stacks whose
 * tops are the cells adjacent to the head. Moving the head pops the
 * destination off one stack and pushes the old head onto the other; popping
 * an empty stack yields a fresh blank, so every cell the head has visited
 * stays materialized.
 */
export default class Tape {
  public readonly blank: TapeSymbol;
  public readonly wildcard: TapeSymbol;

  // nearest cell last
  private readonly left: TapeSymbol[];
  private readonly right: TapeSymbol[];
  private head: TapeSymbol;

  private constructor (alphabet: Alphabet, left: TapeSymbol[], head: TapeSymbol, right: TapeSymbol[]) {
    this.blank = alphabet.blank;
    this.wildcard = alphabet.wildcard;
    this.left = left;
    this.head = head;
    this.right = right;
  }

  /**
   * Build a tape with the first symbol under the head and the rest to its
   * right. A string is split into characters; an empty input gives a tape
   * holding a single blank.
   */
  public static from (input: string | readonly TapeSymbol[] = [], alphabet: Partial<Alphabet> = {}): Tape {
    let symbols = splitToStringArray(input);
    let blank = alphabet.blank ?? DEFAULT_BLANK;
    let wildcard = alphabet.wildcard ?? DEFAULT_WILDCARD;
    let [first = blank, ...rest] = symbols;
    return new Tape({ blank, wildcard }, [], first, rest.reverse());
  }

  public get alphabet (): Alphabet {
    return { blank: this.blank, wildcard: this.wildcard };
  }

  public read (): TapeSymbol {
    return this.head;
  }

  public write (symbol: TapeSymbol): void {
    if (symbol === this.wildcard) { return; }
    this.head = symbol;
  }

  public moveLeft (): void {
    this.right.push(this.head);
    this.head = this.left.pop() ?? this.blank;
  }

  public moveRight (): void {
    this.left.push(this.head);
    this.head = this.right.pop() ?? this.blank;
  }

  public stay (): void { }

  public move (direction: string): void {
    switch (direction) {
      case 'L': this.moveLeft();  break;
      case 'R': this.moveRight(); break;
      case 'S': this.stay();      break;
      default: throw new TMRuntimeError(
        'not a valid tape movement: ' + String(direction) + ' (expected one of ' + MOVES.join(', ') + ')',
        direction);
    }
  }

  /** Number of materialized cells. */
  public get length (): number {
    return this.left.length + 1 + this.right.length;
  }

  /** Materialized cells, left to right. */
  public render (): TapeCell[] {
    let cell = (isHead: boolean) => (symbol: TapeSymbol): TapeCell => ({ symbol, isHead });
    return _.concat(
      this.left.map(cell(false)),
      [cell(true)(this.head)],
      _.reverse(this.right.slice()).map(cell(false)),
    );
  }

  /** Materialized symbols with the blank margins cut off. */
  public contents (): string {
    return this.trimmed().symbols.join('');
  }

  /**
   * Content equality: same symbols once blank margins are dropped, and the
   * head at the same place relative to them.
   */
  public equals (other: Tape): boolean {
    let mine = this.trimmed();
    let theirs = other.trimmed();
    return this.blank === other.blank
      && _.isEqual(mine.symbols, theirs.symbols)
      && mine.head === theirs.head;
  }

  public clone (): Tape {
    return new Tape(this, this.left.slice(), this.head, this.right.slice());
  }

  // head is the offset of the head from the first non-blank cell
  private trimmed (): { symbols: TapeSymbol[], head: number } {
    let cells = this.render().map((c) => c.symbol);
    let isBlank = (s: TapeSymbol) => s === this.blank;
    let start = _.findIndex(cells, _.negate(isBlank));
    if (start < 0) { return { symbols: [], head: 0 }; }
    let end = _.findLastIndex(cells, _.negate(isBlank)) + 1;
    return { symbols: cells.slice(start, end), head: this.left.length - start };
  }
}
