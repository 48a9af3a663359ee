'use strict';

import Program from '../Program';
import { state, finalState } from '../State';

/**
 * Reverses a word over {a, b} in place.
 *
 * Marks the right end with `|`, then repeatedly carries the leftmost
 * unprocessed symbol to the right marker and the rightmost one to the left
 * marker, and finally shifts the result over the leftover markers.
 */
export const states = {
  putRightMarker: state('put_right_marker'),
  rewind: state('rewind'),
  goRightA: state('go_right_a'),
  goRightB: state('go_right_b'),
  goLeftA: state('go_left_a'),
  goLeftB: state('go_left_b'),
  takeLeft: state('take_left'),
  takeRight: state('take_right'),
  clear: state('clear'),
  clearA: state('clear_a'),
  clearB: state('clear_b'),
  clearLast: state('clear_last'),
  end: finalState('end'),
};

const s = states;

export const start = s.putRightMarker;

export const program = Program.of([
  [s.putRightMarker, '#', s.rewind,         '|', 'L'],
  [s.putRightMarker, '?', s.putRightMarker, '?', 'R'],

  [s.rewind,         '#', s.takeLeft,       '#', 'R'],
  [s.rewind,         '?', s.rewind,         '?', 'L'],

  [s.takeLeft,       'a', s.goRightA,       '|', 'R'],
  [s.takeLeft,       'b', s.goRightB,       '|', 'R'],
  [s.takeLeft,       '|', s.clear,          '|', 'R'],

  [s.goRightA,       '|', s.takeRight,      'a', 'L'],
  [s.goRightB,       '|', s.takeRight,      'b', 'L'],
  [s.goRightA,       '?', s.goRightA,       '?', 'R'],
  [s.goRightB,       '?', s.goRightB,       '?', 'R'],

  [s.takeRight,      'a', s.goLeftA,        '|', 'L'],
  [s.takeRight,      'b', s.goLeftB,        '|', 'L'],
  [s.takeRight,      '|', s.clear,          '|', 'R'],

  [s.goLeftA,        '|', s.takeLeft,       'a', 'R'],
  [s.goLeftB,        '|', s.takeLeft,       'b', 'R'],
  [s.goLeftA,        '?', s.goLeftA,        '?', 'L'],
  [s.goLeftB,        '?', s.goLeftB,        '?', 'L'],

  [s.clear,          'a', s.clearA,         '|', 'L'],
  [s.clear,          'b', s.clearB,         '|', 'L'],
  [s.clear,          '|', s.clear,          '|', 'R'],
  [s.clear,          '#', s.clearLast,      '#', 'L'],
  [s.clearA,         '|', s.clear,          'a', 'R'],
  [s.clearB,         '|', s.clear,          'b', 'R'],
  [s.clearLast,      '|', s.end,            '#', 'S'],
]);

export const examples = ['abaabba', 'a', 'ab', ''];
