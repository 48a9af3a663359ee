'use strict';

import Program from '../Program';
import { state, finalState } from '../State';

// Accepts { a^n b^n c^n : n >= 0 } by crossing off one a, one b and one c
// per pass.
export const states = {
  checkA: state('check_a'),
  checkB: state('check_b'),
  checkC: state('check_c'),
  findEnd: state('find_end'),
  rewind: state('rewind'),
  accept: finalState('accept'),
  fail: state('fail'),
};

const s = states;

export const start = s.checkA;

export const program = Program.of([
  [s.checkA,  'x', s.checkA,  'x', 'R'],
  [s.checkA,  'a', s.checkB,  'x', 'R'],
  [s.checkA,  '#', s.accept,  '#', 'S'],
  [s.checkB,  'b', s.checkC,  'x', 'R'],
  [s.checkB,  '#', s.fail,    '#', 'S'],
  [s.checkB,  '?', s.checkB,  '?', 'R'],
  [s.checkC,  'c', s.findEnd, 'x', 'R'],
  [s.checkC,  '#', s.fail,    '#', 'S'],
  [s.checkC,  '?', s.checkC,  '?', 'R'],
  [s.findEnd, 'c', s.findEnd, 'c', 'R'],
  [s.findEnd, '#', s.rewind,  '#', 'L'],
  [s.rewind,  '#', s.checkA,  '#', 'R'],
  [s.rewind,  '?', s.rewind,  '?', 'L'],
]);

export const examples = ['aaabbbccc', 'abc', '', 'aabcc', 'aabbccc', 'aabbc', 'abcabc'];
