import assert from 'assert';
import _ from 'lodash';
import { parseProgram, TMSpecError } from '../src/parser';
import { machineFor } from '../src/runner';
import { MachineStatus } from '../src/StateAutomaton';

describe('Parser', function() {
  let flip = {
    start: 'scan',
    finalStates: ['done'],
    instructions: [
      { from: 'scan', read: 'a', to: 'scan', write: 'b', move: 'R' },
      { from: 'scan', read: '#', to: 'done', write: '#', move: 'S' },
    ],
  };

  function validationErrors (fn: () => unknown): string[] {
    try {
      fn();
    } catch (e) {
      assert.ok(e instanceof TMSpecError);
      return e.details.validationErrors || [];
    }
    assert.fail('expected a TMSpecError');
  }

  describe('parseProgram', function() {
    it('builds states and instructions', function () {
      let { program, start } = parseProgram(flip);
      assert.strictEqual(start.name, 'scan');
      assert.strictEqual(start.isFinal, false);
      assert.strictEqual(program.instructions.length, 2);
      assert.strictEqual(program.instructions[1].to.name, 'done');
      assert.strictEqual(program.instructions[1].to.isFinal, true);
      assert.deepStrictEqual(program.alphabet, { blank: '#', wildcard: '?' });
    });

    it('runs', function () {
      let { program, start } = parseProgram(flip);
      let result = machineFor(program, start, 'aa').run();
      assert.strictEqual(result.status, MachineStatus.accepted);
      assert.strictEqual(result.tape.contents(), 'bb');
    });

    it('a single final state name', function () {
      let { program } = parseProgram({ ...flip, finalStates: 'done' });
      assert.strictEqual(program.instructions[1].to.isFinal, true);
    });

    it('no final states', function () {
      let { program, start } = parseProgram(_.omit(flip, 'finalStates'));
      let result = machineFor(program, start, 'a').run();
      assert.strictEqual(result.status, MachineStatus.stuck);
      assert.strictEqual(result.state.name, 'done');
    });

    it('custom blank and wildcard', function () {
      let { program, start } = parseProgram({
        start: 'q',
        finalStates: ['h'],
        blank: '_',
        wildcard: '*',
        instructions: [
          { from: 'q', read: '_', to: 'h', write: '*', move: 'L' },
          { from: 'q', read: '*', to: 'q', write: '*', move: 'R' },
        ],
      });
      let result = machineFor(program, start, '?').run();
      assert.strictEqual(result.status, MachineStatus.accepted);
      assert.strictEqual(result.tape.blank, '_');
      assert.strictEqual(result.tape.contents(), '?');
    });

    it('illegal move', function () {
      let errors = validationErrors(() => parseProgram({
        ...flip,
        instructions: [{ from: 'scan', read: 'a', to: 'scan', write: 'b', move: 'X' }],
      }));
      assert.deepStrictEqual(errors, ['instructions[0].move must be one of ["L","R","S"]']);
    });

    it('multi-character symbol', function () {
      let errors = validationErrors(() => parseProgram({
        ...flip,
        instructions: [{ from: 'scan', read: 'ab', to: 'scan', write: 'b', move: 'R' }],
      }));
      assert.deepStrictEqual(errors, ['instructions[0].read must be a single character']);
    });

    it('missing start state', function () {
      let errors = validationErrors(() => parseProgram(_.omit(flip, 'start')));
      assert.deepStrictEqual(errors, ['start is a required field']);
    });

    it('reports the reason', function () {
      assert.throws(() => parseProgram(null), (e: unknown) =>
        e instanceof TMSpecError && e.reason === 'Validation Error' && e.name === 'TMSpecError');
    });

    it('does not check what the program means', function () {
      // unreachable state, wildcard written from a specific read
      let { program } = parseProgram({
        start: 'a',
        instructions: [
          { from: 'a', read: 'x', to: 'b', write: '?', move: 'R' },
          { from: 'z', read: 'x', to: 'a', write: 'x', move: 'L' },
        ],
      });
      assert.strictEqual(program.instructions.length, 2);
    });
  });

  describe('TMSpecError', function() {
    it('lists validation errors in its message', function () {
      let e = new TMSpecError('Validation Error', { validationErrors: ['a is wrong', 'b is wrong'] });
      assert.strictEqual(e.message, 'Validation Error\n  - a is wrong\n  - b is wrong');
      assert.ok(e instanceof Error);
    });

    it('shows the problem value', function () {
      let e = new TMSpecError('Illegal move', { problemValue: { move: 'X' } });
      assert.strictEqual(e.message, 'Illegal move: {"move":"X"}');
      assert.deepStrictEqual(e.details, { problemValue: { move: 'X' } });
    });
  });
});
