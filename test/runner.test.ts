import assert from 'assert';
import { execute, report, runAll } from '../src/runner';
import { MachineStatus } from '../src/StateAutomaton';
import { formatTape } from '../src/render';
import { TMSpecError } from '../src/parser';
import Program from '../src/Program';
import { state } from '../src/State';
import * as reverse from '../src/machines/reverse';
import * as anbncn from '../src/machines/anbncn';

describe('runner', function() {
  it('execute keeps the initial tape', function () {
    let { initial, result } = execute(reverse.program, reverse.start, 'ab');
    assert.strictEqual(formatTape(initial), '[a] b');
    assert.strictEqual(formatTape(result.tape), '# b a [#] #');
  });

  it('execute honours a step budget', function () {
    let S = state('S');
    let loop = Program.of([[S, '#', S, '#', 'S']]);
    let { result } = execute(loop, S, '', { maxSteps: 25 });
    assert.strictEqual(result.status, MachineStatus.running);
    assert.strictEqual(result.steps, 25);
  });

  it('report names a run stopped by its budget', function () {
    let S = state('S');
    let loop = Program.of([[S, '#', S, '#', 'S']]);
    let lines = report(runAll(loop, S, [''], { maxSteps: 3 }));
    assert.deepStrictEqual(lines, [
      '-------------',
      'Initial tape:',
      '[#]',
      'Input not accepted.',
      'Step budget exhausted in state S',
      'Final tape configuration:',
      '[#]',
    ]);
  });

  it('execute rejects a bad budget', function () {
    assert.throws(() => execute(reverse.program, reverse.start, 'ab', { maxSteps: 0 }), TMSpecError);
  });

  it('runAll runs every input on its own tape', function () {
    let executions = runAll(anbncn.program, anbncn.start, anbncn.examples);
    assert.deepStrictEqual(
      executions.map(({ result }) => result.status),
      [
        MachineStatus.accepted,
        MachineStatus.accepted,
        MachineStatus.accepted,
        MachineStatus.stuck,
        MachineStatus.stuck,
        MachineStatus.stuck,
        MachineStatus.stuck,
      ]);
  });

  it('report', function () {
    let lines = report(runAll(reverse.program, reverse.start, ['a', '']));
    assert.deepStrictEqual(lines, [
      '-------------',
      'Initial tape:',
      '[a]',
      'Input accepted.',
      'Machine halted in state end',
      'Final tape configuration:',
      '# a [#] #',
      '-------------',
      'Initial tape:',
      '[#]',
      'Input accepted.',
      'Machine halted in state end',
      'Final tape configuration:',
      '# [#] #',
    ]);
  });
});
