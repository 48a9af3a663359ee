import assert from 'assert';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { stripIndent } from 'common-tags';
import { demos, main } from '../src/cli';

describe('cli', function() {
  it('knows both reference machines', function () {
    assert.deepStrictEqual(Object.keys(demos), ['reverse', 'anbncn']);
    assert.strictEqual(demos.reverse.start.name, 'put_right_marker');
    assert.deepStrictEqual(demos.anbncn.examples.length, 7);
  });

  it('rejects an unknown machine', function () {
    assert.strictEqual(main(['nope']), 2);
  });

  it('needs a file after --config', function () {
    assert.strictEqual(main(['reverse', '--config']), 2);
  });

  describe('--config', function() {
    let dir: string;

    before(function () {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tape-machine-'));
    });

    after(function () {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('reads run options from a YAML file', function () {
      let file = path.join(dir, 'run.yml');
      fs.writeFileSync(file, stripIndent`
        max steps: 5
        trace: false
      `);
      assert.strictEqual(main(['anbncn', 'abc', '--config', file]), 0);
    });

    it('a missing file is a usage error', function () {
      assert.strictEqual(main(['reverse', '--config', path.join(dir, 'absent.yml')]), 2);
    });

    it('an invalid file is a usage error', function () {
      let file = path.join(dir, 'bad.yml');
      fs.writeFileSync(file, 'max steps: -1');
      assert.strictEqual(main(['reverse', '--config', file]), 2);
    });
  });

  it('runs a machine on given inputs', function () {
    assert.strictEqual(main(['anbncn', 'abc', '--graph']), 0);
  });
});
