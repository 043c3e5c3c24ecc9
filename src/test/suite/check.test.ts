import * as assert from 'assert';
import * as sinon from 'sinon';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { runCheck } from '../../cli/commands/check.js';

suite('Check command', () => {
  let dir: string;
  let log: sinon.SinonStub;
  let error: sinon.SinonStub;

  setup(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'canvas-digest-check-'));
    log = sinon.stub(console, 'log');
    error = sinon.stub(console, 'error');
  });

  teardown(() => {
    sinon.restore();
  });

  function writeDigest(lines: string[]): string {
    const file = path.join(dir, 'digest.md');
    fs.writeFileSync(file, lines.join('\n'), 'utf8');
    return file;
  }

  test('prints one line per problem and exits with 1', async () => {
    const file = writeDigest([
      '| Stray | 2025-01-01 |',
      '## Course: Ops (ID: 7)',
      '| Lab 1 | 2025-03-10 |',
      '| Lab 1 | 2025-02-30 |',
    ]);

    const code = await runCheck(file);

    assert.strictEqual(code, 1);
    assert.deepStrictEqual(
      log.getCalls().map((call) => call.args[0]),
      [
        'document: line 1: Table row appears before any course heading',
        '7: line 4: Duplicate assignment "Lab 1"',
        '7: line 4: "2025-02-30" is neither a YYYY-MM-DD date nor "No due date"',
        `\n3 problem(s) in ${file}`,
      ]
    );
  });

  test('summarises a clean digest and exits with 0', async () => {
    const file = writeDigest([
      '# Digest',
      '## Course: Ops (ID: 7)',
      '| Assignment | Due |',
      '|---|---|',
      '| Lab 1 | 2025-03-10 |',
      '| Lab 2 | No due date |',
    ]);

    const code = await runCheck(file);

    assert.strictEqual(code, 0);
    assert.deepStrictEqual(log.firstCall.args, [`${file}: 1 courses, 2 assignments, no problems found`]);
  });

  test('exits with 1 when the file cannot be read', async () => {
    const file = path.join(dir, 'missing.md');

    const code = await runCheck(file);

    assert.strictEqual(code, 1);
    assert.deepStrictEqual(error.firstCall.args, [`Could not read ${file}`]);
  });
});
