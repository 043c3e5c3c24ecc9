import * as assert from 'assert';
import * as sinon from 'sinon';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { InvalidArgumentError } from 'commander';
import { FetchCommandOptions, parseFromOption, parseUntilOption, runFetch } from '../../cli/commands/fetch.js';
import { CanvasApiError } from '../../utils/errors.js';
import { CanvasAssignment, CanvasCourse, CanvasCredentials, CourseSource } from '../../types/index.js';

const ENV = { CANVAS_BASE_URL: 'https://canvas.test/', CANVAS_TOKEN: 'test-token' };

function stubReader() {
  return {
    getCourse: sinon.stub<[number], Promise<CanvasCourse>>(),
    listCoursesForTerm: sinon.stub<[string, number, CourseSource], Promise<CanvasCourse[]>>(),
    listAssignments: sinon.stub<[number], Promise<CanvasAssignment[]>>(),
  };
}

suite('Fetch command', () => {
  let reader: ReturnType<typeof stubReader>;
  let createReader: sinon.SinonStub<[CanvasCredentials], ReturnType<typeof stubReader>>;
  let log: sinon.SinonStub;
  let error: sinon.SinonStub;
  let options: FetchCommandOptions;

  setup(() => {
    reader = stubReader();
    createReader = sinon.stub<[CanvasCredentials], ReturnType<typeof stubReader>>().returns(reader);
    log = sinon.stub(console, 'log');
    error = sinon.stub(console, 'error');
    options = { courses: [1], max: 2, source: 'courses', title: 'Digest', format: 'text' };
  });

  teardown(() => {
    sinon.restore();
  });

  test('exits with 2 when a credential is missing', async () => {
    const code = await runFetch(options, { env: { CANVAS_BASE_URL: 'https://canvas.test' }, createReader });

    assert.strictEqual(code, 2);
    assert.deepStrictEqual(error.firstCall.args, ['Missing environment variable: CANVAS_TOKEN']);
    assert.strictEqual(createReader.callCount, 0);
    assert.strictEqual(log.callCount, 0);
  });

  test('exits with 1 when no course can be fetched', async () => {
    reader.getCourse.rejects(new CanvasApiError(404, '/api/v1/courses/1', ''));

    const code = await runFetch(options, { env: ENV, createReader });

    assert.strictEqual(code, 1);
    assert.deepStrictEqual(
      error.getCalls().map((call) => call.args[0]),
      ['Failed to fetch course 1: 404', 'No courses fetched. Check IDs or permissions.']
    );
    assert.strictEqual(log.callCount, 0);
  });

  test('prints the digest to stdout using the trimmed base URL', async () => {
    reader.getCourse.resolves({ id: 1, name: 'Statistics' });
    reader.listAssignments.resolves([{ name: 'HW 1', due_at: '2025-03-03T06:59:00Z' }]);

    const code = await runFetch(options, { env: ENV, createReader });

    assert.strictEqual(code, 0);
    assert.deepStrictEqual(createReader.firstCall.args, [{ baseUrl: 'https://canvas.test', token: 'test-token' }]);
    assert.deepStrictEqual(log.firstCall.args, [
      ['Digest', '', 'Course: Statistics (ID: 1)', '- "HW 1" | Due: 2025-03-03', ''].join('\n'),
    ]);
  });

  test('writes the digest to --out and reports the file', async () => {
    const out = path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'canvas-digest-out-')), 'digest.md');
    reader.getCourse.resolves({ id: 1, name: 'Statistics' });
    reader.listAssignments.resolves([{ name: 'HW 1', due_at: '2025-03-03T06:59:00Z' }]);

    const code = await runFetch({ ...options, format: 'md', out }, { env: ENV, createReader });

    assert.strictEqual(code, 0);
    assert.strictEqual(
      fs.readFileSync(out, 'utf8'),
      ['# Digest', '', '## Course: Statistics (ID: 1)', '| Assignment | Due |', '|---|---|', '| HW 1 | 2025-03-03 |', ''].join(
        '\n'
      )
    );
    assert.deepStrictEqual(log.firstCall.args, [`Wrote ${out}`]);
  });

  test('rejects an unreadable --from/--until as an invalid argument', () => {
    assert.throws(
      () => parseFromOption('banana'),
      (thrown: unknown) => thrown instanceof InvalidArgumentError && thrown.message === 'Could not understand date "banana"'
    );
    assert.strictEqual(parseUntilOption('2025-03-10').getTime(), new Date(2025, 2, 10, 23, 59, 59, 999).getTime());
  });
});
