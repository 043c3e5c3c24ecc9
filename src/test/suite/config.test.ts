import * as assert from 'assert';
import os from 'os';
import path from 'path';
import { config, loadCredentials } from '../../utils/config.js';
import { ConfigError } from '../../utils/errors.js';

suite('Configuration', () => {
  test('loadCredentials reads the environment and trims the base URL', () => {
    assert.deepStrictEqual(
      loadCredentials({ CANVAS_BASE_URL: 'https://canvas.test//', CANVAS_TOKEN: 'test-token' }),
      { baseUrl: 'https://canvas.test', token: 'test-token' }
    );
  });

  test('loadCredentials names the missing variable', () => {
    assert.throws(
      () => loadCredentials({ CANVAS_BASE_URL: 'https://canvas.test', CANVAS_TOKEN: '' }),
      (error: unknown) => {
        assert.ok(error instanceof ConfigError);
        assert.strictEqual(error.message, 'Missing environment variable: CANVAS_TOKEN');
        assert.strictEqual(error.variable, 'CANVAS_TOKEN');
        return true;
      }
    );
  });

  test('tests write their log under a temporary data directory', () => {
    assert.strictEqual(config.paths.dataDir, process.env.CANVAS_DIGEST_DATA_DIR);
    assert.ok(config.paths.dataDir.startsWith(os.tmpdir()));
    assert.strictEqual(config.paths.logFile, path.join(config.paths.dataDir, 'canvas-digest.log'));
  });
});
