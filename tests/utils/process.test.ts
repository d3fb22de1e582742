import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import {
  OUTPUT_LIMIT_EXIT_CODE,
  SPAWN_FAILURE_EXIT_CODE,
  TIMEOUT_EXIT_CODE,
  createProcessRunner,
  exitCodeForSignal,
  formatCommand
} from '../../src/utils/process.js';

const NODE = process.execPath;
const POSIX_ONLY = { skip: process.platform === 'win32' };

describe('createProcessRunner', () => {
  const runner = createProcessRunner();

  it('captures stdout of a successful program', async () => {
    const result = await runner.run(NODE, ['-e', "process.stdout.write('hello')"]);

    assert.deepEqual(result, { exitCode: 0, stdout: 'hello', stderr: '' });
  });

  it('resolves with the exit code and stderr of a failing program', async () => {
    const result = await runner.run(NODE, ['-e', "process.stderr.write('boom'); process.exit(3)"]);

    assert.equal(result.exitCode, 3);
    assert.equal(result.stderr, 'boom');
  });

  it('reports 127 when the program cannot be started', async () => {
    const result = await runner.run('envstrap-no-such-program', ['--version']);

    assert.equal(result.exitCode, SPAWN_FAILURE_EXIT_CODE);
    assert.match(result.stderr, /ENOENT/);
  });

  it('kills a program that outlives the timeout and reports 124', async () => {
    const result = await runner.run(NODE, ['-e', 'setTimeout(() => {}, 10000)'], { timeoutMs: 200 });

    assert.equal(result.exitCode, TIMEOUT_EXIT_CODE);
  });

  it('reports a program killed by a signal as 128 plus the signal number', POSIX_ONLY, async () => {
    const result = await runner.run('sh', ['-c', 'kill -INT $$']);

    assert.equal(result.exitCode, 130);
  });

  it('reports SIGTERM from outside the runner as 143, not as a timeout', POSIX_ONLY, async () => {
    const result = await runner.run(NODE, ['-e', "process.kill(process.pid, 'SIGTERM')"]);

    assert.equal(result.exitCode, 143);
  });

  it('reports output over the buffer limit as a failure, not a timeout', async () => {
    const result = await runner.run(NODE, ['-e', "process.stdout.write('x'.repeat(4096))"], { maxBufferBytes: 1024 });

    assert.equal(result.exitCode, OUTPUT_LIMIT_EXIT_CODE);
    assert.match(result.stderr, /maxBuffer length exceeded/);
  });
});

describe('exitCodeForSignal', () => {
  it('maps signal names to shell exit codes', POSIX_ONLY, () => {
    assert.equal(exitCodeForSignal('SIGINT'), 130);
    assert.equal(exitCodeForSignal('SIGKILL'), 137);
    assert.equal(exitCodeForSignal('SIGTERM'), 143);
  });
});

describe('formatCommand', () => {
  it('quotes arguments containing whitespace', () => {
    assert.equal(formatCommand('git', ['clone', '/opt/my apps/src']), 'git clone "/opt/my apps/src"');
  });
});
