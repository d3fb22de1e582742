import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { ensureEnvironment, environmentExists } from '../../src/core/environment/environment-manager.js';
import { FakeRunner } from '../test-helpers.js';

const ROOT = '/opt/conda';
const CONDA = `${ROOT}/bin/conda`;
const plan = { environmentManagerRoot: ROOT };

function envList(...prefixes: string[]): { stdout: string } {
  return { stdout: JSON.stringify({ envs: [ROOT, ...prefixes] }) };
}

describe('environmentExists', () => {
  it('matches the listed prefix for the environment name', async () => {
    const runner = new FakeRunner().on(`${CONDA} env list --json`, envList(`${ROOT}/envs/app/`));
    assert.deepEqual(await environmentExists(plan, 'app', { runner, platform: 'linux' }), { ok: true, value: true });
    assert.deepEqual(await environmentExists(plan, 'other', { runner, platform: 'linux' }), { ok: true, value: false });
  });

  it('compares Windows prefixes case-insensitively', async () => {
    const winRoot = 'C:\\Miniconda3';
    const runner = new FakeRunner().on(
      call => call.args.join(' ') === 'env list --json',
      { stdout: JSON.stringify({ envs: ['c:\\miniconda3\\envs\\APP'] }) }
    );
    const result = await environmentExists({ environmentManagerRoot: winRoot }, 'app', { runner, platform: 'win32' });
    assert.deepEqual(result, { ok: true, value: true });
  });

  it('reports unparseable listing output as a failure', async () => {
    const runner = new FakeRunner().on(`${CONDA} env list --json`, { stdout: 'not json' });
    const result = await environmentExists(plan, 'app', { runner, platform: 'linux' });
    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.equal(result.error.message, 'conda env list exited with code 1: unexpected output (expected JSON with an "envs" list)');
    }
  });
});

describe('ensureEnvironment', () => {
  it('creates the environment when none exists', async () => {
    const lines: string[] = [];
    const runner = new FakeRunner()
      .on(`${CONDA} env list --json`, envList())
      .on(`${CONDA} create`);

    const result = await ensureEnvironment(plan, 'app', 'python=3.10', { runner, platform: 'linux', report: line => lines.push(line) });

    assert.deepEqual(result, { exitCode: 0, message: "Created environment 'app' (python=3.10)" });
    assert.deepEqual(runner.lines(), [
      `${CONDA} env list --json`,
      `${CONDA} create -y -n app python=3.10`
    ]);
    assert.deepEqual(lines, ["Creating environment 'app' (python=3.10)"]);
  });

  it('removes an existing environment before creating it again', async () => {
    const runner = new FakeRunner()
      .on(`${CONDA} env list --json`, envList(`${ROOT}/envs/app`))
      .on(`${CONDA} remove`)
      .on(`${CONDA} create`);

    const result = await ensureEnvironment(plan, 'app', 'python=3.11 pip', { runner, platform: 'linux' });

    assert.equal(result.exitCode, 0);
    assert.deepEqual(runner.lines(), [
      `${CONDA} env list --json`,
      `${CONDA} remove -y -n app --all`,
      `${CONDA} create -y -n app python=3.11 pip`
    ]);
  });

  it('never attempts creation when removal fails', async () => {
    const runner = new FakeRunner()
      .on(`${CONDA} env list --json`, envList(`${ROOT}/envs/app`))
      .on(`${CONDA} remove`, { exitCode: 2, stderr: 'EnvironmentLocationNotFound\n' })
      .on(`${CONDA} create`);

    const result = await ensureEnvironment(plan, 'app', 'python=3.10', { runner, platform: 'linux' });

    assert.deepEqual(result, { exitCode: 2, message: 'conda remove exited with code 2: EnvironmentLocationNotFound' });
    assert.deepEqual(runner.linesMatching(' create '), []);
  });

  it('fails with the create exit code', async () => {
    const runner = new FakeRunner()
      .on(`${CONDA} env list --json`, envList())
      .on(`${CONDA} create`, { exitCode: 1, stderr: 'PackagesNotFoundError: python=9.9' });

    const result = await ensureEnvironment(plan, 'app', 'python=9.9', { runner, platform: 'linux' });

    assert.deepEqual(result, { exitCode: 1, message: 'conda create exited with code 1: PackagesNotFoundError: python=9.9' });
  });

  it('fails before touching anything when the listing fails', async () => {
    const runner = new FakeRunner().on(`${CONDA} env list --json`, { exitCode: 5, stderr: 'CondaError' });

    const result = await ensureEnvironment(plan, 'app', 'python=3.10', { runner, platform: 'linux' });

    assert.deepEqual(result, { exitCode: 5, message: 'conda env list exited with code 5: CondaError' });
    assert.equal(runner.calls.length, 1);
  });
});
