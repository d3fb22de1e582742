import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { mkdir, readdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import {
  DEFAULT_ARTIFACT_TABLE,
  artifactTableFromConfig,
  listStagedCandidates,
  selectArtifactName,
  selectInstructionSet,
  stageArtifact
} from '../../src/core/artifact/artifact-selector.js';
import { getDefaultConfig } from '../../src/constants/index.js';
import { makeTempDir, removeDir } from '../test-helpers.js';

const gpu = { useGpuArtifact: true };
const cpu = { useGpuArtifact: false };

describe('selectArtifactName', () => {
  it('prefers AVX when both AVX and SSE4 are present', () => {
    const flags = { hasAVX: true, hasSSE4: true };
    assert.equal(selectInstructionSet(flags), 'avx');
    assert.equal(selectArtifactName(flags, gpu), 'dlib_gpu_avx.whl');
  });

  it('falls back to SSE4, then to no instruction set', () => {
    assert.equal(selectArtifactName({ hasAVX: false, hasSSE4: true }, cpu), 'dlib_sse4.whl');
    assert.equal(selectArtifactName({ hasAVX: false, hasSSE4: false }, cpu), 'dlib_none.whl');
    assert.equal(selectArtifactName({ hasAVX: false, hasSSE4: false }, gpu), 'dlib_gpu_none.whl');
  });

  it('omits the GPU suffix for the CPU build', () => {
    assert.equal(selectArtifactName({ hasAVX: true, hasSSE4: false }, cpu), 'dlib_avx.whl');
  });

  it('is deterministic for the same inputs', () => {
    const flags = { hasAVX: false, hasSSE4: true };
    assert.equal(selectArtifactName(flags, gpu), selectArtifactName(flags, gpu));
  });

  it('uses a configured naming table', () => {
    const config = getDefaultConfig('linux', 'x64').artifact;
    const table = artifactTableFromConfig({
      ...config,
      prefix: 'engine',
      extension: 'tar.gz',
      suffixes: { ...config.suffixes, gpu: '-cuda', avx: '-avx2' }
    });
    assert.equal(selectArtifactName({ hasAVX: true, hasSSE4: true }, gpu, table), 'engine-cuda-avx2.tar.gz');
  });
});

describe('stageArtifact', () => {
  let dir: string;

  before(async () => {
    dir = await makeTempDir('stage');
  });

  after(async () => {
    await removeDir(dir);
  });

  it('renames the generic artifact to its selected name', async () => {
    const staging = join(dir, 'rename');
    await mkdir(staging, { recursive: true });
    await writeFile(join(staging, 'dlib.whl'), 'wheel');

    const result = await stageArtifact(staging, 'dlib.whl', 'dlib_gpu_avx.whl');
    assert.deepEqual(result, { ok: true, value: join(staging, 'dlib_gpu_avx.whl') });
    assert.deepEqual(await readdir(staging), ['dlib_gpu_avx.whl']);
  });

  it('accepts an artifact already staged under its final name', async () => {
    const staging = join(dir, 'rename');
    const result = await stageArtifact(staging, 'dlib.whl', 'dlib_gpu_avx.whl');
    assert.deepEqual(result, { ok: true, value: join(staging, 'dlib_gpu_avx.whl') });
  });

  it('fails naming the missing generic file', async () => {
    const result = await stageArtifact(join(dir, 'missing'), 'dlib.whl', 'dlib_none.whl');
    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.equal(result.error.message, `File system error: Staged artifact not found: ${join(dir, 'missing', 'dlib.whl')}`);
    }
  });
});

describe('listStagedCandidates', () => {
  let dir: string;

  before(async () => {
    dir = await makeTempDir('candidates');
    await writeFile(join(dir, 'dlib_sse4.whl'), '');
    await writeFile(join(dir, 'dlib.whl'), '');
    await writeFile(join(dir, 'notes.txt'), '');
    await writeFile(join(dir, '.DS_Store'), '');
  });

  after(async () => {
    await removeDir(dir);
  });

  it('lists matching artifact files sorted by name', async () => {
    assert.deepEqual(await listStagedCandidates(dir, DEFAULT_ARTIFACT_TABLE), ['dlib.whl', 'dlib_sse4.whl']);
  });

  it('returns an empty list for a missing staging directory', async () => {
    assert.deepEqual(await listStagedCandidates(join(dir, 'absent')), []);
  });
});
