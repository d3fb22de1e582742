import { describe, it, before, after, afterEach, mock } from 'node:test';
import assert from 'node:assert/strict';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';

import { createFetchDownloader } from '../../src/utils/download.js';
import { exists } from '../../src/utils/fs.js';
import { makeTempDir, removeDir } from '../test-helpers.js';

const URL_UNDER_TEST = 'https://example.com/downloads/tool-installer.sh';

describe('createFetchDownloader', () => {
  let dir: string;

  before(async () => {
    dir = await makeTempDir('download');
  });

  after(async () => {
    await removeDir(dir);
  });

  afterEach(() => {
    mock.restoreAll();
  });

  it('writes the response body to the destination, creating parent directories', async () => {
    mock.method(globalThis, 'fetch', async () => new Response('#!/bin/sh\necho ok\n', { status: 200 }));
    const destination = join(dir, 'nested', 'tool-installer.sh');

    const result = await createFetchDownloader().download(URL_UNDER_TEST, destination);

    assert.deepEqual(result, { ok: true, value: destination });
    assert.equal(await readFile(destination, 'utf8'), '#!/bin/sh\necho ok\n');
  });

  it('reports a non-2xx status without writing anything', async () => {
    mock.method(globalThis, 'fetch', async () => new Response('missing', { status: 404, statusText: 'Not Found' }));
    const destination = join(dir, 'absent.sh');

    const result = await createFetchDownloader().download(URL_UNDER_TEST, destination);

    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.equal(result.error.message, `Download of ${URL_UNDER_TEST} failed: HTTP 404 Not Found`);
    }
    assert.equal(await exists(destination), false);
  });

  it('reports network errors as a failed download', async () => {
    mock.method(globalThis, 'fetch', async () => {
      throw new TypeError('fetch failed');
    });

    const result = await createFetchDownloader({ timeoutMs: 1000 }).download(URL_UNDER_TEST, join(dir, 'x.sh'));

    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.equal(result.error.message, `Download of ${URL_UNDER_TEST} failed: fetch failed`);
    }
  });

  it('streams a chunked body to disk', async () => {
    const encoder = new TextEncoder();
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(encoder.encode('part one\n'));
        controller.enqueue(encoder.encode('part two\n'));
        controller.close();
      }
    });
    mock.method(globalThis, 'fetch', async () => new Response(body, { status: 200 }));
    const destination = join(dir, 'chunked.sh');

    const result = await createFetchDownloader().download(URL_UNDER_TEST, destination);

    assert.deepEqual(result, { ok: true, value: destination });
    assert.equal(await readFile(destination, 'utf8'), 'part one\npart two\n');
  });

  it('removes the partial file when the body fails mid-transfer', async () => {
    const encoder = new TextEncoder();
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(encoder.encode('partial'));
        controller.error(new Error('connection reset'));
      }
    });
    mock.method(globalThis, 'fetch', async () => new Response(body, { status: 200 }));
    const destination = join(dir, 'broken.sh');

    const result = await createFetchDownloader().download(URL_UNDER_TEST, destination);

    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.equal(result.error.message, `Download of ${URL_UNDER_TEST} failed: connection reset`);
    }
    assert.equal(await exists(destination), false);
  });
});
