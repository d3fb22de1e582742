import { createWriteStream } from 'fs';
import { rm } from 'fs/promises';
import { dirname } from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';

import { DownloadError } from './errors.js';
import { ensureDir } from './fs.js';
import { logger } from './logger.js';
import { err, ok, type Result } from './result.js';

export interface DownloadOptions {
  /** Abort the transfer after this many milliseconds. Unset means no limit. */
  timeoutMs?: number;
}

export interface Downloader {
  download(url: string, destination: string): Promise<Result<string, DownloadError>>;
}

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Fetch-based downloader. Any network error or non-2xx status is reported as
 * a DownloadError result; nothing is left on disk in that case. The body is
 * streamed to the destination file.
 */
export function createFetchDownloader(options: DownloadOptions = {}): Downloader {
  return {
    async download(url: string, destination: string): Promise<Result<string, DownloadError>> {
      logger.debug(`Downloading ${url} -> ${destination}`);

      let response: Response;
      try {
        response = await fetch(url, {
          redirect: 'follow',
          signal: options.timeoutMs ? AbortSignal.timeout(options.timeoutMs) : undefined
        });
      } catch (error) {
        return err(new DownloadError(url, reasonOf(error)));
      }
      if (!response.ok) {
        return err(new DownloadError(url, `HTTP ${response.status} ${response.statusText}`.trim()));
      }
      if (!response.body) {
        return err(new DownloadError(url, 'empty response body'));
      }

      await ensureDir(dirname(destination));
      try {
        await pipeline(Readable.fromWeb(response.body), createWriteStream(destination));
      } catch (error) {
        await rm(destination, { force: true });
        return err(new DownloadError(url, reasonOf(error)));
      }
      logger.debug(`Downloaded ${url} to ${destination}`);
      return ok(destination);
    }
  };
}
