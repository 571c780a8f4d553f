import { copyFile, mkdir, open, readdir, rename, rm, stat } from 'node:fs/promises';
import { join } from 'node:path';
import type { AcquisitionConfig } from '../config.js';
import { classifyFailure, type FailureKind } from '../core/errors.js';
import { describeError, Logger } from '../core/logger.js';
import { defaultSleep, type Sleeper } from '../core/pacing.js';
import type { FetchSession } from '../session/fetch-session.js';
import type { SessionCookie } from '../session/page-driver.js';
import { partialPathFor } from './filename.js';
import { isPlausiblePdf, verifyPdfFile } from './pdf-check.js';
import type { AcquisitionTarget } from './types.js';

/** Browser download artifacts that mean a transfer is still being written. */
export const IN_PROGRESS_ARTIFACT = /\.(crdownload|part|tmp)$/i;

const HEAD_BYTES = 4;

export type TransferSettings = Pick<
  AcquisitionConfig,
  'minPdfBytes' | 'httpTimeoutMs' | 'downloadTimeoutMs' | 'downloadPollMs' | 'browserTransfer'
> & { userAgent: string };

export type TransferOutcome =
  | { ok: true; filepath: string; via: 'http' | 'browser'; message: string }
  | { ok: false; kind: FailureKind; message: string };

export interface CandidateRequestOptions {
  referer?: string;
  cookies?: SessionCookie[];
}

export interface DownloadPollOptions {
  timeoutMs: number;
  pollMs: number;
  /** Names already present before the transfer started. */
  ignore?: ReadonlySet<string>;
  sleep?: Sleeper;
  now?: () => number;
}

const statusKind = (status: number): FailureKind => {
  if (status === 404 || status === 410) {
    return 'not_found';
  }
  if (status === 401 || status === 403 || status === 429) {
    return 'blocked';
  }
  return 'transient_network';
};

/**
 * Polls `directory` until no in-progress artifact remains and the newest finished file keeps the
 * same non-zero size across two consecutive samples. Resolves to null when `timeoutMs` elapses.
 */
export const awaitBrowserDownload = async (
  directory: string,
  { timeoutMs, pollMs, ignore = new Set<string>(), sleep = defaultSleep, now = Date.now }: DownloadPollOptions
): Promise<string | null> => {
  const deadline = now() + timeoutMs;
  let previous: { path: string; size: number } | null = null;

  while (now() <= deadline) {
    const entries = await readdir(directory);
    const inProgress = entries.some((name) => IN_PROGRESS_ARTIFACT.test(name));
    const finished = entries.filter((name) => !IN_PROGRESS_ARTIFACT.test(name) && !ignore.has(name));

    if (inProgress || finished.length === 0) {
      previous = null;
    } else {
      const sampled = await Promise.all(
        finished.map(async (name) => {
          const path = join(directory, name);
          const info = await stat(path);
          return { path, size: info.size, mtimeMs: info.mtimeMs };
        })
      );
      const newest = sampled.reduce((best, item) => (item.mtimeMs > best.mtimeMs ? item : best));

      if (previous && previous.path === newest.path && previous.size === newest.size && newest.size > 0) {
        return newest.path;
      }
      previous = { path: newest.path, size: newest.size };
    }

    await sleep(pollMs);
  }

  return null;
};

/**
 * Retrieves one candidate URL into the request's target. The payload is staged beside the target
 * and renamed into place only after it passes the PDF signature check.
 */
export class CandidateFetcher {
  constructor(
    private readonly settings: TransferSettings,
    private readonly logger: Logger,
    private readonly fetchImpl: typeof fetch = fetch,
    private readonly sleep: Sleeper = defaultSleep
  ) {}

  async retrieve(
    url: string,
    target: AcquisitionTarget,
    session: FetchSession,
    options: CandidateRequestOptions = {}
  ): Promise<TransferOutcome> {
    const viaHttp = await this.fetchOverHttp(url, target, options);
    if (viaHttp.ok || viaHttp.kind === 'not_found' || !this.settings.browserTransfer) {
      return viaHttp;
    }

    const viaBrowser = await this.fetchThroughBrowser(url, target, session);
    if (viaBrowser.ok) {
      return viaBrowser;
    }

    return { ...viaBrowser, message: `${viaHttp.message}; browser transfer: ${viaBrowser.message}` };
  }

  async fetchOverHttp(
    url: string,
    target: AcquisitionTarget,
    options: CandidateRequestOptions = {}
  ): Promise<TransferOutcome> {
    const partialPath = partialPathFor(target.filepath);
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.settings.httpTimeoutMs);

    const headers: Record<string, string> = {
      accept: 'application/pdf,*/*',
      'user-agent': this.settings.userAgent
    };
    if (options.referer) {
      headers.referer = options.referer;
    }
    if (options.cookies && options.cookies.length > 0) {
      headers.cookie = options.cookies.map((cookie) => `${cookie.name}=${cookie.value}`).join('; ');
    }

    try {
      const response = await this.fetchImpl(url, { headers, redirect: 'follow', signal: controller.signal });
      if (!response.ok) {
        return { ok: false, kind: statusKind(response.status), message: `HTTP ${response.status}` };
      }
      if (!response.body) {
        return { ok: false, kind: 'validation_failure', message: 'response had no body' };
      }

      await mkdir(target.directory, { recursive: true });
      const head: number[] = [];
      let size = 0;
      const handle = await open(partialPath, 'w');
      try {
        const reader = response.body.getReader();
        for (;;) {
          const { done, value } = await reader.read();
          if (done) {
            break;
          }
          for (const byte of value.subarray(0, HEAD_BYTES - head.length)) {
            head.push(byte);
          }
          size += value.byteLength;
          await handle.write(value);
        }
      } finally {
        await handle.close();
      }

      const contentType = response.headers.get('content-type');
      if (!isPlausiblePdf({ size, contentType, head: Uint8Array.from(head) }, this.settings.minPdfBytes)) {
        await rm(partialPath, { force: true });
        return {
          ok: false,
          kind: 'validation_failure',
          message: `not a PDF (${size} bytes, content-type ${contentType ?? 'unknown'})`
        };
      }

      return await this.commit(partialPath, target, 'http');
    } catch (error) {
      await rm(partialPath, { force: true });
      return { ok: false, kind: classifyFailure(error), message: describeError(error) };
    } finally {
      clearTimeout(timeoutId);
    }
  }

  async fetchThroughBrowser(url: string, target: AcquisitionTarget, session: FetchSession): Promise<TransferOutcome> {
    if (session.blocked) {
      return { ok: false, kind: 'blocked', message: 'session is blocked' };
    }

    const partialPath = partialPathFor(target.filepath);
    try {
      const directory = await session.downloadDir();
      const existing = new Set(await readdir(directory));

      if (!(await session.startDownload(url))) {
        return { ok: false, kind: 'transient_network', message: 'browser transfer did not start' };
      }

      const downloaded = await awaitBrowserDownload(directory, {
        timeoutMs: this.settings.downloadTimeoutMs,
        pollMs: this.settings.downloadPollMs,
        ignore: existing,
        sleep: this.sleep
      });
      if (!downloaded) {
        return {
          ok: false,
          kind: 'timeout',
          message: `browser transfer did not finish within ${this.settings.downloadTimeoutMs} ms`
        };
      }

      await mkdir(target.directory, { recursive: true });
      try {
        await copyFile(downloaded, partialPath);
      } finally {
        await rm(downloaded, { force: true });
      }

      const { size } = await stat(partialPath);
      if (size <= this.settings.minPdfBytes) {
        await rm(partialPath, { force: true });
        return { ok: false, kind: 'validation_failure', message: `transfer too small (${size} bytes)` };
      }

      return await this.commit(partialPath, target, 'browser');
    } catch (error) {
      await rm(partialPath, { force: true });
      this.logger.debug('Browser transfer failed', { url, error: describeError(error) });
      return { ok: false, kind: classifyFailure(error), message: describeError(error) };
    }
  }

  private async commit(
    partialPath: string,
    target: AcquisitionTarget,
    via: 'http' | 'browser'
  ): Promise<TransferOutcome> {
    const check = await verifyPdfFile(partialPath);
    if (!check.ok) {
      await rm(partialPath, { force: true });
      return { ok: false, kind: 'validation_failure', message: check.reason };
    }

    await rename(partialPath, target.filepath);
    return { ok: true, filepath: target.filepath, via, message: `saved ${check.size} bytes via ${via}` };
  }
}
