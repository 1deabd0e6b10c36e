import { writeFile } from 'fs/promises';
import { logger } from '../logger.js';

export class AssetDownloadError extends Error {
  constructor(
    message: string,
    readonly url: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'AssetDownloadError';
  }
}

export interface DownloadOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Download a URL into `targetPath`, replacing whatever a previous attempt left there.
 * Returns the number of bytes written.
 */
export async function downloadToFile(
  url: string,
  targetPath: string,
  { timeoutMs, signal }: DownloadOptions,
): Promise<number> {
  logger.info({ url }, 'Downloading file');

  const requestSignal = signal
    ? AbortSignal.any([signal, AbortSignal.timeout(timeoutMs)])
    : AbortSignal.timeout(timeoutMs);

  let response: Response;
  try {
    response = await fetch(url, { signal: requestSignal });
  } catch (err) {
    const message = err instanceof Error ? err.message : 'Unknown error';
    throw new AssetDownloadError(`Download request failed: ${message}`, url, undefined, { cause: err });
  }

  if (response.status !== 200) {
    const body = await response.text();
    logger.error({ url, status: response.status, body: body.slice(0, 200) }, 'Download failed');
    throw new AssetDownloadError(`HTTP ${response.status}`, url, response.status);
  }

  const data = Buffer.from(await response.arrayBuffer());
  logger.info({ bytes: data.byteLength, targetPath }, 'Downloaded file, saving');

  await writeFile(targetPath, data, { signal: requestSignal });
  return data.byteLength;
}
