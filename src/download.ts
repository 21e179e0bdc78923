import path from 'node:path';
import { pipeline } from 'node:stream/promises';
import fs from 'fs-extra';
import { request, type Dispatcher } from 'undici';
import { HttpStatusError } from './errors.js';

export interface StreamRequest {
  readonly url: string;
  readonly targetPath: string;
  readonly headers?: Readonly<Record<string, string>>;
}

/**
 * Writes a media stream to `targetPath`. Never touches the response cache.
 */
export type StreamSaver = (request: StreamRequest) => Promise<string>;

/**
 * Streams the body into `<target>.part` and renames it once complete, so an
 * interrupted download never leaves a file that looks finished.
 */
export const createStreamSaver =
  (dispatcher?: Dispatcher): StreamSaver =>
  async ({ url, targetPath, headers = {} }) => {
    const tempPath = `${targetPath}.part`;
    await fs.ensureDir(path.dirname(targetPath));

    const { statusCode, body } = await request(url, {
      method: 'GET',
      headers: { ...headers },
      maxRedirections: 5,
      dispatcher,
    });

    if (statusCode < 200 || statusCode >= 300) {
      await body.dump();
      throw new HttpStatusError(url, statusCode);
    }

    try {
      await pipeline(body, fs.createWriteStream(tempPath));
      await fs.move(tempPath, targetPath, { overwrite: true });
    } catch (error) {
      await fs.remove(tempPath);
      throw error;
    }

    return targetPath;
  };
