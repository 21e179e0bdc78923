import os from 'node:os';
import path from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import fs from 'fs-extra';
import { vi } from 'vitest';
import { ResponseCache } from '../cache.js';
import { CatalogClient } from '../catalog.js';
import { FORMAT_TIERS, type AppConfig } from '../config.js';
import type { StreamRequest, StreamSaver } from '../download.js';
import { ResilientFetcher, type Transport } from '../fetcher.js';
import { silentLogger } from '../logger.js';
import type { CachedResponse, Session } from '../types.js';

export const BASE_URL = 'https://catalog.test';
export const TEST_TOKEN = 'test-token'.padEnd(32, '0');

const tempDirs: string[] = [];

export const makeTempDir = async (): Promise<string> => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'zvuk-downloader-test-'));
  tempDirs.push(dir);
  return dir;
};

/**
 * Deletes every directory handed out by `makeTempDir` so far.
 */
export const removeTempDirs = async (): Promise<void> => {
  const dirs = tempDirs.splice(0);
  await Promise.all(dirs.map((dir) => fs.remove(dir)));
};

export const jsonResponse = (payload: unknown, status = 200): CachedResponse => ({
  status,
  headers: { 'content-type': 'application/json' },
  body: Buffer.from(JSON.stringify(payload)),
});

/**
 * Fake catalog: answers `pathname + search` keys from `routes`, then asks
 * `fallback`, else 404.
 */
export const routeTransport = (
  routes: Record<string, unknown>,
  fallback?: (url: URL) => unknown,
) =>
  vi.fn<Transport>(async (url) => {
    const parsed = new URL(url);
    const key = `${parsed.pathname}${parsed.search}`;
    if (Object.hasOwn(routes, key)) {
      return jsonResponse(routes[key]);
    }
    const answer = fallback?.(parsed);
    return answer === undefined ? jsonResponse({ error: 'not found' }, 404) : jsonResponse(answer);
  });

export const makeSession = (): Session => ({
  authToken: TEST_TOKEN,
  headers: { 'x-auth-token': TEST_TOKEN, Accept: 'application/json' },
  cookies: [],
});

export const makeConfig = (outputPath: string, overrides: Partial<AppConfig> = {}): AppConfig => ({
  threads: 2,
  outputPath,
  format: FORMAT_TIERS['3'],
  cacheFile: path.join(outputPath, 'cache.jsonl'),
  cookiesFile: path.join(outputPath, 'cookies.txt'),
  baseUrl: BASE_URL,
  verbose: false,
  progress: false,
  ...overrides,
});

export const makeCatalog = (transport: Transport, session: Session = makeSession()): CatalogClient => {
  const fetcher = new ResilientFetcher({
    cache: ResponseCache.inMemory(),
    logger: silentLogger,
    transport,
    retryDelayMs: 0,
  });
  return new CatalogClient(fetcher, session, BASE_URL);
};

/**
 * Stream saver that writes a small placeholder file and records how many
 * saves overlap.
 */
export const recordingSaver = (delayMs = 15) => {
  const calls: StreamRequest[] = [];
  let active = 0;
  let peak = 0;

  const saveStream: StreamSaver = async (request) => {
    calls.push(request);
    active += 1;
    peak = Math.max(peak, active);
    try {
      await sleep(delayMs);
      await fs.outputFile(request.targetPath, `audio from ${request.url}`);
      return request.targetPath;
    } finally {
      active -= 1;
    }
  };

  return { saveStream, calls, peak: () => peak };
};
