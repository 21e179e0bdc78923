import path from 'node:path';
import fs from 'fs-extra';
import pLimit from 'p-limit';
import { z } from 'zod';
import type { Logger } from './logger.js';
import type { CachedResponse } from './types.js';

const cacheLineSchema = z.object({
  url: z.string().min(1),
  status: z.number().int(),
  headers: z.record(z.string()),
  body: z.string(),
  storedAt: z.string(),
});

type CacheLine = z.infer<typeof cacheLineSchema>;

/**
 * Persistent URL → response store shared by every fetcher in the process.
 *
 * The backing file is JSON lines, one entry per successful response, appended
 * as entries arrive. Entries never expire: a re-run serves whatever was stored
 * before, and the only way to refresh is to delete the file.
 */
export class ResponseCache {
  private readonly entries = new Map<string, CachedResponse>();

  // Single writer: appends from concurrent fetches must not interleave.
  private readonly writeQueue = pLimit(1);

  private constructor(private readonly filePath: string | null) {}

  /**
   * Loads an existing cache file (if any). Unreadable lines are skipped.
   */
  static async open(filePath: string, logger?: Logger): Promise<ResponseCache> {
    const cache = new ResponseCache(filePath);
    if (!(await fs.pathExists(filePath))) {
      return cache;
    }

    const raw = await fs.readFile(filePath, 'utf-8');
    const lines = raw.split('\n');
    let skipped = 0;
    for (const line of lines) {
      if (line.trim().length === 0) {
        continue;
      }
      const entry = parseLine(line);
      if (!entry) {
        skipped += 1;
        continue;
      }
      cache.entries.set(entry.url, {
        status: entry.status,
        headers: entry.headers,
        body: Buffer.from(entry.body, 'base64'),
      });
    }

    if (skipped > 0) {
      logger?.warn(`Skipped ${skipped} unreadable cache line(s) in ${filePath}`);
    }
    logger?.debug(`Loaded ${cache.entries.size} cached response(s) from ${filePath}`);
    return cache;
  }

  /**
   * A cache that lives only for the current process.
   */
  static inMemory(): ResponseCache {
    return new ResponseCache(null);
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Returns a copy; callers may mutate the body without touching the entry.
   */
  get(url: string): CachedResponse | undefined {
    const entry = this.entries.get(url);
    if (!entry) {
      return undefined;
    }
    return { status: entry.status, headers: { ...entry.headers }, body: Buffer.from(entry.body) };
  }

  has(url: string): boolean {
    return this.entries.has(url);
  }

  /**
   * Stores a response. Resolves once the entry is on disk.
   */
  async put(url: string, response: CachedResponse): Promise<void> {
    const stored: CachedResponse = {
      status: response.status,
      headers: { ...response.headers },
      body: Buffer.from(response.body),
    };
    this.entries.set(url, stored);

    const { filePath } = this;
    if (filePath === null) {
      return;
    }

    const line: CacheLine = {
      url,
      status: stored.status,
      headers: { ...stored.headers },
      body: stored.body.toString('base64'),
      storedAt: new Date().toISOString(),
    };

    await this.writeQueue(async () => {
      await fs.ensureDir(path.dirname(filePath));
      await fs.appendFile(filePath, `${JSON.stringify(line)}\n`);
    });
  }
}

const parseLine = (line: string): CacheLine | null => {
  try {
    const parsed = cacheLineSchema.safeParse(JSON.parse(line));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
};
