import path from 'node:path';
import { promises as dns } from 'node:dns';
import fs from 'fs-extra';

export const DEFAULT_CONCURRENCY = 5;
export const DEFAULT_OUTPUT_DIR = path.resolve(process.cwd(), 'zvuk_downloads');
export const DEFAULT_CACHE_FILE = path.resolve(process.cwd(), 'api_cache.jsonl');
export const DEFAULT_COOKIES_FILE = path.resolve(process.cwd(), 'cookies.txt');
export const DEFAULT_BASE_URL = 'https://zvuk.com';
export const ERRORS_LOG_NAME = 'errors.log';
export const DOWNLOADED_LOG_NAME = 'downloaded.log';

const RESERVED_CHARACTERS = /[<>@%!+:"/\\|?*]/g;

/**
 * Makes a title or artist name safe to use as a single path segment.
 */
export const sanitizeFileName = (value: string): string =>
  value.replace(RESERVED_CHARACTERS, '_').replace(/\s+/g, ' ').trim();

/**
 * Left-pads a 1-based position, e.g. `padPosition(3, 2) === '03'`.
 */
export const padPosition = (position: number, width: number): string =>
  String(position).padStart(width, '0');

/**
 * Builds `NN - Title.ext`, falling back to the source id when the title
 * sanitizes to nothing.
 */
export const buildLeafFileName = (
  position: number,
  width: number,
  title: string,
  extension: string,
  fallback: string,
): string => {
  const safeTitle = sanitizeFileName(title) || fallback;
  return `${padPosition(position, width)} - ${safeTitle}.${extension}`;
};

/**
 * Joins sanitized segments under a base directory, replacing empty ones
 * with the given fallback.
 */
export const resolveOutputDir = (baseDir: string, segments: readonly string[], fallback: string): string =>
  path.resolve(baseDir, ...segments.map((segment) => sanitizeFileName(segment) || fallback));

/**
 * Sibling path a leaf is written and tagged at before it is moved into place,
 * e.g. `01 - Intro.flac` → `01 - Intro.download.flac`. The extension is kept
 * so ffmpeg still picks the right muxer.
 */
export const toStagingPath = (filePath: string): string => {
  const extension = path.extname(filePath);
  return `${filePath.slice(0, filePath.length - extension.length)}.download${extension}`;
};

/**
 * Checks whether the given file has already been downloaded.
 */
export const isAlreadyDownloaded = async (filePath: string): Promise<boolean> =>
  fs.pathExists(filePath);

/**
 * Persistent record of the run, kept next to the downloads.
 */
export interface Journal {
  success(filePath: string): Promise<void>;
  failure(message: string): Promise<void>;
}

export const createJournal = (outputDir: string): Journal => {
  const errorsLog = path.resolve(outputDir, ERRORS_LOG_NAME);
  const downloadedLog = path.resolve(outputDir, DOWNLOADED_LOG_NAME);

  return {
    success: async (filePath) => {
      const timestamp = new Date().toISOString();
      await fs.ensureDir(outputDir);
      await fs.appendFile(downloadedLog, `[${timestamp}] ${path.relative(outputDir, filePath)}\n`);
    },
    failure: async (message) => {
      const timestamp = new Date().toISOString();
      await fs.ensureDir(outputDir);
      await fs.appendFile(errorsLog, `[${timestamp}] ${message}\n`);
    },
  };
};

/**
 * Quickly probes DNS to help surface connectivity issues before downloads run.
 */
export const verifyInternet = async (baseUrl: string): Promise<void> => {
  await dns.lookup(new URL(baseUrl).hostname);
};
