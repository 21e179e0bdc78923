import path from 'node:path';
import { z, ZodError } from 'zod';
import { ConfigValidationError } from './errors.js';
import {
  DEFAULT_BASE_URL,
  DEFAULT_CACHE_FILE,
  DEFAULT_CONCURRENCY,
  DEFAULT_COOKIES_FILE,
  DEFAULT_OUTPUT_DIR,
} from './utils.js';

/**
 * `--format` values: the stream quality requested from the catalog and the
 * extension of the written file.
 */
export const FORMAT_TIERS = {
  '1': { label: 'MP3-128', quality: 'mid', extension: 'mp3' },
  '2': { label: 'MP3-320', quality: 'high', extension: 'mp3' },
  '3': { label: 'FLAC', quality: 'flac', extension: 'flac' },
} as const;

export type FormatCode = keyof typeof FORMAT_TIERS;
export type FormatTier = (typeof FORMAT_TIERS)[FormatCode];

const positiveInteger = (name: string) =>
  z
    .string()
    .regex(/^\d+$/, `${name} must be a whole number`)
    .transform((value) => Number.parseInt(value, 10))
    .pipe(z.number().int().min(1, `${name} must be at least 1`));

const booleanString = () =>
  z
    .string()
    .optional()
    .transform((value) => /^(1|true|yes)$/i.test(value ?? ''));

const rawConfigSchema = z.object({
  threads: positiveInteger('threads'),
  outputPath: z.string().min(1, 'output path cannot be empty'),
  format: z.enum(['1', '2', '3'], {
    errorMap: () => ({ message: 'format must be 1 (MP3-128), 2 (MP3-320) or 3 (FLAC)' }),
  }),
  cacheFile: z.string().min(1),
  cookiesFile: z.string().min(1),
  baseUrl: z.string().url(),
  ffmpegPath: z.string().min(1).optional(),
  verbose: booleanString(),
});

export interface AppConfig {
  readonly threads: number;
  readonly outputPath: string;
  readonly format: FormatTier;
  readonly cacheFile: string;
  readonly cookiesFile: string;
  readonly baseUrl: string;
  readonly ffmpegPath?: string;
  readonly verbose: boolean;
  readonly progress: boolean;
}

export type CliCommand =
  | { readonly kind: 'help' }
  | { readonly kind: 'check-auth'; readonly config: AppConfig }
  | { readonly kind: 'download'; readonly config: AppConfig; readonly links: readonly string[] };

type Env = Readonly<Record<string, string | undefined>>;

const VALUE_FLAGS = {
  '--threads': 'threads',
  '--output-path': 'outputPath',
  '--format': 'format',
  '--cache-file': 'cacheFile',
  '--cookies': 'cookiesFile',
} as const;

type ValueFlag = keyof typeof VALUE_FLAGS;

const isValueFlag = (name: string): name is ValueFlag => Object.hasOwn(VALUE_FLAGS, name);

/**
 * Parses CLI arguments (flags win over environment variables) into a frozen
 * configuration and the command to run.
 *
 * @throws {ConfigValidationError} on unknown flags or invalid values
 */
export const parseArgs = (argv: readonly string[], env: Env = process.env, isTty = false): CliCommand => {
  if (argv.length === 0 || argv.includes('--help') || argv.includes('-h')) {
    return { kind: 'help' };
  }

  const values: Partial<Record<(typeof VALUE_FLAGS)[ValueFlag], string>> = {};
  const links: string[] = [];
  let checkAuth = false;
  let verbose: string | undefined = env.VERBOSE;
  let progress = isTty;

  for (const arg of argv) {
    if (!arg.startsWith('--')) {
      links.push(arg);
      continue;
    }
    const separator = arg.indexOf('=');
    const name = separator === -1 ? arg : arg.slice(0, separator);
    const value = separator === -1 ? undefined : arg.slice(separator + 1);

    if (isValueFlag(name)) {
      if (value === undefined) {
        throw new ConfigValidationError(`Missing value for ${name} (use ${name}=VALUE)`);
      }
      values[VALUE_FLAGS[name]] = value;
      continue;
    }

    switch (name) {
      case '--check-auth':
        checkAuth = true;
        break;
      case '--verbose':
        verbose = 'true';
        break;
      case '--no-progress':
        progress = false;
        break;
      default:
        throw new ConfigValidationError(`Unknown option: ${arg}`);
    }
  }

  const config = buildConfig(
    {
      threads: values.threads ?? env.DOWNLOAD_CONCURRENCY ?? String(DEFAULT_CONCURRENCY),
      outputPath: values.outputPath ?? env.OUTPUT_DIR ?? DEFAULT_OUTPUT_DIR,
      format: values.format ?? env.DOWNLOAD_FORMAT ?? '3',
      cacheFile: values.cacheFile ?? env.CACHE_FILE ?? DEFAULT_CACHE_FILE,
      cookiesFile: values.cookiesFile ?? env.COOKIES_FILE ?? DEFAULT_COOKIES_FILE,
      baseUrl: env.CATALOG_BASE_URL ?? DEFAULT_BASE_URL,
      ffmpegPath: env.FFMPEG_PATH || undefined,
      verbose,
    },
    progress,
  );

  if (checkAuth) {
    return { kind: 'check-auth', config };
  }
  return { kind: 'download', config, links };
};

const buildConfig = (raw: Omit<z.input<typeof rawConfigSchema>, 'format'> & { format: string }, progress: boolean): AppConfig => {
  try {
    const parsed = rawConfigSchema.parse(raw);
    return Object.freeze({
      threads: parsed.threads,
      outputPath: path.resolve(parsed.outputPath),
      format: FORMAT_TIERS[parsed.format],
      cacheFile: path.resolve(parsed.cacheFile),
      cookiesFile: path.resolve(parsed.cookiesFile),
      baseUrl: parsed.baseUrl.replace(/\/+$/, ''),
      ffmpegPath: parsed.ffmpegPath,
      verbose: parsed.verbose,
      progress,
    });
  } catch (error) {
    if (error instanceof ZodError) {
      throw ConfigValidationError.fromZodError(error);
    }
    throw error;
  }
};

export const HELP_MESSAGE = `
Zvuk downloader

Usage:
  zvuk-downloader [options] <link> [<link> ...]
  zvuk-downloader --check-auth

Examples:
  zvuk-downloader https://zvuk.com/track/12776890
  zvuk-downloader --threads=10 https://zvuk.com/artist/852542
  zvuk-downloader https://zvuk.com/release/29015282 https://zvuk.com/playlist/8545187
  zvuk-downloader https://zvuk.com/selection/1
  zvuk-downloader https://zvuk.com/podcast/14574115
  zvuk-downloader https://zvuk.com/abook/24072774

Options:
  --threads=N          Parallel downloads per level (default ${DEFAULT_CONCURRENCY})
  --output-path=DIR    Download folder (default ./zvuk_downloads)
  --format=1|2|3       1 = MP3-128, 2 = MP3-320, 3 = FLAC (default)
  --cookies=FILE       Netscape cookies file (default ./cookies.txt)
  --cache-file=FILE    Response cache file (default ./api_cache.jsonl)
  --check-auth         Validate credentials and subscription, then exit
  --verbose            Print cache hits and other debug lines
  --no-progress        Disable progress bars
  -h, --help           Show this help message

Environment:
  DOWNLOAD_CONCURRENCY, OUTPUT_DIR, DOWNLOAD_FORMAT, COOKIES_FILE, CACHE_FILE,
  CATALOG_BASE_URL, FFMPEG_PATH, VERBOSE

Credentials:
  cookies.txt must be exported from a browser session on zvuk.com and contain
  the access_token cookie. The account needs an active subscription.

Cache:
  Catalog responses are stored in the cache file and reused on every later
  run without checking for changes. Delete the file to fetch fresh metadata.
`;
