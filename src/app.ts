import process from 'node:process';
import { createSession } from './auth.js';
import { ResponseCache } from './cache.js';
import { CatalogClient } from './catalog.js';
import { HELP_MESSAGE, parseArgs, type AppConfig, type CliCommand } from './config.js';
import { createDispatcher, type Dispatcher } from './dispatcher.js';
import { createStreamSaver, type StreamSaver } from './download.js';
import { CatalogDownloader } from './downloaders.js';
import { ConfigValidationError, CredentialError, errorMessage } from './errors.js';
import { ResilientFetcher, type Transport } from './fetcher.js';
import { createLogger, type Logger } from './logger.js';
import { createProgressReporter, type ProgressReporter } from './progress.js';
import { resolveLink } from './resolver.js';
import { runBounded } from './runner.js';
import { configureFfmpeg, writeTagsWithFfmpeg, type TagWriter } from './tags.js';
import type { ResourceRef, Session, TaskResult } from './types.js';
import { createJournal, verifyInternet, type Journal } from './utils.js';

export interface LinkRunContext {
  readonly dispatcher: Dispatcher;
  readonly config: Pick<AppConfig, 'threads'>;
  readonly logger: Logger;
  readonly journal: Journal;
  readonly progress?: ProgressReporter;
}

interface ResolvedLink {
  readonly link: string;
  readonly ref: ResourceRef;
}

/**
 * Resolves every link and downloads the recognized ones in parallel.
 * Unrecognized links and failed resources are reported and skipped; they
 * never stop the others.
 */
export const downloadLinks = async (links: readonly string[], context: LinkRunContext): Promise<TaskResult[]> => {
  const { dispatcher, config, logger, journal, progress } = context;
  const rejected: TaskResult[] = [];
  const resolved: ResolvedLink[] = [];

  for (const link of links) {
    const ref = resolveLink(link);
    if (ref) {
      resolved.push(Object.freeze({ link, ref }));
      continue;
    }
    const reason = 'Unrecognized link format';
    logger.error(`${reason}: ${link}`);
    await journal.failure(`${link} :: ${reason}`);
    rejected.push({ id: link, label: link, status: 'failed', reason });
  }

  const outcomes = await runBounded(resolved, ({ ref }) => dispatcher.dispatch(ref), {
    concurrency: config.threads,
    logger,
    progress,
    label: resolved.length > 1 ? 'Links' : undefined,
    describe: ({ ref, link }) => `${ref.kind} ${ref.id} (${link})`,
  });

  const results = [...rejected];
  for (const outcome of outcomes) {
    if (outcome.ok) {
      results.push(...outcome.value);
      continue;
    }
    const { ref, link } = outcome.item;
    await journal.failure(`${link} :: ${outcome.error.message}`);
    results.push({ id: `${ref.kind}:${ref.id}`, label: link, status: 'failed', reason: outcome.error.message });
  }
  return results;
};

/**
 * Summarizes overall processing results at the end of the execution.
 */
export const printSummary = (results: readonly TaskResult[]): void => {
  const counts = { total: 0, completed: 0, skipped: 0, failed: 0 };
  for (const result of results) {
    counts.total += 1;
    counts[result.status] += 1;
  }

  console.log('\nDownload summary');
  if (results.length > 0) {
    console.table(
      results.map((result) => ({
        ID: result.id,
        Item: result.label,
        Status: result.status,
        Reason: result.reason ?? '',
        File: result.filePath ?? '',
      })),
    );
  }
  console.log(
    `Totals => processed: ${counts.total}, completed: ${counts.completed}, skipped: ${counts.skipped}, failed: ${counts.failed}`,
  );
};

export interface CliServices {
  readonly env?: Readonly<Record<string, string | undefined>>;
  readonly isTty?: boolean;
  readonly transport?: Transport;
  readonly retryDelayMs?: number;
  readonly saveStream?: StreamSaver;
  readonly applyTags?: TagWriter;
  readonly probeNetwork?: (baseUrl: string) => Promise<void>;
  readonly print?: (line: string) => void;
}

const parseCommand = (argv: readonly string[], services: CliServices, print: (line: string) => void): CliCommand | null => {
  try {
    return parseArgs(argv, services.env ?? process.env, services.isTty ?? Boolean(process.stdout.isTTY));
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      print(error.message);
      print('Run with --help to see the available options.');
      return null;
    }
    throw error;
  }
};

/**
 * Runs one CLI invocation and resolves with the process exit code.
 */
export const runCli = async (argv: readonly string[], services: CliServices = {}): Promise<number> => {
  const print = services.print ?? ((line: string) => console.log(line));
  const command = parseCommand(argv, services, print);
  if (!command) {
    return 1;
  }
  if (command.kind === 'help') {
    print(HELP_MESSAGE);
    return 0;
  }

  const { config } = command;
  const progress = createProgressReporter(config.progress && command.kind === 'download');
  const logger = createLogger({
    verbose: config.verbose,
    write: config.progress ? (line) => progress.log(line) : undefined,
  });

  const cache = await ResponseCache.open(config.cacheFile, logger);
  const fetcher = new ResilientFetcher({
    cache,
    logger,
    transport: services.transport,
    retryDelayMs: services.retryDelayMs,
  });

  if (command.kind === 'check-auth') {
    try {
      await createSession(config, fetcher, logger);
      print('[OK] Authentication succeeded. Subscription is active.');
    } catch (error) {
      print(`[ERROR] ${errorMessage(error)}`);
    }
    return 0;
  }

  if (command.links.length === 0) {
    logger.error('No links given. Run with --help for usage.');
    return 1;
  }

  try {
    await (services.probeNetwork ?? verifyInternet)(config.baseUrl);
  } catch (error) {
    logger.warn(`Connectivity check failed: ${errorMessage(error)}`);
  }

  let session: Session;
  try {
    session = await createSession(config, fetcher, logger);
  } catch (error) {
    if (error instanceof CredentialError) {
      logger.error(error.message);
      return 1;
    }
    throw error;
  }

  configureFfmpeg(config.ffmpegPath);
  const journal = createJournal(config.outputPath);
  const downloader = new CatalogDownloader({
    catalog: new CatalogClient(fetcher, session, config.baseUrl),
    config,
    session,
    logger,
    journal,
    progress,
    saveStream: services.saveStream ?? createStreamSaver(),
    applyTags: services.applyTags ?? writeTagsWithFfmpeg,
  });

  let results: TaskResult[];
  try {
    results = await downloadLinks(command.links, {
      dispatcher: createDispatcher(downloader),
      config,
      logger,
      journal,
      progress,
    });
  } finally {
    progress.stop();
  }

  printSummary(results);
  return results.some((result) => result.status === 'failed') ? 1 : 0;
};
