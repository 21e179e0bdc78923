import path from 'node:path';
import fs from 'fs-extra';
import type { CatalogClient, ChapterRef } from './catalog.js';
import type { AppConfig } from './config.js';
import type { StreamSaver } from './download.js';
import { ResolutionError } from './errors.js';
import type { Logger } from './logger.js';
import type { ProgressReporter } from './progress.js';
import { runBounded, type Outcome } from './runner.js';
import type { TagWriter } from './tags.js';
import type { DownloadTask, Session, TaskResult, TrackInfo, TrackMetadata } from './types.js';
import { buildLeafFileName, isAlreadyDownloaded, resolveOutputDir, toStagingPath, type Journal } from './utils.js';

const TRACK_NUMBER_WIDTH = 2;
const EPISODE_NUMBER_WIDTH = 3;
const SPOKEN_WORD_EXTENSION = 'mp3';

export interface DownloaderDeps {
  readonly catalog: CatalogClient;
  readonly config: AppConfig;
  readonly session: Session;
  readonly logger: Logger;
  readonly journal: Journal;
  readonly saveStream: StreamSaver;
  readonly applyTags: TagWriter;
  readonly progress?: ProgressReporter;
}

interface TrackTask extends DownloadTask {
  readonly track: TrackInfo;
}

interface EpisodeTask {
  readonly episodeId: string;
  readonly position: number;
  readonly directory: string;
}

interface ChapterTask {
  readonly chapter: ChapterRef;
  readonly position: number;
  readonly directory: string;
}

const describeTrack = (track: TrackInfo): string => `${track.performer} - ${track.title}`;

/**
 * One download routine per resource kind. Each resolves metadata, derives a
 * destination, then fetches its leaf items (tracks, episodes, chapters)
 * through a nested bounded runner. Nothing is kept between calls.
 */
export class CatalogDownloader {
  constructor(private readonly deps: DownloaderDeps) {}

  async downloadTrack(id: string): Promise<TaskResult[]> {
    const { catalog, config, logger } = this.deps;
    logger.info(`Downloading track: ${id}`);
    const track = await catalog.getTrack(id);
    const directory = resolveOutputDir(config.outputPath, ['_tracks', `${track.performer} - ${track.album}`], `track-${id}`);
    return [await this.saveTrack(this.trackTask(track, directory))];
  }

  async downloadRelease(id: string): Promise<TaskResult[]> {
    const { catalog, config, logger } = this.deps;
    logger.info(`Downloading release: ${id}`);
    const release = await catalog.getRelease(id);
    const directory = resolveOutputDir(
      config.outputPath,
      ['_releases', release.artist, `${release.year} - ${release.title}`],
      `release-${id}`,
    );
    return this.downloadTrackList(release.trackIds, directory, `${release.artist} - ${release.title}`);
  }

  async downloadPlaylist(id: string): Promise<TaskResult[]> {
    const { catalog, config, logger } = this.deps;
    logger.info(`Downloading playlist: ${id}`);
    const playlist = await catalog.getPlaylist(id);
    const directory = resolveOutputDir(config.outputPath, ['_playlists', playlist.title], `playlist-${id}`);
    return this.downloadTrackList(playlist.trackIds, directory, playlist.title);
  }

  async downloadSelection(id: string): Promise<TaskResult[]> {
    const { catalog, config, logger } = this.deps;
    logger.info(`Downloading selection: ${id}`);
    const selection = await catalog.getSelection(id);
    const directory = resolveOutputDir(config.outputPath, ['_selections', selection.title], `selection-${id}`);
    return this.downloadTrackList(selection.trackIds, directory, selection.title);
  }

  async downloadArtist(id: string): Promise<TaskResult[]> {
    const { catalog, logger } = this.deps;
    logger.info(`Downloading everything by artist: ${id}`);
    const releaseIds = await catalog.getArtistReleaseIds(id);
    if (releaseIds.length === 0) {
      logger.warn(`Artist ${id} has no releases`);
      return [];
    }

    const outcomes = await runBounded(releaseIds, (releaseId) => this.downloadRelease(releaseId), {
      ...this.runOptions(`artist ${id}`),
      describe: (releaseId) => `release ${releaseId}`,
    });
    return this.collect(outcomes, (releaseId) => ({ id: `release:${releaseId}`, label: `release ${releaseId}` }));
  }

  async downloadPodcast(id: string): Promise<TaskResult[]> {
    const { catalog, config, logger } = this.deps;
    logger.info(`Downloading podcast: ${id}`);
    const podcast = await catalog.getPodcast(id);
    if (podcast.episodeIds.length === 0) {
      logger.warn(`Podcast '${podcast.title}' has no episodes`);
      return [];
    }

    const directory = resolveOutputDir(config.outputPath, ['_podcasts', podcast.title], `podcast-${id}`);
    const tasks = podcast.episodeIds.map(
      (episodeId, index): EpisodeTask => Object.freeze({ episodeId, position: index + 1, directory }),
    );
    const outcomes = await runBounded(tasks, this.saveEpisode, {
      ...this.runOptions(podcast.title),
      describe: (task) => `episode ${task.episodeId}`,
    });
    return this.collect(outcomes, (task) => ({ id: `episode:${task.episodeId}`, label: `episode ${task.episodeId}` }));
  }

  async downloadAudiobook(id: string): Promise<TaskResult[]> {
    const { catalog, config, logger } = this.deps;
    logger.info(`Downloading audiobook: ${id}`);
    const book = await catalog.getAudiobook(id);
    if (book.chapters.length === 0) {
      logger.warn(`Audiobook '${book.title}' has no chapters`);
      return [];
    }

    logger.info(`Found ${book.chapters.length} chapter(s) in '${book.title}'`);
    const directory = resolveOutputDir(config.outputPath, ['_audiobooks', `${book.author} - ${book.title}`], `audiobook-${id}`);
    const tasks = book.chapters.map(
      (chapter, index): ChapterTask => Object.freeze({ chapter, position: index + 1, directory }),
    );
    const outcomes = await runBounded(tasks, this.saveChapter, {
      ...this.runOptions(book.title),
      describe: (task) => `chapter ${task.chapter.id}`,
    });
    return this.collect(outcomes, (task) => ({ id: `chapter:${task.chapter.id}`, label: task.chapter.title }));
  }

  /**
   * Resolves all track metadata in batches, then downloads each track under
   * the runner. Ids missing from the catalog answer, or answered with
   * unusable fields, become failed results.
   */
  private async downloadTrackList(
    trackIds: readonly string[],
    directory: string,
    label: string,
  ): Promise<TaskResult[]> {
    const { catalog, logger, journal } = this.deps;
    if (trackIds.length === 0) {
      logger.warn(`'${label}' has no tracks`);
      return [];
    }

    const tracks = await catalog.getTracks(trackIds);
    const missing: TaskResult[] = [];
    const tasks: TrackTask[] = [];
    for (const trackId of trackIds) {
      const track = tracks.get(trackId);
      if (track && !(track instanceof ResolutionError)) {
        tasks.push(this.trackTask(track, directory));
        continue;
      }
      const reason = track ? track.message : 'Track missing from catalog response';
      logger.error(`track ${trackId} :: ${reason}`);
      await journal.failure(`track ${trackId} :: ${reason}`);
      missing.push({ id: `track:${trackId}`, label: `track ${trackId}`, status: 'failed', reason });
    }

    const outcomes = await runBounded(tasks, this.saveTrack, {
      ...this.runOptions(label),
      describe: (task) => `track ${task.sourceId}`,
    });
    const results = await this.collect(outcomes, (task) => ({
      id: `track:${task.sourceId}`,
      label: describeTrack(task.track),
    }));
    return [...missing, ...results];
  }

  private trackTask(track: TrackInfo, directory: string): TrackTask {
    const fileName = buildLeafFileName(
      track.position,
      TRACK_NUMBER_WIDTH,
      track.title,
      this.deps.config.format.extension,
      `track-${track.id}`,
    );
    return Object.freeze({ sourceId: track.id, outputPath: path.join(directory, fileName), track });
  }

  private readonly saveTrack = async (task: TrackTask): Promise<TaskResult> => {
    const { catalog, config, saveStream, applyTags, journal, logger } = this.deps;
    const base = { id: `track:${task.sourceId}`, label: describeTrack(task.track) };

    if (await isAlreadyDownloaded(task.outputPath)) {
      logger.debug(`Already downloaded: ${task.outputPath}`);
      return { ...base, status: 'skipped', reason: 'Already downloaded', filePath: task.outputPath };
    }

    const metadata: TrackMetadata = {
      ...task.track,
      streamUrl: await catalog.getStreamUrl(task.sourceId, config.format.quality),
    };
    // Only a tagged file may appear at outputPath; the skip check above trusts it.
    const stagingPath = toStagingPath(task.outputPath);
    try {
      await saveStream({ url: metadata.streamUrl, targetPath: stagingPath });
      await applyTags(stagingPath, {
        artist: metadata.performer,
        title: metadata.title,
        album: metadata.album,
        trackNumber: metadata.position,
        year: metadata.releaseDate.slice(0, 4),
      });
      await fs.move(stagingPath, task.outputPath, { overwrite: true });
    } catch (error) {
      await fs.remove(stagingPath);
      throw error;
    }

    await journal.success(task.outputPath);
    logger.info(`Downloaded: ${task.outputPath}`);
    return { ...base, status: 'completed', filePath: task.outputPath };
  };

  private readonly saveEpisode = async (task: EpisodeTask): Promise<TaskResult> => {
    const { catalog, saveStream, journal, logger } = this.deps;
    const episode = await catalog.getEpisode(task.episodeId);
    const fileName = buildLeafFileName(
      task.position,
      EPISODE_NUMBER_WIDTH,
      episode.title,
      SPOKEN_WORD_EXTENSION,
      `episode-${episode.id}`,
    );
    const outputPath = path.join(task.directory, fileName);
    const base = { id: `episode:${episode.id}`, label: episode.title };

    if (await isAlreadyDownloaded(outputPath)) {
      return { ...base, status: 'skipped', reason: 'Already downloaded', filePath: outputPath };
    }

    await saveStream({ url: episode.streamUrl, targetPath: outputPath });
    await journal.success(outputPath);
    logger.info(`Downloaded: ${outputPath}`);
    return { ...base, status: 'completed', filePath: outputPath };
  };

  private readonly saveChapter = async (task: ChapterTask): Promise<TaskResult> => {
    const { catalog, session, saveStream, journal, logger } = this.deps;
    const fileName = buildLeafFileName(
      task.position,
      EPISODE_NUMBER_WIDTH,
      task.chapter.title,
      SPOKEN_WORD_EXTENSION,
      `chapter-${task.chapter.id}`,
    );
    const outputPath = path.join(task.directory, fileName);
    const base = { id: `chapter:${task.chapter.id}`, label: task.chapter.title };

    if (await isAlreadyDownloaded(outputPath)) {
      return { ...base, status: 'skipped', reason: 'Already downloaded', filePath: outputPath };
    }

    const chapter = await catalog.getChapter(task.chapter.id);
    await saveStream({ url: chapter.streamUrl, targetPath: outputPath, headers: session.headers });
    await journal.success(outputPath);
    logger.info(`Downloaded: ${outputPath}`);
    return { ...base, status: 'completed', filePath: outputPath };
  };

  private runOptions(label: string) {
    const { config, logger, progress } = this.deps;
    return { concurrency: config.threads, logger, progress, label };
  }

  /**
   * Flattens runner outcomes into results; failures are journaled here so each
   * one leaves a line in errors.log.
   */
  private async collect<I>(
    outcomes: readonly Outcome<I, TaskResult | TaskResult[]>[],
    identify: (item: I) => { id: string; label: string },
  ): Promise<TaskResult[]> {
    const results: TaskResult[] = [];
    for (const outcome of outcomes) {
      if (outcome.ok) {
        results.push(...(Array.isArray(outcome.value) ? outcome.value : [outcome.value]));
        continue;
      }
      const { id, label } = identify(outcome.item);
      await this.deps.journal.failure(`${id} :: ${outcome.error.message}`);
      results.push({ id, label, status: 'failed', reason: outcome.error.message });
    }
    return results;
  }
}
