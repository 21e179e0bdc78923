import { z } from 'zod';
import { ResolutionError } from './errors.js';
import type { ResilientFetcher } from './fetcher.js';
import type { Session, TrackInfo } from './types.js';

// Keeps batched `tracks?ids=` URLs to a sane length.
export const TRACK_BATCH_SIZE = 100;

const AUDIOBOOK_QUERY = `
query getAudioBookData($id: Int!) {
  book: audioBook(id: $id) {
    id
    title
    authorName
    chapters {
      id
      title
    }
  }
}`;

const CHAPTER_QUERY = `
query getAudioBookChapter($id: Int!) {
  chapter(id: $id) {
    id
    mid
  }
}`;

const idSchema = z.union([z.number(), z.string().min(1)]).transform(String);
const dateSchema = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? '' : String(value)));

const trackSchema = z.object({
  title: z.string(),
  credits: z.string(),
  release_title: z.string(),
  position: z.number().int(),
  release_date: dateSchema,
});

const releaseSchema = z.object({
  title: z.string(),
  credits: z.string(),
  date: dateSchema,
  track_ids: z.array(idSchema),
});

const trackListSchema = z.object({
  title: z.string(),
  track_ids: z.array(idSchema),
});

const artistReleasesSchema = z.object({
  result: z.array(z.object({ id: idSchema }).passthrough()),
});

const podcastSchema = z.object({
  title: z.string().nullish(),
  episodes: z.array(z.object({ id: idSchema }).passthrough()).default([]),
});

const episodeSchema = z.object({
  title: z.string(),
  stream_url: z.string().url(),
});

const streamSchema = z.object({
  result: z.object({ stream: z.string().url() }),
});

const graphQlEnvelopeSchema = z.object({
  data: z.record(z.unknown()).nullish(),
  errors: z.array(z.object({ message: z.string() }).passthrough()).optional(),
});

const audiobookSchema = z.object({
  title: z.string().nullish(),
  authorName: z.string().nullish(),
  chapters: z.array(z.object({ id: idSchema, title: z.string().nullish() })).default([]),
});

const chapterSchema = z.object({
  mid: z.string().url({ message: 'stream link (mid) is missing' }),
});

/** Envelope of the `/api/tiny/*` endpoints that return `{ result: { <key>: { <id>: entity } } }`. */
const keyedResultSchema = (key: string) =>
  z.object({ result: z.object({ [key]: z.record(z.unknown()) }) });

export interface ReleaseInfo {
  readonly id: string;
  readonly title: string;
  readonly artist: string;
  readonly year: string;
  readonly trackIds: readonly string[];
}

export interface TrackListInfo {
  readonly id: string;
  readonly title: string;
  readonly trackIds: readonly string[];
}

export interface PodcastInfo {
  readonly id: string;
  readonly title: string;
  readonly episodeIds: readonly string[];
}

export interface EpisodeInfo {
  readonly id: string;
  readonly title: string;
  readonly streamUrl: string;
}

export interface ChapterRef {
  readonly id: string;
  readonly title: string;
}

export interface AudiobookInfo {
  readonly id: string;
  readonly title: string;
  readonly author: string;
  readonly chapters: readonly ChapterRef[];
}

export interface ChapterInfo {
  readonly id: string;
  readonly streamUrl: string;
}

const parseWith = <T extends z.ZodTypeAny>(schema: T, payload: unknown, subject: string): z.output<T> => {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw ResolutionError.fromZodError(subject, parsed.error);
  }
  return parsed.data;
};

const toYear = (date: string): string => date.slice(0, 4);

const chunk = <T>(items: readonly T[], size: number): T[][] => {
  const batches: T[][] = [];
  for (let index = 0; index < items.length; index += size) {
    batches.push(items.slice(index, index + size));
  }
  return batches;
};

/**
 * Typed access to the catalog endpoints. Every metadata call goes through the
 * resilient fetcher with the session headers; stream lookups skip the cache
 * because the links they return expire.
 */
export class CatalogClient {
  constructor(
    private readonly fetcher: ResilientFetcher,
    private readonly session: Session,
    private readonly baseUrl: string,
  ) {}

  private endpoint(pathname: string, params: Record<string, string>): string {
    const query = Object.entries(params)
      .map(([name, value]) => `${name}=${encodeURIComponent(value).replace(/%2C/gi, ',')}`)
      .join('&');
    return `${this.baseUrl}${pathname}?${query}`;
  }

  private async getJson(url: string, cache = true): Promise<unknown> {
    return this.fetcher.fetchJson(url, { headers: this.session.headers, cache });
  }

  private async getKeyedEntity(
    pathname: string,
    params: Record<string, string>,
    key: string,
    id: string,
    subject: string,
  ): Promise<unknown> {
    const payload = await this.getJson(this.endpoint(pathname, params));
    const envelope = parseWith(keyedResultSchema(key), payload, subject);
    const entities = envelope.result[key] ?? {};
    if (!Object.hasOwn(entities, id)) {
      throw new ResolutionError(`${subject} was not found in the catalog response`);
    }
    return entities[id];
  }

  async getTrack(id: string): Promise<TrackInfo> {
    const tracks = await this.getTracks([id]);
    const track = tracks.get(id);
    if (!track) {
      throw new ResolutionError(`track ${id} was not found in the catalog response`);
    }
    if (track instanceof ResolutionError) {
      throw track;
    }
    return track;
  }

  /**
   * Fetches metadata for many tracks in batches. Ids the catalog does not
   * return are absent from the map; a track with unusable fields maps to
   * its ResolutionError so the rest of the batch still resolves.
   */
  async getTracks(ids: readonly string[]): Promise<Map<string, TrackInfo | ResolutionError>> {
    const tracks = new Map<string, TrackInfo | ResolutionError>();
    for (const batch of chunk(ids, TRACK_BATCH_SIZE)) {
      const payload = await this.getJson(this.endpoint('/api/tiny/tracks', { ids: batch.join(',') }));
      const envelope = parseWith(keyedResultSchema('tracks'), payload, `tracks ${batch.join(',')}`);
      const entities = envelope.result.tracks ?? {};
      for (const trackId of batch) {
        if (!Object.hasOwn(entities, trackId)) {
          continue;
        }
        const parsed = trackSchema.safeParse(entities[trackId]);
        if (!parsed.success) {
          tracks.set(trackId, ResolutionError.fromZodError(`track ${trackId}`, parsed.error));
          continue;
        }
        const track = parsed.data;
        tracks.set(trackId, {
          id: trackId,
          title: track.title,
          performer: track.credits,
          album: track.release_title,
          position: track.position,
          releaseDate: track.release_date,
        });
      }
    }
    return tracks;
  }

  async getStreamUrl(trackId: string, quality: string): Promise<string> {
    const payload = await this.getJson(
      this.endpoint('/api/tiny/track/stream', { id: trackId, quality }),
      false,
    );
    return parseWith(streamSchema, payload, `stream of track ${trackId}`).result.stream;
  }

  async getRelease(id: string): Promise<ReleaseInfo> {
    const subject = `release ${id}`;
    const entity = await this.getKeyedEntity('/api/tiny/releases', { ids: id }, 'releases', id, subject);
    const release = parseWith(releaseSchema, entity, subject);
    return {
      id,
      title: release.title,
      artist: release.credits,
      year: toYear(release.date),
      trackIds: release.track_ids,
    };
  }

  async getPlaylist(id: string): Promise<TrackListInfo> {
    const subject = `playlist ${id}`;
    const entity = await this.getKeyedEntity(
      '/api/tiny/playlists',
      { ids: id, include: 'track,release' },
      'playlists',
      id,
      subject,
    );
    const playlist = parseWith(trackListSchema, entity, subject);
    return { id, title: playlist.title, trackIds: playlist.track_ids };
  }

  async getSelection(id: string): Promise<TrackListInfo> {
    const subject = `selection ${id}`;
    const payload = await this.getJson(this.endpoint('/api/tiny/selection', { id, include: 'track' }));
    const envelope = parseWith(z.object({ result: z.object({ selection: trackListSchema }) }), payload, subject);
    const { selection } = envelope.result;
    return { id, title: selection.title, trackIds: selection.track_ids };
  }

  async getArtistReleaseIds(artistId: string): Promise<string[]> {
    const payload = await this.getJson(this.endpoint('/api/tiny/artists/releases', { artist_id: artistId }));
    const releases = parseWith(artistReleasesSchema, payload, `releases of artist ${artistId}`);
    return releases.result.map((release) => release.id);
  }

  async getPodcast(id: string): Promise<PodcastInfo> {
    const subject = `podcast ${id}`;
    const entity = await this.getKeyedEntity('/api/tiny/podcasts', { ids: id }, 'podcasts', id, subject);
    const podcast = parseWith(podcastSchema, entity, subject);
    return {
      id,
      title: podcast.title ?? `Podcast ${id}`,
      episodeIds: podcast.episodes.map((episode) => episode.id),
    };
  }

  async getEpisode(id: string): Promise<EpisodeInfo> {
    const subject = `episode ${id}`;
    const entity = await this.getKeyedEntity('/api/tiny/podcast_episodes', { id }, 'episodes', id, subject);
    const episode = parseWith(episodeSchema, entity, subject);
    return { id, title: episode.title, streamUrl: episode.stream_url };
  }

  /**
   * GraphQL over GET, so the request URL alone identifies the response.
   */
  private async graphQl(
    operationName: string,
    query: string,
    id: string,
    field: string,
    subject: string,
  ): Promise<unknown> {
    const numericId = Number.parseInt(id, 10);
    if (!Number.isSafeInteger(numericId)) {
      throw new ResolutionError(`${subject} has a non-numeric id`);
    }
    const url = this.endpoint('/api/v1/graphql', {
      operationName,
      query: query.replace(/\s+/g, ' ').trim(),
      variables: JSON.stringify({ id: numericId }),
    });
    const envelope = parseWith(graphQlEnvelopeSchema, await this.getJson(url), subject);
    if (envelope.errors && envelope.errors.length > 0) {
      throw new ResolutionError(
        `GraphQL error for ${subject}: ${envelope.errors.map((error) => error.message).join('; ')}`,
      );
    }
    const entity = envelope.data?.[field];
    if (entity === null || entity === undefined) {
      throw new ResolutionError(`${subject} was not found in the catalog response`);
    }
    return entity;
  }

  async getAudiobook(id: string): Promise<AudiobookInfo> {
    const subject = `audiobook ${id}`;
    const entity = await this.graphQl('getAudioBookData', AUDIOBOOK_QUERY, id, 'book', subject);
    const book = parseWith(audiobookSchema, entity, subject);
    return {
      id,
      title: book.title ?? `Unknown book ${id}`,
      author: book.authorName ?? 'Unknown author',
      chapters: book.chapters.map((chapter) => ({
        id: chapter.id,
        title: chapter.title ?? `Chapter ${chapter.id}`,
      })),
    };
  }

  async getChapter(id: string): Promise<ChapterInfo> {
    const subject = `chapter ${id}`;
    const entity = await this.graphQl('getAudioBookChapter', CHAPTER_QUERY, id, 'chapter', subject);
    const chapter = parseWith(chapterSchema, entity, subject);
    return { id, streamUrl: chapter.mid };
  }
}
