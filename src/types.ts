export const RESOURCE_KINDS = [
  'track',
  'release',
  'playlist',
  'artist',
  'selection',
  'podcast',
  'audiobook',
] as const;

export type ResourceKind = (typeof RESOURCE_KINDS)[number];

export interface ResourceRef {
  readonly kind: ResourceKind;
  readonly id: string;
}

/**
 * A response as stored in and served from the response cache.
 */
export interface CachedResponse {
  readonly status: number;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: Buffer;
}

export interface Cookie {
  readonly domain: string;
  readonly includeSubdomains: boolean;
  readonly path: string;
  readonly secure: boolean;
  readonly expires: number;
  readonly name: string;
  readonly value: string;
  readonly httpOnly: boolean;
}

export interface Session {
  readonly authToken: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly cookies: readonly Cookie[];
}

export interface TrackInfo {
  readonly id: string;
  readonly title: string;
  readonly performer: string;
  readonly album: string;
  readonly position: number;
  readonly releaseDate: string;
}

export interface TrackMetadata extends TrackInfo {
  readonly streamUrl: string;
}

export interface DownloadTask {
  readonly sourceId: string;
  readonly outputPath: string;
}

export interface AudioTags {
  readonly artist: string;
  readonly title: string;
  readonly album: string;
  readonly trackNumber: number;
  readonly year: string;
}

export type TaskStatus = 'completed' | 'skipped' | 'failed';

export interface TaskResult {
  readonly id: string;
  readonly label: string;
  readonly status: TaskStatus;
  readonly reason?: string;
  readonly filePath?: string;
}
