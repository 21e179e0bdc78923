import type { CatalogDownloader } from './downloaders.js';
import type { ResourceRef, TaskResult } from './types.js';

export type KindDownloaders = Pick<
  CatalogDownloader,
  | 'downloadTrack'
  | 'downloadRelease'
  | 'downloadPlaylist'
  | 'downloadArtist'
  | 'downloadSelection'
  | 'downloadPodcast'
  | 'downloadAudiobook'
>;

export interface Dispatcher {
  dispatch(ref: ResourceRef): Promise<TaskResult[]>;
}

/**
 * Routes a resolved link to the download routine for its kind.
 */
export const createDispatcher = (downloaders: KindDownloaders): Dispatcher => ({
  dispatch: (ref) => {
    switch (ref.kind) {
      case 'track':
        return downloaders.downloadTrack(ref.id);
      case 'release':
        return downloaders.downloadRelease(ref.id);
      case 'playlist':
        return downloaders.downloadPlaylist(ref.id);
      case 'artist':
        return downloaders.downloadArtist(ref.id);
      case 'selection':
        return downloaders.downloadSelection(ref.id);
      case 'podcast':
        return downloaders.downloadPodcast(ref.id);
      case 'audiobook':
        return downloaders.downloadAudiobook(ref.id);
      default: {
        const unreachable: never = ref.kind;
        throw new Error(`Unsupported resource kind: ${String(unreachable)}`);
      }
    }
  },
});
