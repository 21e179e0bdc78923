import type { ResourceKind, ResourceRef } from './types.js';

/**
 * Path markers in match order. The first one found in a link wins.
 */
export const LINK_MARKERS: ReadonlyArray<readonly [marker: string, kind: ResourceKind]> = [
  ['/track/', 'track'],
  ['/release/', 'release'],
  ['/playlist/', 'playlist'],
  ['/artist/', 'artist'],
  ['/selection/', 'selection'],
  ['/podcast/', 'podcast'],
  ['/abook/', 'audiobook'],
];

/**
 * Classifies a catalog link, e.g. `https://zvuk.com/release/29015282`.
 * Returns null when no marker matches or the id after it is empty.
 */
export const resolveLink = (link: string): ResourceRef | null => {
  for (const [marker, kind] of LINK_MARKERS) {
    const start = link.indexOf(marker);
    if (start === -1) {
      continue;
    }
    const rest = link.slice(start + marker.length);
    const id = rest.split(/[/?#]/, 1)[0] ?? '';
    return id.length > 0 ? { kind, id } : null;
  }
  return null;
};
