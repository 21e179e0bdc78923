import { describe, expect, it } from 'vitest';
import { resolveLink } from '../resolver.js';

describe('resolveLink', () => {
  it('resolves a track link', () => {
    expect(resolveLink('https://zvuk.com/track/12776890')).toEqual({ kind: 'track', id: '12776890' });
  });

  it('returns the same result for the same input', () => {
    const link = 'https://zvuk.com/track/12776890';
    expect(resolveLink(link)).toEqual(resolveLink(link));
  });

  it.each([
    ['https://zvuk.com/release/29015282', 'release', '29015282'],
    ['https://zvuk.com/playlist/8545187', 'playlist', '8545187'],
    ['https://zvuk.com/artist/852542', 'artist', '852542'],
    ['https://zvuk.com/selection/1', 'selection', '1'],
    ['https://zvuk.com/podcast/14574115', 'podcast', '14574115'],
    ['https://zvuk.com/abook/24072774', 'audiobook', '24072774'],
  ])('classifies %s', (link, kind, id) => {
    expect(resolveLink(link)).toEqual({ kind, id });
  });

  it('stops the id at the next path segment, query or fragment', () => {
    expect(resolveLink('https://zvuk.com/release/42/tracks')).toEqual({ kind: 'release', id: '42' });
    expect(resolveLink('https://zvuk.com/release/42?utm_source=share')).toEqual({ kind: 'release', id: '42' });
    expect(resolveLink('https://zvuk.com/playlist/7#top')).toEqual({ kind: 'playlist', id: '7' });
  });

  it('checks markers in their fixed order', () => {
    expect(resolveLink('https://zvuk.com/artist/5/track/3')).toEqual({ kind: 'track', id: '3' });
  });

  it('returns null for unrecognized links', () => {
    expect(resolveLink('https://example.com/foo/1')).toBeNull();
    expect(resolveLink('not a link')).toBeNull();
    expect(resolveLink('https://zvuk.com/track/')).toBeNull();
  });
});
