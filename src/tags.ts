import path from 'node:path';
import fs from 'fs-extra';
import ffmpeg from 'fluent-ffmpeg';
import type { AudioTags } from './types.js';

/**
 * Rewrites the embedded tags of an audio file in place.
 */
export type TagWriter = (filePath: string, tags: AudioTags) => Promise<void>;

export const configureFfmpeg = (ffmpegPath?: string): void => {
  if (ffmpegPath) {
    ffmpeg.setFfmpegPath(ffmpegPath);
  }
};

/**
 * ffmpeg `-metadata` arguments. Keys are ffmpeg's generic names, which it maps
 * to Vorbis comments for FLAC and ID3 frames for MP3.
 */
export const buildMetadataArgs = (tags: AudioTags): string[] => {
  const entries: Array<[string, string]> = [
    ['artist', tags.artist],
    ['title', tags.title],
    ['album', tags.album],
    ['track', String(tags.trackNumber)],
    ['date', tags.year],
  ];
  return entries.filter(([, value]) => value.length > 0).flatMap(([key, value]) => ['-metadata', `${key}=${value}`]);
};

/**
 * Copies the streams unchanged into a sibling file with the new tags, then
 * replaces the original.
 */
export const writeTagsWithFfmpeg: TagWriter = async (filePath, tags) => {
  const extension = path.extname(filePath);
  const tempPath = `${filePath.slice(0, filePath.length - extension.length)}.tagging${extension}`;

  await new Promise<void>((resolve, reject) => {
    ffmpeg(filePath)
      // separate arguments: fluent-ffmpeg splits a single string on spaces
      .outputOptions('-map', '0', '-codec', 'copy', ...buildMetadataArgs(tags))
      .on('error', (error: Error) => {
        reject(error);
      })
      .on('end', () => {
        resolve();
      })
      .save(tempPath);
  }).catch(async (error: unknown) => {
    await fs.remove(tempPath);
    throw error;
  });

  await fs.move(tempPath, filePath, { overwrite: true });
};
