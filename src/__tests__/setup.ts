import { afterEach } from 'vitest';
import { removeTempDirs } from './helpers.js';

afterEach(async () => {
  await removeTempDirs();
});
