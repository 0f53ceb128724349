import { mkdir, writeFile } from 'node:fs/promises';

import { sleep } from './command-poller';
import type { BlinkLogger } from './logger';
import { fileExists, matchesCamera, videoFilePath } from './util';

export type DownloadOptions = {
  /** Clips created before this are skipped. */
  since?: Date;
  /** Camera name or names to keep; `'all'` keeps every camera. */
  camera?: string | string[];
  /** Milliseconds to wait after each download. */
  delay?: number;
  /** Log what would be downloaded without fetching anything. */
  debug?: boolean;
};

export type ClipSource = {
  cameraName: string;
  createdAt: string;
  deleted?: boolean;
  fetch: () => Promise<Buffer | null>;
};

/**
 * Writes each wanted clip to `dir` one at a time and returns the written paths. Clips whose file
 * already exists are left alone, so running twice over the same clips downloads nothing new.
 */
export const saveClips = async (
  dir: string,
  clips: ClipSource[],
  { since, camera = 'all', delay = 0, debug = false }: DownloadOptions,
  log: BlinkLogger
) => {
  const written: string[] = [];
  await mkdir(dir, { recursive: true });

  for (const clip of clips) {
    if (!matchesCamera(camera, clip.cameraName)) {
      continue;
    }

    const createdAt = Date.parse(clip.createdAt);
    if (since && (Number.isNaN(createdAt) || createdAt < since.getTime())) {
      log.debug(`Skipping clip from ${clip.cameraName} at ${clip.createdAt}, before cutoff`);
      continue;
    }

    const path = videoFilePath(dir, clip.cameraName, clip.createdAt);
    if (debug) {
      log.info(`Would download ${clip.cameraName} clip from ${clip.createdAt} to ${path}`);
      continue;
    }
    if (clip.deleted) {
      log.debug(`${path} was deleted on the server, skipping`);
      continue;
    }
    if (await fileExists(path)) {
      log.debug(`${path} already exists, skipping`);
      continue;
    }

    const data = await clip.fetch();
    if (!data) {
      continue;
    }

    await writeFile(path, data);
    log.info(`Downloaded video to ${path}`);
    written.push(path);

    if (delay > 0) {
      await sleep(delay);
    }
  }

  return written;
};
