import { access } from 'node:fs/promises';
import { join } from 'node:path';

/** Lowercase ASCII slug: every run of other characters becomes a single dash. */
export const slugify = (text: string) =>
  text
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');

/** Lowercased letters and digits only. */
export const toAlphanumeric = (text: string) => text.toLowerCase().replace(/[^a-z0-9]/g, '');

/** `<dir>/<slug of camera-createdAt>.mp4`, stable for a given clip. */
export const videoFilePath = (dir: string, cameraName: string, createdAt: string) =>
  join(dir, `${slugify(`${cameraName}-${createdAt}`)}.mp4`);

export const fileExists = async (path: string) => {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
};

/** Matches a camera filter; `'all'` and an empty list match every camera. */
export const matchesCamera = (filter: string | string[], cameraName: string) => {
  const names = (Array.isArray(filter) ? filter : [filter]).map(name => name.trim().toLowerCase());
  if (names.length === 0 || names.includes('all')) {
    return true;
  }

  return names.includes(cameraName.trim().toLowerCase());
};
