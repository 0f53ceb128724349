import { readFile, writeFile } from 'node:fs/promises';

import type { BlinkCredentials } from './blink-auth';
import { BlinkProtocolException } from './blink-exceptions';

const STRING_KEYS = [
  'username',
  'password',
  'token',
  'uid',
  'notificationKey',
  'deviceId',
  'regionId',
  'region'
] as const;
const NUMBER_KEYS = ['accountId', 'clientId'] as const;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** Keeps the known keys whose values have the right type; anything else in the file is ignored. */
export const parseCredentials = (value: unknown): BlinkCredentials | null => {
  if (!isRecord(value)) {
    return null;
  }

  const credentials: BlinkCredentials = {};
  for (const key of STRING_KEYS) {
    const field = value[key];
    if (typeof field === 'string') {
      credentials[key] = field;
    }
  }
  for (const key of NUMBER_KEYS) {
    const field = value[key];
    if (typeof field === 'number') {
      credentials[key] = field;
    }
  }

  return credentials;
};

/** Null when the file does not exist. */
export const loadCredentials = async (file: string): Promise<BlinkCredentials | null> => {
  let raw: string;
  try {
    raw = await readFile(file, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new BlinkProtocolException(file, null, raw, `File ${file} has improperly formatted json`);
  }

  const credentials = parseCredentials(parsed);
  if (!credentials) {
    throw new BlinkProtocolException(file, null, raw, `File ${file} holds no credentials object`);
  }

  return credentials;
};

export const saveCredentials = async (file: string, credentials: BlinkCredentials) => {
  await writeFile(file, `${JSON.stringify(credentials, null, 2)}\n`, 'utf8');
};
