import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { BlinkProtocolException } from '../blink-exceptions';
import { loadCredentials, parseCredentials, saveCredentials } from '../credentials-store';

describe('credentials store', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'blink-credentials-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads nothing when the file is missing', async () => {
    await expect(loadCredentials(join(dir, 'missing.json'))).resolves.toBeNull();
  });

  it('writes pretty JSON that loads back', async () => {
    const file = join(dir, 'credentials.json');
    const credentials = { username: 'user@example.com', token: 'test-token', accountId: 1001 };

    await saveCredentials(file, credentials);

    expect(await readFile(file, 'utf8')).toBe(
      '{\n  "username": "user@example.com",\n  "token": "test-token",\n  "accountId": 1001\n}\n'
    );
    await expect(loadCredentials(file)).resolves.toEqual(credentials);
  });

  it('rejects a file that is not JSON', async () => {
    const file = join(dir, 'broken.json');
    await writeFile(file, '{ "username": ', 'utf8');

    await expect(loadCredentials(file)).rejects.toBeInstanceOf(BlinkProtocolException);
  });

  it('rejects JSON that is not an object', async () => {
    const file = join(dir, 'list.json');
    await writeFile(file, '["user@example.com"]', 'utf8');

    await expect(loadCredentials(file)).rejects.toBeInstanceOf(BlinkProtocolException);
  });

  it('drops unknown keys and values of the wrong type', () => {
    expect(
      parseCredentials({ username: 'user@example.com', accountId: '1001', host: 'example.com' })
    ).toEqual({ username: 'user@example.com' });
  });
});
