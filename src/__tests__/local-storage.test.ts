import { beforeEach, describe, expect, it } from 'vitest';

import BlinkAuth from '../blink-auth';
import { resolveOptions } from '../config';
import LocalStorage from '../local-storage';
import FakeBlinkServer, {
  BASE_URL,
  LOCAL_STORAGE,
  localStorageClip,
  NETWORK_ID,
  REQUEST_MANIFEST,
  savedSession,
  SYNC_ID,
  testOptions
} from './helpers/fake-blink-server';

const READ_MANIFEST = `GET ${LOCAL_STORAGE}/manifest/request/9001`;
const CLIP_PATH = localStorageClip('c1');

const MANIFEST = {
  manifest_id: 'm-1',
  clips: [
    { id: 'c1', size: 1024, camera_name: 'Front Door', created_at: '2024-03-01T10:00:00+00:00' }
  ]
};

describe('LocalStorage', () => {
  let server: FakeBlinkServer;
  let storage: LocalStorage;

  const routes = () => server.calls.map(call => `${call.method} ${call.path}`);

  beforeEach(async () => {
    server = new FakeBlinkServer().on(REQUEST_MANIFEST, {
      data: { id: 9001, network_id: NETWORK_ID }
    });

    const auth = new BlinkAuth(savedSession, resolveOptions(testOptions(server)));
    await auth.startup();
    storage = new LocalStorage(auth, NETWORK_ID, SYNC_ID);
  });

  it('polls the manifest until it lists clips', async () => {
    server.on(READ_MANIFEST, { data: {} }, { data: MANIFEST });

    const clips = await storage.updateManifest();

    expect(clips).toEqual([
      {
        id: 'c1',
        cameraName: 'Front Door',
        createdAt: '2024-03-01T10:00:00+00:00',
        size: '1024',
        manifestId: 'm-1',
        path: CLIP_PATH,
        url: `${BASE_URL}${CLIP_PATH}`
      }
    ]);
    expect(storage.manifestId).toBe('m-1');
    expect(routes()).toEqual([REQUEST_MANIFEST, READ_MANIFEST, READ_MANIFEST]);
  });

  it('gives up when the manifest request is not accepted', async () => {
    server.on(REQUEST_MANIFEST, { data: { network_id: NETWORK_ID } });

    await expect(storage.updateManifest()).resolves.toBeNull();
    expect(routes()).toEqual([REQUEST_MANIFEST]);
  });

  it('keeps the previous manifest when a new one never arrives', async () => {
    server.on(READ_MANIFEST, { data: MANIFEST });
    await storage.updateManifest();
    server.on(READ_MANIFEST, { data: { clips: [] } });

    await expect(storage.updateManifest()).resolves.toBeNull();

    expect(storage.manifest).toHaveLength(1);
    expect(server.count(READ_MANIFEST)).toBe(5);
  });

  it('requests the upload until it is accepted and then downloads the clip', async () => {
    server
      .on(READ_MANIFEST, { data: MANIFEST })
      .on(`POST ${CLIP_PATH}`, { data: {} }, { data: { id: 9002, network_id: NETWORK_ID } })
      .on(`GET ${CLIP_PATH}`, { data: Buffer.from('local-clip') });
    const [clip] = (await storage.updateManifest()) ?? [];

    const data = await storage.download(clip);

    expect(data?.toString()).toBe('local-clip');
    expect(routes().slice(2)).toEqual([
      `POST ${CLIP_PATH}`,
      `POST ${CLIP_PATH}`,
      `GET ${CLIP_PATH}`
    ]);
  });

  it('does not download a clip whose upload was never accepted', async () => {
    server.on(READ_MANIFEST, { data: MANIFEST }).on(`POST ${CLIP_PATH}`, { data: {} });
    const [clip] = (await storage.updateManifest()) ?? [];

    await expect(storage.download(clip)).resolves.toBeNull();
    expect(server.count(`POST ${CLIP_PATH}`)).toBe(4);
    expect(server.count(`GET ${CLIP_PATH}`)).toBe(0);
  });
});
