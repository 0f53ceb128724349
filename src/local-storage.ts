import {
  getLocalStorageManifest,
  localStorageClipPath,
  requestLocalStorageClip,
  requestLocalStorageManifest,
  requestMedia
} from './blink-api';
import type BlinkAuth from './blink-auth';
import { type PollBudget, pollUntil } from './command-poller';
import { LOCAL_STORAGE_MAX_POLLS } from './constants';
import type { BlinkLogger } from './logger';
import type { LocalStorageManifestResponse } from './types';

export type LocalStorageClip = {
  id: string;
  cameraName: string;
  createdAt: string;
  size: string | null;
  manifestId: string;
  /** Clip location relative to the regional base URL. */
  path: string;
  url: string;
};

/**
 * Clips kept on a sync module's USB storage. Getting one takes four round trips: request a
 * manifest, poll until it is built, ask the module to upload the clip, then download it.
 */
export default class LocalStorage {
  private _auth: BlinkAuth;
  private _networkId: number;
  private _syncId: number;
  private _manifest: LocalStorageClip[] = [];
  private _manifestId: string | null = null;
  private _updatedAt: Date | null = null;
  private _log: BlinkLogger;

  constructor(auth: BlinkAuth, networkId: number, syncId: number) {
    this._auth = auth;
    this._networkId = networkId;
    this._syncId = syncId;
    this._log = auth.options.logger;
  }

  get manifest() {
    return this._manifest;
  }

  get manifestId() {
    return this._manifestId;
  }

  /** Null until a manifest has been retrieved. */
  get updatedAt() {
    return this._updatedAt;
  }

  /**
   * Requests a fresh manifest and waits for it. Returns null, keeping the previous manifest, when
   * the sync module did not produce one within the poll budget.
   */
  updateManifest = async (): Promise<LocalStorageClip[] | null> => {
    const request = await requestLocalStorageManifest(this._auth, this._networkId, this._syncId);
    if (typeof request.id !== 'number') {
      this._log.warn(`Sync module ${this._syncId} did not accept a manifest request`);
      return null;
    }

    const manifestRequestId = request.id;
    const result = await pollUntil(
      async () => {
        const response = await getLocalStorageManifest(
          this._auth,
          this._networkId,
          this._syncId,
          manifestRequestId
        );
        return { done: Array.isArray(response.clips) && !!response.manifest_id, value: response };
      },
      this._budget()
    );

    if (!result.done) {
      this._log.warn(`Manifest ${manifestRequestId} not ready after ${result.attempts} polls`);
      return null;
    }

    this._applyManifest(result.value);
    return this._manifest;
  };

  /**
   * Asks the sync module to upload the clip, repeating the request until the server answers with
   * an upload id. False when it never did.
   */
  prepareDownload = async (clip: LocalStorageClip) => {
    const result = await pollUntil(async () => {
      const response = await requestLocalStorageClip(this._auth, clip.url);
      return { done: typeof response.id === 'number', value: response };
    }, this._budget());

    if (!result.done) {
      this._log.warn(
        `Clip ${clip.id} from ${clip.cameraName} not uploaded after ${result.attempts} requests`
      );
    }

    return result.done;
  };

  /** Uploads and downloads one clip. Null when the upload was never accepted. */
  download = async (clip: LocalStorageClip) => {
    if (!(await this.prepareDownload(clip))) {
      return null;
    }

    return requestMedia(this._auth, clip.url);
  };

  private _budget = (): PollBudget => ({
    intervalMs: this._auth.options.commandPoll.intervalMs,
    timeoutMs: this._auth.options.commandPoll.timeoutMs,
    maxAttempts: LOCAL_STORAGE_MAX_POLLS
  });

  private _applyManifest = (response: LocalStorageManifestResponse) => {
    const manifestId = response.manifest_id ?? '';

    this._manifestId = manifestId;
    this._manifest = (response.clips ?? []).map(clip => {
      const path = localStorageClipPath(
        this._auth,
        this._networkId,
        this._syncId,
        manifestId,
        clip.id
      );

      return {
        id: clip.id,
        cameraName: clip.camera_name,
        createdAt: clip.created_at,
        size: clip.size === undefined ? null : String(clip.size),
        manifestId,
        path,
        url: `${this._auth.urls.baseUrl}${path}`
      };
    });
    this._updatedAt = new Date();
  };
}
