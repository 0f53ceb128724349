import {
  requestCameraInfo,
  requestNetworkUpdate,
  requestSyncEvents,
  requestSyncModule,
  requestSystemArm,
  requestSystemDisarm,
  requestVideos
} from './blink-api';
import type BlinkAuth from './blink-auth';
import { BlinkProtocolException } from './blink-exceptions';
import BlinkCamera, { type CameraOwner, type CommandOptions } from './blink-camera';
import type CommandPoller from './command-poller';
import type { CommandResult } from './command-poller';
import { ONLINE_STATUS } from './constants';
import LocalStorage from './local-storage';
import type { BlinkLogger } from './logger';
import NameIndex from './name-index';
import { type DownloadOptions, saveClips } from './save-clips';
import { isThrottled, THROTTLED, type Throttled } from './throttle';
import { toAlphanumeric } from './util';
import type {
  BlinkDeviceResponse,
  BlinkSyncModuleSummary,
  MotionEvent,
  ProductType,
  SummaryResponse
} from './types';

export type CameraSeed = {
  id: number;
  name: string;
  productType: ProductType;
};

export type RefreshFailure = {
  entity: string;
  error: unknown;
};

export type RefreshReport = {
  failures: RefreshFailure[];
};

type DeviceListKey = 'cameras' | 'owls' | 'doorbells';

const HOMESCREEN_KEYS: Record<ProductType, DeviceListKey> = {
  catalina: 'cameras',
  owl: 'owls',
  lotus: 'doorbells'
};

export default class BlinkSyncModule implements CameraOwner {
  readonly auth: BlinkAuth;
  readonly poller: CommandPoller;

  private _name: string;
  private _networkId: number;
  private _syncId: number | null = null;
  private _serial: string | null = null;
  private _status: string | null = null;
  private _armed: boolean | null = null;
  private _seeds: CameraSeed[];
  private _cameras = new NameIndex<BlinkCamera>();
  private _motion = new NameIndex<boolean>();
  private _lastRecord = new NameIndex<MotionEvent>();
  private _localStorage: LocalStorage | null = null;
  private _localStorageStatus: string | null = null;
  private _lastRefresh: Date | null = null;
  private _log: BlinkLogger;

  constructor(
    auth: BlinkAuth,
    poller: CommandPoller,
    name: string,
    networkId: number,
    cameras: CameraSeed[]
  ) {
    this.auth = auth;
    this.poller = poller;
    this._name = name;
    this._networkId = networkId;
    this._seeds = cameras;
    this._log = auth.options.logger;
  }

  get name() {
    return this._name;
  }

  get networkId() {
    return this._networkId;
  }

  get syncId() {
    return this._syncId;
  }

  get serial() {
    return this._serial;
  }

  get status() {
    return this._status;
  }

  get online() {
    return this._status === ONLINE_STATUS;
  }

  /** Arm state as of the last refresh; null before the first homescreen was read. */
  get armed() {
    return this._armed;
  }

  get cameras() {
    return this._cameras;
  }

  get localStorage() {
    return this._localStorage;
  }

  get localStorageActive() {
    return this._localStorage !== null && this._localStorageStatus === 'active';
  }

  get lastRefresh() {
    return this._lastRefresh;
  }

  get attributes() {
    return {
      name: this._name,
      id: this._syncId,
      networkId: this._networkId,
      serial: this._serial,
      status: this._status,
      armed: this._armed,
      region: this.auth.region,
      regionId: this.auth.regionId,
      localStorage: this.localStorageActive,
      lastRefresh: this._lastRefresh
    };
  }

  motionFor = (cameraName: string) => this._motion.get(cameraName) ?? false;

  lastRecordFor = (cameraName: string) => this._lastRecord.get(cameraName);

  /**
   * Reads the hub summary and builds every camera. A camera whose first update fails is kept with
   * default values and reported, so one bad camera never drops out of the model.
   */
  start = async (homescreen: SummaryResponse): Promise<RefreshReport> => {
    const summary =
      (await this._readSyncModule()) ??
      homescreen.sync_modules?.find(syncModule => syncModule.network_id === this._networkId);

    if (summary) {
      this._applySummary(summary);
    } else {
      this._log.warn(`Network ${this._name} has no sync module, using defaults`);
    }

    for (const seed of this._seeds) {
      this._cameras.set(
        seed.name,
        new BlinkCamera(this, seed.id, seed.name, this._networkId, seed.productType)
      );
    }

    return this.refresh(homescreen, { force: true });
  };

  /**
   * Updates the existing cameras in place. Cameras refresh concurrently; each camera's own calls
   * run in order. A camera that fails keeps its previous state and is listed in the report.
   */
  refresh = async (
    homescreen: SummaryResponse | null,
    { force = false } = {}
  ): Promise<RefreshReport> => {
    const failures: RefreshFailure[] = [];
    const startedAt = new Date();

    if (homescreen) {
      this._applyHomescreen(homescreen);
    }

    try {
      await this._checkNewVideos();
    } catch (error) {
      this._log.error(`Could not check new videos for ${this._name}`, error);
      failures.push({ entity: `sync module ${this._name}`, error });
    }

    const results = await Promise.all(
      this._cameras.values().map(async camera => {
        try {
          const config = await this._cameraConfig(camera, homescreen);
          await camera.update(config, { forceCache: force });
          return null;
        } catch (error) {
          this._log.error(`Could not refresh camera ${camera.name}`, error);
          return { entity: `camera ${camera.name}`, error };
        }
      })
    );

    for (const failure of results) {
      if (failure) {
        failures.push(failure);
      }
    }

    if (failures.length === 0) {
      this._lastRefresh = startedAt;
    }

    return { failures };
  };

  arm = async (
    value = true,
    { force = false }: CommandOptions = {}
  ): Promise<CommandResult | null | Throttled> => {
    const operation = value ? requestSystemArm : requestSystemDisarm;
    const kind = value ? 'arm' : 'disarm';
    const response = force
      ? await operation.force(this.auth, this._networkId)
      : await operation(this.auth, this._networkId);

    if (isThrottled(response)) {
      this._log.debug(`Skipped ${kind} of ${this._name}, called too recently`);
      return THROTTLED;
    }

    const command = this.poller.toCommand(kind, response);
    return command ? this.poller.wait(command) : null;
  };

  disarm = (options?: CommandOptions) => this.arm(false, options);

  /** Asks the hub to push fresh status for every camera on the network. */
  updateNetwork = () =>
    this.poller.run('network-update', () => requestNetworkUpdate(this.auth, this._networkId));

  /** Raw event log of the network; null when read too recently. */
  getEvents = async ({ force = false }: CommandOptions = {}) => {
    const response = force
      ? await requestSyncEvents.force(this.auth, this._networkId)
      : await requestSyncEvents(this.auth, this._networkId);

    return isThrottled(response) ? null : response.event ?? [];
  };

  updateLocalStorageManifest = async () => {
    if (!this._localStorage) {
      this._log.warn(`Local storage is not available on ${this._name}`);
      return null;
    }

    return this._localStorage.updateManifest();
  };

  /** Retrieves clips from the hub's local storage and writes them to `dir`. */
  downloadLocalStorageClips = async (dir: string, options: DownloadOptions = {}) => {
    const localStorage = this._localStorage;
    const clips = await this.updateLocalStorageManifest();
    if (!localStorage || !clips) {
      return [];
    }

    return saveClips(
      dir,
      clips.map(clip => ({
        cameraName: clip.cameraName,
        createdAt: clip.createdAt,
        fetch: () => localStorage.download(clip)
      })),
      options,
      this._log
    );
  };

  /** Networks holding only minis or doorbells have no hub; the server answers those with a 4xx. */
  private _readSyncModule = async () => {
    try {
      const response = await requestSyncModule(this.auth, this._networkId);
      return response.syncmodule;
    } catch (error) {
      const status = error instanceof BlinkProtocolException ? error.status ?? 0 : 0;
      if (status >= 400 && status < 500) {
        this._log.debug(`Network ${this._name} has no hub (${status})`);
        return undefined;
      }
      throw error;
    }
  };

  private _applySummary = (summary: BlinkSyncModuleSummary) => {
    this._syncId = summary.id;
    this._name = summary.name ?? this._name;
    this._serial = summary.serial ?? null;
    this._status = summary.status ?? null;

    if (summary.local_storage_enabled || summary.local_storage_compatible) {
      this._localStorage =
        this._localStorage ?? new LocalStorage(this.auth, this._networkId, summary.id);
    }
  };

  private _applyHomescreen = (homescreen: SummaryResponse) => {
    const network = homescreen.networks?.find(n => n.id === this._networkId);
    if (typeof network?.armed === 'boolean') {
      this._armed = network.armed;
    }

    const summary = homescreen.sync_modules?.find(s => s.network_id === this._networkId);
    if (summary) {
      this._status = summary.status ?? this._status;
      this._localStorageStatus = summary.local_storage_status ?? this._localStorageStatus;
    }
  };

  private _checkNewVideos = async () => {
    const reference = this._lastRefresh ?? new Date();
    const since = new Date(reference.getTime() - this.auth.options.motionIntervalMs);
    const response = await requestVideos(this.auth, since, 1);
    const motion = new NameIndex<boolean>();

    for (const name of this._cameras.names()) {
      motion.set(name, false);
    }

    for (const entry of response.media ?? []) {
      if (this._cameras.has(entry.device_name)) {
        const event = { clip: entry.media, time: entry.created_at };
        this._recordMotion(motion, entry.device_name, event);
      }
    }

    if (this.localStorageActive) {
      await this._checkLocalStorageVideos(motion, since);
    }

    this._motion = motion;
  };

  /**
   * Manifest camera names drop spaces and punctuation ("BackDoor" for "Back Door"), so they are
   * matched on their letters and digits only. A recent clip is uploaded before it is recorded.
   */
  private _checkLocalStorageVideos = async (motion: NameIndex<boolean>, since: Date) => {
    const localStorage = this._localStorage;
    if (!localStorage || !(await localStorage.updateManifest())) {
      return;
    }

    const names = new Map(this._cameras.names().map(name => [toAlphanumeric(name), name]));
    for (const clip of localStorage.manifest) {
      const name = names.get(toAlphanumeric(clip.cameraName));
      if (!name || Date.parse(clip.createdAt) < since.getTime()) {
        continue;
      }

      if (await localStorage.prepareDownload(clip)) {
        this._recordMotion(motion, name, { clip: clip.path, time: clip.createdAt });
      }
    }
  };

  private _recordMotion = (motion: NameIndex<boolean>, name: string, event: MotionEvent) => {
    motion.set(name, true);
    const previous = this._lastRecord.get(name);
    if (!previous || Date.parse(event.time) > Date.parse(previous.time)) {
      this._lastRecord.set(name, event);
    }
  };

  private _cameraConfig = async (
    camera: BlinkCamera,
    homescreen: SummaryResponse | null
  ): Promise<BlinkDeviceResponse> => {
    const summary = homescreen?.[HOMESCREEN_KEYS[camera.productType]]?.find(
      device => device.id === camera.id
    );

    if (camera.productType === 'catalina') {
      const info = await requestCameraInfo(this.auth, this._networkId, camera.id);
      const config = info.camera?.[0];
      if (config) {
        return { ...config, thumbnail: config.thumbnail ?? summary?.thumbnail };
      }
    }

    if (summary) {
      return summary;
    }

    this._log.warn(`No configuration for camera ${camera.name}, keeping cached values`);
    return { id: camera.id };
  };
}
