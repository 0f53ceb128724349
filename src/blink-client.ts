import {
  requestCameraUsage,
  requestDeleteVideos,
  requestHomescreen,
  requestLogout,
  requestMedia,
  requestNetworks,
  requestVideoCount,
  requestVideos
} from './blink-api';
import BlinkAuth, { type AuthState, type BlinkCredentials } from './blink-auth';
import type BlinkCamera from './blink-camera';
import { BlinkException } from './blink-exceptions';
import BlinkSyncModule, { type CameraSeed, type RefreshReport } from './blink-sync-module';
import CommandPoller from './command-poller';
import { type BlinkClientOptions, type ResolvedOptions, resolveOptions } from './config';
import { saveCredentials } from './credentials-store';
import type { BlinkLogger } from './logger';
import NameIndex from './name-index';
import { type DownloadOptions, saveClips } from './save-clips';
import { isThrottled, throttle } from './throttle';
import type {
  BlinkDeviceResponse,
  BlinkNetwork,
  ProductType,
  SummaryResponse,
  VideoResponse
} from './types';

export type VideoDownloadOptions = DownloadOptions & {
  /** Pages are read from 1 up to, but not including, this one. */
  stop?: number;
};

const DEFAULT_DOWNLOAD_PAGES = 10;
const DEFAULT_DOWNLOAD_DELAY_MS = 1000;

const mergeReports = (reports: RefreshReport[]): RefreshReport => ({
  failures: reports.flatMap(report => report.failures)
});

const isDownloadable = (video: Partial<VideoResponse>): video is VideoResponse =>
  typeof video.device_name === 'string' &&
  typeof video.created_at === 'string' &&
  typeof video.media === 'string';

const seedsFrom = (
  devices: BlinkDeviceResponse[] | undefined,
  networkId: number,
  productType: ProductType
): CameraSeed[] =>
  (devices ?? [])
    .filter(device => device.network_id === networkId)
    .map(device => ({
      id: device.id,
      name: device.name ?? `${productType} ${device.id}`,
      productType
    }));

export default class BlinkClient {
  readonly auth: BlinkAuth;
  readonly poller: CommandPoller;
  readonly options: ResolvedOptions;

  private _networks: BlinkNetwork[] = [];
  private _syncModules = new NameIndex<BlinkSyncModule>();
  private _homescreen: SummaryResponse | null = null;
  private _lastRefresh: Date | null = null;
  private _log: BlinkLogger;

  private static _refreshGate = throttle(
    (client: BlinkClient) => client.options.refreshRateMs,
    (client: BlinkClient, force: boolean) => client._refreshAll(force)
  );

  constructor(credentials: BlinkCredentials, options: BlinkClientOptions = {}) {
    this.options = resolveOptions(options);
    this._log = this.options.logger;
    this.auth = new BlinkAuth(credentials, this.options);
    this.poller = new CommandPoller(this.auth);
  }

  get networks() {
    return this._networks;
  }

  get syncModules() {
    return this._syncModules;
  }

  /** Every camera of every sync module, looked up by name regardless of case. */
  get cameras() {
    const cameras = new NameIndex<BlinkCamera>();
    for (const syncModule of this._syncModules.values()) {
      for (const [name, camera] of syncModule.cameras.entries()) {
        cameras.set(name, camera);
      }
    }

    return cameras;
  }

  get homescreen() {
    return this._homescreen;
  }

  get lastRefresh() {
    return this._lastRefresh;
  }

  get accountId() {
    return this.auth.accountId;
  }

  get region() {
    return this.auth.region;
  }

  get regionId() {
    return this.auth.regionId;
  }

  /**
   * Logs in, or resumes a saved token, and discovers the account. Stops at
   * `verification-required` until {@link sendAuthKey} and {@link setupPostVerify} are called.
   */
  start = async (nameOrId?: string | number): Promise<AuthState> => {
    const state = await this.auth.startup();
    if (state !== 'authenticated') {
      return state;
    }

    await this.setupPostVerify(nameOrId);
    return state;
  };

  sendAuthKey = (code: string) => this.auth.sendAuthKey(code);

  /** Discovers networks, sync modules and cameras. */
  setupPostVerify = async (nameOrId?: string | number): Promise<RefreshReport> => {
    await this.getIds(nameOrId);

    const homescreen = await requestHomescreen.force(this.auth);
    const usage = await requestCameraUsage(this.auth);

    const syncModules = this._networks.map(network => {
      const usageCameras = usage.networks?.find(n => n.network_id === network.id)?.cameras ?? [];
      const seeds: CameraSeed[] = usageCameras.map(camera => ({
        id: camera.id,
        name: camera.name,
        productType: 'catalina'
      }));

      for (const seed of seedsFrom(homescreen.cameras, network.id, 'catalina')) {
        if (!seeds.some(existing => existing.id === seed.id)) {
          seeds.push(seed);
        }
      }
      seeds.push(
        ...seedsFrom(homescreen.owls, network.id, 'owl'),
        ...seedsFrom(homescreen.doorbells, network.id, 'lotus')
      );

      this._log.debug(`Network ${network.name} has ${seeds.length} cameras`);
      return new BlinkSyncModule(this.auth, this.poller, network.name, network.id, seeds);
    });

    const reports = await Promise.all(syncModules.map(syncModule => syncModule.start(homescreen)));

    const index = new NameIndex<BlinkSyncModule>();
    for (const syncModule of syncModules) {
      index.set(syncModule.name, syncModule);
    }

    this._syncModules = index;
    this._homescreen = homescreen;
    const report = mergeReports(reports);
    if (report.failures.length === 0) {
      this._lastRefresh = new Date();
    }

    return report;
  };

  /** Selects the networks to manage; all of them unless `nameOrId` names one. */
  getIds = async (nameOrId?: string | number) => {
    const response = await requestNetworks(this.auth);
    const networks: BlinkNetwork[] = (response.networks ?? []).map(network => ({
      id: network.id,
      name: network.name ?? `${network.id}`,
      armed: network.armed ?? false
    }));

    if (nameOrId === undefined) {
      if (!networks.length) {
        throw new BlinkException('No networks found');
      }
      this._networks = networks;
      return this._networks;
    }

    const selected = networks.filter(
      network => `${network.id}` === `${nameOrId}` || network.name === nameOrId
    );
    if (!selected.length) {
      throw new BlinkException(`No network found for ${nameOrId}`);
    }

    this._networks = selected;
    return this._networks;
  };

  /**
   * Refreshes every sync module, at most once per `refreshRateMs` unless `force` is set. A
   * skipped refresh returns `THROTTLED` and leaves the model untouched.
   */
  refresh = ({ force = false } = {}) =>
    force ? BlinkClient._refreshGate.force(this, true) : BlinkClient._refreshGate(this, false);

  /** Downloads clips from the cloud into `dir` and returns the paths written. */
  downloadVideos = async (
    dir: string,
    {
      since,
      camera = 'all',
      stop = DEFAULT_DOWNLOAD_PAGES,
      delay = DEFAULT_DOWNLOAD_DELAY_MS,
      debug = false
    }: VideoDownloadOptions = {}
  ) => {
    const cutoff = since ?? this._lastRefresh ?? new Date(0);
    const written: string[] = [];

    for (let page = 1; page < stop; page++) {
      const response = await requestVideos(this.auth, cutoff, page);
      const media = response.media ?? [];
      if (!media.length) {
        this._log.debug(`No videos on page ${page}, done`);
        break;
      }

      const clips = media.filter(isDownloadable).map(video => ({
        cameraName: video.device_name,
        createdAt: video.created_at,
        deleted: video.deleted,
        fetch: () => requestMedia(this.auth, `${this.auth.urls.baseUrl}${video.media}`)
      }));

      written.push(
        ...(await saveClips(dir, clips, { since: cutoff, camera, delay, debug }, this._log))
      );
    }

    return written;
  };

  deleteVideos = (videoIds: number[]) => requestDeleteVideos(this.auth, videoIds);

  /** Null when the count was read too recently. */
  getVideoCount = async () => {
    const response = await requestVideoCount(this.auth);
    if (isThrottled(response)) {
      return null;
    }

    return response.count ?? null;
  };

  saveCredentials = (file: string) => saveCredentials(file, this.auth.loginAttributes);

  logout = () => requestLogout(this.auth);

  private _refreshAll = async (force: boolean): Promise<RefreshReport> => {
    const homescreen = force
      ? await requestHomescreen.force(this.auth)
      : await requestHomescreen(this.auth);

    if (isThrottled(homescreen)) {
      this._log.debug('Homescreen read too recently, using the cached copy');
    } else {
      this._homescreen = homescreen;
    }

    const reports = await Promise.all(
      this._syncModules
        .values()
        .map(syncModule => syncModule.refresh(this._homescreen, { force }))
    );

    const report = mergeReports(reports);
    if (report.failures.length === 0) {
      this._lastRefresh = new Date();
    } else {
      this._log.warn(`Refresh finished with ${report.failures.length} failures`);
    }

    return report;
  };
}
