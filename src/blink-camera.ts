import { writeFile } from 'node:fs/promises';

import {
  type CameraTarget,
  requestCameraLiveview,
  requestCameraSensors,
  requestMedia,
  requestMotionDetectionDisable,
  requestMotionDetectionEnable,
  requestNewImage,
  requestNewVideo
} from './blink-api';
import type BlinkAuth from './blink-auth';
import { BlinkProtocolException } from './blink-exceptions';
import type CommandPoller from './command-poller';
import type { CommandKind, CommandResult } from './command-poller';
import type { BlinkLogger } from './logger';
import { isThrottled, THROTTLED, type Throttled, type ThrottledOperation } from './throttle';
import type {
  BlinkDeviceResponse,
  CachedMedia,
  CommandResponse,
  MotionEvent,
  ProductType
} from './types';

/** What a camera needs from the sync module that owns it. */
export interface CameraOwner {
  readonly auth: BlinkAuth;
  readonly poller: CommandPoller;
  readonly name: string;
  motionFor(cameraName: string): boolean;
  lastRecordFor(cameraName: string): MotionEvent | undefined;
}

export type CommandOptions = {
  force?: boolean;
};

type CameraData = {
  name: string;
  serial: string | null;
  motionEnabled: boolean | null;
  battery: string | null;
  batteryVoltage: number | null;
  temperature: number | null;
  temperatureCalibrated: number | null;
  wifi: number | null;
  updatedAt: string | null;
};

/** Fields missing from `config` keep their previous value. */
const extractConfig = (config: BlinkDeviceResponse, previous: CameraData): CameraData => ({
  name: config.name ?? previous.name,
  serial: config.serial ?? previous.serial,
  motionEnabled: config.enabled ?? previous.motionEnabled,
  battery: config.battery_state ?? config.battery ?? previous.battery,
  batteryVoltage: config.battery_voltage ?? previous.batteryVoltage,
  temperature: config.temperature ?? config.signals?.temp ?? previous.temperature,
  temperatureCalibrated: previous.temperatureCalibrated,
  wifi: config.wifi_strength ?? config.signals?.wifi ?? previous.wifi,
  updatedAt: config.updated_at ?? previous.updatedAt
});

export default class BlinkCamera {
  private _owner: CameraOwner;
  private _id: number;
  private _networkId: number;
  private _productType: ProductType;
  private _data: CameraData;
  private _thumbUrl: string | null = null;
  private _clipUrl: string | null = null;
  private _motionDetected = false;
  private _lastRecord: string | null = null;
  private _cachedImage: CachedMedia | null = null;
  private _cachedVideo: CachedMedia | null = null;
  private _lastRefresh: Date | null = null;
  private _log: BlinkLogger;

  constructor(
    owner: CameraOwner,
    id: number,
    name: string,
    networkId: number,
    productType: ProductType = 'catalina'
  ) {
    this._owner = owner;
    this._id = id;
    this._networkId = networkId;
    this._productType = productType;
    this._log = owner.auth.options.logger;
    this._data = {
      name,
      serial: null,
      motionEnabled: null,
      battery: null,
      batteryVoltage: null,
      temperature: null,
      temperatureCalibrated: null,
      wifi: null,
      updatedAt: null
    };
  }

  get id() {
    return this._id;
  }

  get name() {
    return this._data.name;
  }

  get networkId() {
    return this._networkId;
  }

  get productType() {
    return this._productType;
  }

  get serial() {
    return this._data.serial;
  }

  get armed() {
    return this._data.motionEnabled;
  }

  get battery() {
    return this._data.battery;
  }

  get batteryVoltage() {
    return this._data.batteryVoltage;
  }

  get temperature() {
    return this._data.temperature;
  }

  get temperatureC() {
    if (this._data.temperature === null) {
      return null;
    }

    return Math.round(((this._data.temperature - 32) / 9) * 5 * 10) / 10;
  }

  get temperatureCalibrated() {
    return this._data.temperatureCalibrated;
  }

  get wifi() {
    return this._data.wifi;
  }

  get thumbnail() {
    return this._thumbUrl;
  }

  get clipUrl() {
    return this._clipUrl;
  }

  get motionDetected() {
    return this._motionDetected;
  }

  get lastRecord() {
    return this._lastRecord;
  }

  get updatedAt() {
    return this._data.updatedAt;
  }

  get imageFromCache() {
    return this._cachedImage;
  }

  get videoFromCache() {
    return this._cachedVideo;
  }

  /** When this camera last finished an update; null until the first one. */
  get lastRefresh() {
    return this._lastRefresh;
  }

  get attributes() {
    return {
      name: this.name,
      cameraId: this._id,
      serial: this.serial,
      productType: this._productType,
      temperature: this.temperature,
      temperatureC: this.temperatureC,
      temperatureCalibrated: this.temperatureCalibrated,
      battery: this.battery,
      batteryVoltage: this.batteryVoltage,
      thumbnail: this.thumbnail,
      video: this.clipUrl,
      motionEnabled: this.armed,
      motionDetected: this.motionDetected,
      wifiStrength: this.wifi,
      networkId: this._networkId,
      syncModule: this._owner.name,
      lastRecord: this.lastRecord,
      lastRefresh: this._lastRefresh
    };
  }

  private get _target(): CameraTarget {
    return { networkId: this._networkId, cameraId: this._id, productType: this._productType };
  }

  /**
   * Applies a config entry from the server. Everything is fetched first and committed at the end,
   * so a failed request leaves the camera exactly as it was.
   */
  update = async (config: BlinkDeviceResponse, { forceCache = false } = {}) => {
    const { auth } = this._owner;
    const data = extractConfig(config, this._data);
    data.temperatureCalibrated = await this._getSensorInfo(data.temperature);

    let thumbUrl = this._thumbUrl;
    if (config.thumbnail) {
      const path = config.thumbnail.includes('.jpg') ? config.thumbnail : `${config.thumbnail}.jpg`;
      thumbUrl = `${auth.urls.baseUrl}${path}`;
    } else if (!thumbUrl) {
      this._log.warn(`Could not find thumbnail for camera ${data.name}`);
    }

    const motionDetected = this._owner.motionFor(data.name);
    const record = this._owner.lastRecordFor(data.name);
    const clipUrl = record ? `${auth.urls.baseUrl}${record.clip}` : this._clipUrl;

    let cachedImage = this._cachedImage;
    if (thumbUrl && (forceCache || thumbUrl !== this._thumbUrl || !cachedImage)) {
      const bytes = await requestMedia(auth, thumbUrl);
      cachedImage = { url: thumbUrl, data: bytes, fetchedAt: new Date() };
    }

    let cachedVideo = this._cachedVideo;
    if (clipUrl && (forceCache || !cachedVideo || cachedVideo.url !== clipUrl)) {
      const bytes = await requestMedia(auth, clipUrl);
      cachedVideo = { url: clipUrl, data: bytes, fetchedAt: new Date() };
    }

    this._data = data;
    this._thumbUrl = thumbUrl;
    this._clipUrl = clipUrl;
    this._motionDetected = motionDetected;
    this._lastRecord = record?.time ?? this._lastRecord;
    this._cachedImage = cachedImage;
    this._cachedVideo = cachedVideo;
    this._lastRefresh = new Date();
  };

  snapPicture = ({ force = false }: CommandOptions = {}) =>
    this._command('thumbnail', requestNewImage, force);

  recordClip = ({ force = false }: CommandOptions = {}) =>
    this._command('clip', requestNewVideo, force);

  setMotionDetect = (enable: boolean, { force = false }: CommandOptions = {}) =>
    this._command(
      'motion-detect',
      enable ? requestMotionDetectionEnable : requestMotionDetectionDisable,
      force
    );

  arm = (options?: CommandOptions) => this.setMotionDetect(true, options);

  disarm = (options?: CommandOptions) => this.setMotionDetect(false, options);

  /** RTSPS address of a live stream. */
  getLiveview = async () => {
    const response = await requestCameraLiveview(this._owner.auth, this._target);
    if (!response.server) {
      throw new BlinkProtocolException(
        `liveview of camera ${this._id}`,
        null,
        response,
        `No liveview server for camera ${this._id} / ${this.name}`
      );
    }

    return this._productType === 'catalina'
      ? response.server
      : response.server.replace(/^[a-z]+:/, 'rtsps:');
  };

  imageToFile = async (path: string) => this._mediaToFile('image', this._cachedImage, path);

  videoToFile = async (path: string) => this._mediaToFile('video', this._cachedVideo, path);

  private _mediaToFile = async (kind: string, media: CachedMedia | null, path: string) => {
    if (!media) {
      this._log.error(`No saved ${kind} exists for ${this.name}`);
      return false;
    }

    this._log.debug(`Writing ${kind} from ${this.name} to ${path}`);
    await writeFile(path, media.data);
    return true;
  };

  private _getSensorInfo = async (fallback: number | null) => {
    if (this._productType !== 'catalina') {
      return fallback;
    }

    const signals = await requestCameraSensors(this._owner.auth, this._networkId, this._id);
    if (typeof signals.temp !== 'number') {
      this._log.warn(`Could not retrieve calibrated temperature for camera ${this.name}`);
      return fallback;
    }

    return signals.temp;
  };

  private _command = async (
    kind: CommandKind,
    operation: ThrottledOperation<BlinkAuth, [CameraTarget], CommandResponse>,
    force: boolean
  ): Promise<CommandResult | null | Throttled> => {
    const { auth, poller } = this._owner;
    const response = force
      ? await operation.force(auth, this._target)
      : await operation(auth, this._target);

    if (isThrottled(response)) {
      this._log.debug(`Skipped ${kind} for camera ${this._id} / ${this.name}, called too recently`);
      return THROTTLED;
    }

    const command = poller.toCommand(kind, response);
    return command ? poller.wait(command) : null;
  };
}
