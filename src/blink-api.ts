import type BlinkAuth from './blink-auth';
import { throttle } from './throttle';
import type {
  CameraConfigResponse,
  CameraSignalsResponse,
  CameraUsageResponse,
  CommandResponse,
  CommandStatusResponse,
  LiveviewResponse,
  LocalStorageManifestRequestResponse,
  LocalStorageManifestResponse,
  NetworksResponse,
  ProductType,
  SummaryResponse,
  SyncEventsResponse,
  SyncModuleResponse,
  VideoCountResponse,
  VideosPageResponse
} from './types';

export type CameraTarget = {
  networkId: number;
  cameraId: number;
  productType: ProductType;
};

const throttleInterval = (auth: BlinkAuth) => auth.options.throttleMs;

const ownerUrl = (auth: BlinkAuth, { networkId, cameraId, productType }: CameraTarget) => {
  const { armUrl, networkUrl } = auth.urls;

  switch (productType) {
    case 'owl':
      return `${armUrl}${networkId}/owls/${cameraId}`;
    case 'lotus':
      return `${armUrl}${networkId}/doorbells/${cameraId}`;
    default:
      return `${networkUrl}${networkId}/camera/${cameraId}`;
  }
};

export const requestLogout = (auth: BlinkAuth) => {
  if (auth.clientId === null) {
    return Promise.resolve(null);
  }

  return auth.query<Record<string, unknown>>({
    url: `${auth.urls.clientUrl(auth.clientId)}/logout`,
    method: 'post'
  });
};

export const requestNetworks = (auth: BlinkAuth) =>
  auth.query<NetworksResponse>({ url: auth.urls.networksUrl });

export const requestNetworkUpdate = (auth: BlinkAuth, networkId: number) =>
  auth.query<CommandResponse>({
    url: `${auth.urls.networkUrl}${networkId}/update`,
    method: 'post'
  });

export const requestSyncModule = (auth: BlinkAuth, networkId: number) =>
  auth.query<SyncModuleResponse>({ url: `${auth.urls.networkUrl}${networkId}/syncmodules` });

export const requestHomescreen = throttle(throttleInterval, (auth: BlinkAuth) =>
  auth.query<SummaryResponse>({ url: auth.urls.homeUrl })
);

export const requestSyncEvents = throttle(throttleInterval, (auth: BlinkAuth, networkId: number) =>
  auth.query<SyncEventsResponse>({ url: `${auth.urls.baseUrl}/events/network/${networkId}` })
);

export const requestSystemArm = throttle(throttleInterval, (auth: BlinkAuth, networkId: number) =>
  auth.query<CommandResponse>({ url: `${auth.urls.armUrl}${networkId}/state/arm`, method: 'post' })
);

export const requestSystemDisarm = throttle(
  throttleInterval,
  (auth: BlinkAuth, networkId: number) =>
    auth.query<CommandResponse>({
      url: `${auth.urls.armUrl}${networkId}/state/disarm`,
      method: 'post'
    })
);

export const requestCommandStatus = (auth: BlinkAuth, networkId: number, commandId: number) =>
  auth.query<CommandStatusResponse>({
    url: `${auth.urls.networkUrl}${networkId}/command/${commandId}`
  });

export const requestNewImage = throttle(throttleInterval, (auth: BlinkAuth, target: CameraTarget) =>
  auth.query<CommandResponse>({ url: `${ownerUrl(auth, target)}/thumbnail`, method: 'post' })
);

export const requestNewVideo = throttle(throttleInterval, (auth: BlinkAuth, target: CameraTarget) =>
  auth.query<CommandResponse>({ url: `${ownerUrl(auth, target)}/clip`, method: 'post' })
);

export const requestVideoCount = throttle(throttleInterval, (auth: BlinkAuth) =>
  auth.query<VideoCountResponse>({ url: `${auth.urls.baseUrl}/api/v2/videos/count` })
);

/** One page of clips changed since `since`. Pages start at 1. */
export const requestVideos = (auth: BlinkAuth, since: Date, page = 1) =>
  auth.query<VideosPageResponse>({
    url: `${auth.urls.videoUrl}?since=${encodeURIComponent(formatTimestamp(since))}&page=${page}`
  });

export const requestDeleteVideos = (auth: BlinkAuth, videoIds: number[]) =>
  auth.query<Record<string, unknown>>({
    url: `${auth.urls.accountUrl}/media/delete`,
    method: 'post',
    data: { media_list: videoIds }
  });

export const requestCameraUsage = (auth: BlinkAuth) =>
  auth.query<CameraUsageResponse>({ url: `${auth.urls.baseUrl}/api/v1/camera/usage` });

export const requestCameraInfo = (auth: BlinkAuth, networkId: number, cameraId: number) =>
  auth.query<CameraConfigResponse>({
    url: `${auth.urls.networkUrl}${networkId}/camera/${cameraId}/config`
  });

export const requestCameraSensors = (auth: BlinkAuth, networkId: number, cameraId: number) =>
  auth.query<CameraSignalsResponse>({
    url: `${auth.urls.networkUrl}${networkId}/camera/${cameraId}/signals`
  });

export const requestCameraLiveview = (auth: BlinkAuth, target: CameraTarget) => {
  const url =
    target.productType === 'catalina'
      ? `${auth.urls.baseUrl}/api/v5/accounts/${auth.accountId}/networks/${target.networkId}` +
        `/cameras/${target.cameraId}/liveview`
      : `${ownerUrl(auth, target)}/liveview`;

  return auth.query<LiveviewResponse & CommandResponse>({ url, method: 'post' });
};

export const requestMotionDetectionEnable = throttle(
  throttleInterval,
  (auth: BlinkAuth, target: CameraTarget) => requestMotionDetection(auth, target, true)
);

export const requestMotionDetectionDisable = throttle(
  throttleInterval,
  (auth: BlinkAuth, target: CameraTarget) => requestMotionDetection(auth, target, false)
);

/**
 * Mini cameras have no per-camera enable endpoint; their motion detection is part of their
 * config.
 */
const requestMotionDetection = (auth: BlinkAuth, target: CameraTarget, enable: boolean) => {
  if (target.productType === 'owl') {
    return auth.query<CommandResponse>({
      url: `${ownerUrl(auth, target)}/config`,
      method: 'post',
      data: { enabled: enable }
    });
  }

  return auth.query<CommandResponse>({
    url: `${ownerUrl(auth, target)}/${enable ? 'enable' : 'disable'}`,
    method: 'post'
  });
};

const localStoragePath = (auth: BlinkAuth, networkId: number, syncId: number) =>
  `/api/v1/accounts/${auth.accountId}/networks/${networkId}/sync_modules/${syncId}/local_storage`;

const localStorageUrl = (auth: BlinkAuth, networkId: number, syncId: number) =>
  `${auth.urls.baseUrl}${localStoragePath(auth, networkId, syncId)}`;

export const requestLocalStorageManifest = (auth: BlinkAuth, networkId: number, syncId: number) =>
  auth.query<LocalStorageManifestRequestResponse>({
    url: `${localStorageUrl(auth, networkId, syncId)}/manifest/request`,
    method: 'post'
  });

export const getLocalStorageManifest = (
  auth: BlinkAuth,
  networkId: number,
  syncId: number,
  manifestRequestId: number
) =>
  auth.query<LocalStorageManifestResponse>({
    url: `${localStorageUrl(auth, networkId, syncId)}/manifest/request/${manifestRequestId}`
  });

/** Path of a manifest clip, relative to the regional base URL. */
export const localStorageClipPath = (
  auth: BlinkAuth,
  networkId: number,
  syncId: number,
  manifestId: string,
  clipId: string
) => `${localStoragePath(auth, networkId, syncId)}/manifest/${manifestId}/clip/request/${clipId}`;

/** Asks the sync module to upload a locally stored clip so it can be downloaded. */
export const requestLocalStorageClip = (auth: BlinkAuth, url: string) =>
  auth.query<CommandResponse>({ url, method: 'post' });

export const requestMedia = (auth: BlinkAuth, url: string) =>
  auth.query<Buffer>({
    url,
    responseType: 'arraybuffer',
    timeoutMs: auth.options.mediaTimeoutMs
  });

/** Blink-compatible timestamp, e.g. `2024-01-02T03:04:05+0000`. */
export const formatTimestamp = (date: Date) =>
  `${date.toISOString().slice(0, 19)}+0000`;
