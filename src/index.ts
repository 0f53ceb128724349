export { default as BlinkClient, type VideoDownloadOptions } from './blink-client';
export { default as BlinkAuth, type AuthState, type BlinkCredentials } from './blink-auth';
export {
  default as BlinkSyncModule,
  type RefreshFailure,
  type RefreshReport
} from './blink-sync-module';
export { default as BlinkCamera } from './blink-camera';
export { default as LocalStorage, type LocalStorageClip } from './local-storage';
export {
  default as CommandPoller,
  type BlinkCommand,
  type CommandOutcome,
  type CommandResult,
  type CommandState
} from './command-poller';
export { default as NameIndex } from './name-index';
export * from './blink-exceptions';
export { type BlinkClientOptions, resolveOptions } from './config';
export { type BlinkLogger, createLogger, nullLogger } from './logger';
export { loadCredentials, saveCredentials } from './credentials-store';
export { isThrottled, THROTTLED, type Throttled } from './throttle';
export type { DownloadOptions } from './save-clips';
export type { BlinkNetwork, CachedMedia, ProductType } from './types';
