import type { AxiosAdapter } from 'axios';

import {
  COMMAND_MAX_ATTEMPTS,
  COMMAND_POLL_INTERVAL_MS,
  DEFAULT_MOTION_INTERVAL_MS,
  DEFAULT_REFRESH_MS,
  DEVICE_ID,
  MIN_THROTTLE_MS,
  RETRY_ATTEMPTS,
  RETRY_BACKOFF_MS,
  TIMEOUT_MEDIA_MS,
  TIMEOUT_MS
} from './constants';
import { type BlinkLogger, createLogger } from './logger';

export type RetryOptions = {
  retries?: number;
  backoffMs?: number;
};

export type CommandPollOptions = {
  intervalMs?: number;
  maxAttempts?: number;
  /** Overall budget for one poll loop; unbounded when omitted. */
  timeoutMs?: number;
};

export type BlinkClientOptions = {
  debug?: boolean;
  logger?: BlinkLogger;
  deviceName?: string;
  refreshRateMs?: number;
  throttleMs?: number;
  motionIntervalMs?: number;
  timeoutMs?: number;
  mediaTimeoutMs?: number;
  retry?: RetryOptions;
  commandPoll?: CommandPollOptions;
  adapter?: AxiosAdapter;
  onTokenRefresh?: () => void;
};

export type ResolvedOptions = {
  debug: boolean;
  logger: BlinkLogger;
  deviceName: string;
  refreshRateMs: number;
  throttleMs: number;
  motionIntervalMs: number;
  timeoutMs: number;
  mediaTimeoutMs: number;
  retry: Required<RetryOptions>;
  commandPoll: Required<Omit<CommandPollOptions, 'timeoutMs'>> & { timeoutMs: number | null };
  adapter?: AxiosAdapter;
  onTokenRefresh?: () => void;
};

export const resolveOptions = (options: BlinkClientOptions = {}): ResolvedOptions => {
  const debug = options.debug ?? false;

  return {
    debug,
    logger: options.logger ?? createLogger(debug),
    deviceName: options.deviceName ?? DEVICE_ID,
    refreshRateMs: options.refreshRateMs ?? DEFAULT_REFRESH_MS,
    throttleMs: options.throttleMs ?? MIN_THROTTLE_MS,
    motionIntervalMs: options.motionIntervalMs ?? DEFAULT_MOTION_INTERVAL_MS,
    timeoutMs: options.timeoutMs ?? TIMEOUT_MS,
    mediaTimeoutMs: options.mediaTimeoutMs ?? TIMEOUT_MEDIA_MS,
    retry: {
      retries: options.retry?.retries ?? RETRY_ATTEMPTS,
      backoffMs: options.retry?.backoffMs ?? RETRY_BACKOFF_MS
    },
    commandPoll: {
      intervalMs: options.commandPoll?.intervalMs ?? COMMAND_POLL_INTERVAL_MS,
      maxAttempts: options.commandPoll?.maxAttempts ?? COMMAND_MAX_ATTEMPTS,
      timeoutMs: options.commandPoll?.timeoutMs ?? null
    },
    adapter: options.adapter,
    onTokenRefresh: options.onTokenRefresh
  };
};
