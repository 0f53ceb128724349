export const BLINK_URL = 'immedia-semi.com';
export const DEFAULT_URL = `rest-prod.${BLINK_URL}`;
export const LOGIN_URL = `https://${DEFAULT_URL}/api/v5/account/login`;

export const APP_VERSION = '6.16.0';
export const DEFAULT_USER_AGENT = '27.0ANDROID_28373244';
export const DEVICE_ID = 'blink-home-client';

export const SIZE_NOTIFICATION_KEY = 152;
export const SIZE_UID = 16;

export const TIMEOUT_MS = 10 * 1e3;
export const TIMEOUT_MEDIA_MS = 90 * 1e3;

export const DEFAULT_REFRESH_MS = 30 * 1e3;
export const MIN_THROTTLE_MS = 2 * 1e3;
export const DEFAULT_MOTION_INTERVAL_MS = 60 * 1e3;

export const RETRY_ATTEMPTS = 3;
export const RETRY_BACKOFF_MS = 1e3;
export const RETRY_STATUS_CODES = [429, 500, 502, 503, 504];

export const COMMAND_POLL_INTERVAL_MS = 1e3;
export const COMMAND_MAX_ATTEMPTS = 10;
// Blink reports 908 on every status response of a command that is still healthy
export const COMMAND_STATUS_OK = 908;

export const LOCAL_STORAGE_MAX_POLLS = 4;

export const ONLINE_STATUS = 'online';
