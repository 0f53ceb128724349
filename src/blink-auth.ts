import {
  BlinkAuthenticationException,
  BlinkProtocolException,
  isUnauthorized
} from './blink-exceptions';
import type { ResolvedOptions } from './config';
import {
  APP_VERSION,
  DEFAULT_USER_AGENT,
  LOGIN_URL,
  SIZE_NOTIFICATION_KEY,
  SIZE_UID
} from './constants';
import createBlinkUrls, { type BlinkUrls } from './create-blink-urls';
import guid from './guid';
import BlinkSession, { type HttpRequest } from './http-session';
import type { BlinkLogger } from './logger';
import type { LoginResponse, VerifyResponse } from './types';

export type AuthState = 'unauthenticated' | 'verification-required' | 'authenticated';

export interface BlinkCredentials {
  username?: string;
  password?: string;
  token?: string;
  uid?: string;
  notificationKey?: string;
  deviceId?: string;
  accountId?: number;
  clientId?: number;
  regionId?: string;
  region?: string;
}

export default class BlinkAuth {
  readonly session: BlinkSession;
  readonly options: ResolvedOptions;

  private _username: string | null;
  private _password: string | null;
  private _uid: string;
  private _notificationKey: string;
  private _deviceId: string;
  private _token: string | null;
  private _accountId: number | null;
  private _clientId: number | null;
  private _regionId: string | null;
  private _region: string | null;
  private _urls: BlinkUrls | null = null;
  private _state: AuthState = 'unauthenticated';
  private _reauth: Promise<void> | null = null;
  private _log: BlinkLogger;

  constructor(credentials: BlinkCredentials, options: ResolvedOptions, session?: BlinkSession) {
    this.options = options;
    this._log = options.logger;
    this.session =
      session ??
      new BlinkSession({
        timeoutMs: options.timeoutMs,
        retries: options.retry.retries,
        backoffMs: options.retry.backoffMs,
        logger: options.logger,
        adapter: options.adapter
      });

    this._username = credentials.username ?? null;
    this._password = credentials.password ?? null;
    this._uid = credentials.uid ?? guid(SIZE_UID);
    this._notificationKey = credentials.notificationKey ?? guid(SIZE_NOTIFICATION_KEY);
    this._deviceId = credentials.deviceId ?? options.deviceName;
    this._token = credentials.token ?? null;
    this._accountId = credentials.accountId ?? null;
    this._clientId = credentials.clientId ?? null;
    this._regionId = credentials.regionId ?? null;
    this._region = credentials.region ?? null;
  }

  get state() {
    return this._state;
  }

  get isAuthenticated() {
    return this._state === 'authenticated';
  }

  get token() {
    return this._token;
  }

  get accountId() {
    return this._accountId;
  }

  get clientId() {
    return this._clientId;
  }

  get regionId() {
    return this._regionId;
  }

  get region() {
    return this._region;
  }

  get urls() {
    if (!this._urls) {
      throw new BlinkAuthenticationException(
        'not-authenticated',
        'You have to be authenticated before calling this method'
      );
    }

    return this._urls;
  }

  get header(): Record<string, string> | null {
    if (!this._token) {
      return null;
    }

    return {
      'token-auth': this._token,
      'Content-Type': 'application/json'
    };
  }

  /** Everything needed to resume this session later without logging in again. */
  get loginAttributes(): BlinkCredentials {
    return {
      username: this._username ?? undefined,
      password: this._password ?? undefined,
      uid: this._uid,
      notificationKey: this._notificationKey,
      deviceId: this._deviceId,
      token: this._token ?? undefined,
      accountId: this._accountId ?? undefined,
      clientId: this._clientId ?? undefined,
      regionId: this._regionId ?? undefined,
      region: this._region ?? undefined
    };
  }

  /** Restores a saved token when one is complete enough to use, otherwise logs in. */
  startup = async (): Promise<AuthState> => {
    if (this._token && this._regionId && this._accountId !== null) {
      this._log.debug('Using saved authentication token');
      this._urls = createBlinkUrls(this._regionId, this._accountId);
      this._state = 'authenticated';
      return this._state;
    }

    return this.login();
  };

  login = async (): Promise<AuthState> => {
    if (typeof this._username !== 'string' || typeof this._password !== 'string') {
      throw new BlinkAuthenticationException(
        'missing-credentials',
        'Username and password are required to log in'
      );
    }

    const data = {
      email: this._username,
      password: this._password,
      notification_key: this._notificationKey,
      unique_id: this._uid,
      app_version: APP_VERSION,
      client_name: this.options.deviceName,
      client_type: 'android',
      device_identifier: this._deviceId,
      device_name: this.options.deviceName,
      os_version: '13.0.0',
      reauth: 'true'
    };

    let response: LoginResponse;
    try {
      ({ data: response } = await this.session.send<LoginResponse>({
        url: LOGIN_URL,
        method: 'post',
        headers: { 'Content-Type': 'application/json', 'User-Agent': DEFAULT_USER_AGENT },
        data
      }));
    } catch (error) {
      if (isUnauthorized(error)) {
        this._state = 'unauthenticated';
        throw new BlinkAuthenticationException(
          'invalid-credentials',
          `Invalid credentials for ${this._username}`
        );
      }
      throw error;
    }

    const { account, auth } = response;
    if (
      !account?.tier ||
      account.account_id === undefined ||
      account.client_id === undefined ||
      !auth?.token
    ) {
      throw new BlinkProtocolException(LOGIN_URL, 200, response, 'Malformed login response');
    }

    this._token = auth.token;
    this._accountId = account.account_id;
    this._clientId = account.client_id;
    this._regionId = account.tier;
    this._region = account.region ?? null;
    this._urls = createBlinkUrls(account.tier, account.account_id);

    if (
      account.account_verification_required ||
      account.client_verification_required ||
      account.phone_verification_required
    ) {
      this._log.info(`Verification code required, check the inbox of ${this._username}`);
      this._state = 'verification-required';
    } else {
      this._state = 'authenticated';
    }

    return this._state;
  };

  /**
   * Completes a pending verification with the PIN the vendor sent. Returns false, leaving the
   * session unauthenticated, when the server rejects the PIN.
   */
  sendAuthKey = async (code: string) => {
    if (!this._token || !this._urls || this._clientId === null) {
      throw new BlinkAuthenticationException(
        'not-authenticated',
        'Log in before sending a verification key'
      );
    }

    let response: VerifyResponse;
    try {
      ({ data: response } = await this._send<VerifyResponse>(
        {
          url: `${this._urls.clientUrl(this._clientId)}/pin/verify`,
          method: 'post',
          data: { pin: `${code}` }
        },
        this._token
      ));
    } catch (error) {
      const rejected =
        error instanceof BlinkProtocolException && [400, 401].includes(error.status ?? 0);
      if (rejected) {
        this._log.warn('Verification key rejected by the server');
        return false;
      }
      throw error;
    }

    if (response.valid !== true) {
      this._log.warn(`Verification key rejected: ${response.message ?? 'no reason given'}`);
      return false;
    }

    this._state = 'authenticated';
    return true;
  };

  /**
   * Sends an authorized request and returns its body. A 401 triggers one re-login shared by every
   * request that saw the same stale token; a second 401 is surfaced as an authentication error.
   */
  query = async <T>(request: HttpRequest): Promise<T> => {
    const token = this._requireToken();

    try {
      return (await this._send<T>(request, token)).data;
    } catch (error) {
      if (!isUnauthorized(error)) {
        throw error;
      }
    }

    this._log.warn(`Token rejected by ${request.url}, re-authenticating`);
    await this._refreshToken(token);

    try {
      return (await this._send<T>(request, this._requireToken())).data;
    } catch (error) {
      if (isUnauthorized(error)) {
        this._state = 'unauthenticated';
        throw new BlinkAuthenticationException(
          'token-expired',
          `Authorization rejected for ${request.url} after re-authentication`
        );
      }
      throw error;
    }
  };

  private _send = <T>(request: HttpRequest, token: string) =>
    this.session.send<T>({
      ...request,
      headers: {
        ...request.headers,
        'token-auth': token,
        'Content-Type': 'application/json'
      }
    });

  private _requireToken = () => {
    if (!this._token || this._state !== 'authenticated') {
      throw new BlinkAuthenticationException(
        this._state === 'verification-required' ? 'verification-required' : 'not-authenticated',
        'Authentication token must be set'
      );
    }

    return this._token;
  };

  private _refreshToken = (staleToken: string): Promise<void> => {
    if (this._reauth) {
      return this._reauth;
    }
    if (this._token !== staleToken) {
      return Promise.resolve();
    }

    this._reauth = this._relogin().finally(() => {
      this._reauth = null;
    });

    return this._reauth;
  };

  private _relogin = async () => {
    this._log.info('Refreshing authentication token');

    let state: AuthState;
    try {
      state = await this.login();
    } catch (error) {
      this._state = 'unauthenticated';
      throw error;
    }

    if (state !== 'authenticated') {
      throw new BlinkAuthenticationException(
        'verification-required',
        'Re-authentication requires a new verification key'
      );
    }

    this.options.onTokenRefresh?.();
  };
}
