import { beforeEach, describe, expect, it, vi } from 'vitest';

import { requestNetworks } from '../blink-api';
import BlinkAuth, { type BlinkCredentials } from '../blink-auth';
import { BlinkAuthenticationException, BlinkProtocolException } from '../blink-exceptions';
import { type BlinkClientOptions, resolveOptions } from '../config';
import FakeBlinkServer, {
  BASE_URL,
  LOGIN,
  loginReply,
  NETWORKS,
  testOptions,
  VERIFY
} from './helpers/fake-blink-server';

const credentials: BlinkCredentials = {
  username: 'user@example.com',
  password: 'test-secret',
  uid: 'test-uid',
  notificationKey: 'test-notification-key'
};

describe('BlinkAuth', () => {
  let server: FakeBlinkServer;

  const createAuth = (options: BlinkClientOptions = {}) =>
    new BlinkAuth(credentials, resolveOptions(testOptions(server, options)));

  beforeEach(() => {
    server = new FakeBlinkServer();
  });

  describe('login', () => {
    it('stores the session from the login response', async () => {
      server.on(LOGIN, loginReply());
      const auth = createAuth();

      await expect(auth.startup()).resolves.toBe('authenticated');
      expect(auth.token).toBe('test-token');
      expect(auth.accountId).toBe(1001);
      expect(auth.clientId).toBe(2002);
      expect(auth.regionId).toBe('e001');
      expect(auth.urls.baseUrl).toBe(BASE_URL);

      const [login] = server.callsTo(LOGIN);
      expect(login.body).toMatchObject({
        email: 'user@example.com',
        password: 'test-secret',
        unique_id: 'test-uid',
        notification_key: 'test-notification-key',
        reauth: 'true'
      });
    });

    it('resumes a saved token without logging in', async () => {
      const auth = new BlinkAuth(
        { token: 'saved-token', regionId: 'e001', accountId: 1001 },
        resolveOptions(testOptions(server))
      );

      await expect(auth.startup()).resolves.toBe('authenticated');
      expect(server.calls).toHaveLength(0);
    });

    it('rejects bad credentials', async () => {
      server.on(LOGIN, { status: 401, data: { message: 'Invalid credentials' } });

      const error = await createAuth()
        .login()
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(BlinkAuthenticationException);
      if (error instanceof BlinkAuthenticationException) {
        expect(error.reason).toBe('invalid-credentials');
      }
    });

    it('requires a username and password', async () => {
      const auth = new BlinkAuth({}, resolveOptions(testOptions(server)));

      await expect(auth.login()).rejects.toMatchObject({ reason: 'missing-credentials' });
      expect(server.calls).toHaveLength(0);
    });

    it('rejects a login response without a token', async () => {
      server.on(LOGIN, { data: { account: { account_id: 1001, client_id: 2002, tier: 'e001' } } });

      await expect(createAuth().login()).rejects.toBeInstanceOf(BlinkProtocolException);
    });
  });

  describe('verification', () => {
    beforeEach(() => {
      server.on(LOGIN, loginReply('test-token', { client_verification_required: true }));
    });

    it('accepts the right key', async () => {
      server.on(VERIFY, { data: { valid: true, require_new_pin: false } });
      const auth = createAuth();

      await expect(auth.startup()).resolves.toBe('verification-required');
      await expect(auth.sendAuthKey('123456')).resolves.toBe(true);

      expect(auth.state).toBe('authenticated');
      const [verify] = server.callsTo(VERIFY);
      expect(verify.body).toEqual({ pin: '123456' });
      expect(verify.token).toBe('test-token');
    });

    it('rejects a wrong key and stays unverified', async () => {
      server.on(VERIFY, { data: { valid: false, message: 'Invalid PIN' } });
      const auth = createAuth();
      await auth.startup();

      await expect(auth.sendAuthKey('000000')).resolves.toBe(false);
      expect(auth.state).toBe('verification-required');
    });

    it('treats a 400 from the verify endpoint as a wrong key', async () => {
      server.on(VERIFY, { status: 400, data: { message: 'Invalid PIN' } });
      const auth = createAuth();
      await auth.startup();

      await expect(auth.sendAuthKey('000000')).resolves.toBe(false);
    });

    it('refuses queries until verified', async () => {
      const auth = createAuth();
      await auth.startup();

      await expect(requestNetworks(auth)).rejects.toMatchObject({
        reason: 'verification-required'
      });
      expect(server.count(NETWORKS)).toBe(0);
    });
  });

  describe('query', () => {
    it('sends the token with every request', async () => {
      server.on(LOGIN, loginReply()).on(NETWORKS, { data: { networks: [] } });
      const auth = createAuth();
      await auth.startup();

      await requestNetworks(auth);

      expect(server.callsTo(NETWORKS)[0].token).toBe('test-token');
    });

    it('logs in again exactly once after a 401 and retries', async () => {
      const onTokenRefresh = vi.fn();
      server
        .on(LOGIN, loginReply('token-1'), loginReply('token-2'))
        .on(NETWORKS, { status: 401 }, { data: { networks: [{ id: 3003 }] } });
      const auth = createAuth({ onTokenRefresh });
      await auth.startup();

      await expect(requestNetworks(auth)).resolves.toEqual({ networks: [{ id: 3003 }] });

      expect(server.count(LOGIN)).toBe(2);
      expect(server.callsTo(NETWORKS).map(call => call.token)).toEqual(['token-1', 'token-2']);
      expect(onTokenRefresh).toHaveBeenCalledTimes(1);
    });

    it('fails with an authentication error when the retry is rejected too', async () => {
      server.on(LOGIN, loginReply('token-1'), loginReply('token-2')).on(NETWORKS, { status: 401 });
      const auth = createAuth();
      await auth.startup();

      await expect(requestNetworks(auth)).rejects.toMatchObject({
        name: 'BlinkAuthenticationException',
        reason: 'token-expired'
      });
      expect(server.count(LOGIN)).toBe(2);
      expect(server.count(NETWORKS)).toBe(2);
      expect(auth.state).toBe('unauthenticated');
    });

    it('shares one re-login between concurrent requests', async () => {
      server
        .on(LOGIN, loginReply('token-1'), loginReply('token-2'))
        .on(NETWORKS, { status: 401 }, { status: 401 }, { data: { networks: [] } });
      const auth = createAuth();
      await auth.startup();

      await Promise.all([requestNetworks(auth), requestNetworks(auth)]);

      expect(server.count(LOGIN)).toBe(2);
      expect(server.callsTo(NETWORKS).map(call => call.token)).toEqual([
        'token-1',
        'token-1',
        'token-2',
        'token-2'
      ]);
    });
  });
});
