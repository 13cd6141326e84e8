import https from 'https';
import { ProxmoxConnector, createSession } from '../ProxmoxConnector';
import { AuthError } from '../../errors';
import { TEST_HOST, MockApi, envelope, httpError, mockApi, networkError, okResponse } from '../../__tests__/helpers/mockApi';

describe('ProxmoxConnector', () => {
  let api: MockApi;

  beforeEach(() => {
    api = mockApi();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('createSession', () => {
    it('should build the base URI and token header', () => {
      const session = createSession('pve01.lan', 'root@pam!ci', 'test-secret');

      expect(session.baseUri).toBe('https://pve01.lan:8006/api2/json');
      expect(session.authHeader).toBe('PVEAPIToken root@pam!ci=test-secret');
      expect(session.serverHost).toBe('pve01.lan');
    });

    it('should default to a 30s timeout with certificate validation off', () => {
      const session = createSession('pve01.lan', 'root@pam!ci', 'test-secret');

      expect(session.transport).toEqual({ timeout: 30000, rejectUnauthorized: false });
    });

    it('should return a frozen session', () => {
      const session = createSession('pve01.lan', 'root@pam!ci', 'test-secret', { timeout: 5000 });

      expect(Object.isFrozen(session)).toBe(true);
      expect(Object.isFrozen(session.transport)).toBe(true);
      expect(session.transport.timeout).toBe(5000);
    });
  });

  describe('connect', () => {
    it('should probe /version and return the session', async () => {
      api.get.mockResolvedValueOnce(envelope({ version: '8.2.2', release: '8.2' }));

      const session = await new ProxmoxConnector().connect(TEST_HOST, 'root@pam!ci', 'test-secret');

      expect(api.get).toHaveBeenCalledTimes(1);
      expect(api.get).toHaveBeenCalledWith('/version');
      expect(session.baseUri).toBe('https://pve.test:8006/api2/json');
      expect(session.authHeader).toBe('PVEAPIToken root@pam!ci=test-secret');
    });

    it('should configure axios with the session header, timeout and certificate policy', async () => {
      api.get.mockResolvedValueOnce(envelope({ version: '8.2.2', release: '8.2' }));

      await new ProxmoxConnector({ timeout: 10000, rejectUnauthorized: true })
        .connect(TEST_HOST, 'root@pam!ci', 'test-secret');

      const config = api.create.mock.calls[0][0];
      expect(config?.baseURL).toBe('https://pve.test:8006/api2/json');
      expect(config?.timeout).toBe(10000);
      expect(config?.headers).toEqual({
        'Authorization': 'PVEAPIToken root@pam!ci=test-secret',
        'Content-Type': 'application/json'
      });
      expect(config?.httpsAgent).toBeInstanceOf(https.Agent);
      expect(config?.httpsAgent.options.rejectUnauthorized).toBe(true);
    });

    it('should fail with AuthError on a rejected token', async () => {
      api.get.mockRejectedValueOnce(httpError(401, 'authentication failure'));

      const attempt = new ProxmoxConnector().connect(TEST_HOST, 'root@pam!ci', 'wrong-secret');

      await expect(attempt).rejects.toBeInstanceOf(AuthError);
      await expect(attempt).rejects.toThrow(
        'Failed to authenticate with Proxmox API at pve.test (HTTP 401: authentication failure)'
      );
    });

    it('should fail with AuthError when the host is unreachable', async () => {
      const cause = networkError();
      api.get.mockRejectedValueOnce(cause);

      const error = await new ProxmoxConnector().connect(TEST_HOST, 'root@pam!ci', 'test-secret')
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthError);
      expect(error).toMatchObject({
        type: 'authentication',
        host: TEST_HOST,
        originalError: cause,
        message: 'Failed to authenticate with Proxmox API at pve.test: connect ECONNREFUSED'
      });
    });

    it('should fail with AuthError when the probe response has no data envelope', async () => {
      api.get.mockResolvedValueOnce(okResponse({ errors: {} }));

      await expect(new ProxmoxConnector().connect(TEST_HOST, 'root@pam!ci', 'test-secret'))
        .rejects.toThrow('Failed to authenticate with Proxmox API at pve.test: Invalid version response');
    });
  });
});
