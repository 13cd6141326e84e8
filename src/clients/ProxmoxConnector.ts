import { Session, TransportOptions, VersionInfo } from '../types';
import { IProxmoxConnector } from '../interfaces';
import { AuthError } from '../errors';
import { createApiClient, unwrapEnvelope } from './ApiTransport';
import { logger } from '../utils/logger';

export const PROXMOX_API_PORT = 8006;
export const PROXMOX_API_PATH = '/api2/json';
export const AUTH_SCHEME = 'PVEAPIToken';

export const DEFAULT_TRANSPORT_OPTIONS: Readonly<TransportOptions> = Object.freeze({
  timeout: 30000,
  // Accepts the self-signed certificate of a stock Proxmox install.
  // Set to true once the host presents a certificate you can verify.
  rejectUnauthorized: false
});

/**
 * Builds authenticated sessions for the Proxmox API
 */
export class ProxmoxConnector implements IProxmoxConnector {
  private readonly transport: TransportOptions;

  constructor(transport: Partial<TransportOptions> = {}) {
    this.transport = { ...DEFAULT_TRANSPORT_OPTIONS, ...transport };
  }

  /**
   * Create a session and verify it with a GET /version probe
   */
  async connect(host: string, tokenId: string, secret: string): Promise<Session> {
    const session = createSession(host, tokenId, secret, this.transport);
    const apiClient = createApiClient(session);

    let version: VersionInfo;
    try {
      const response = await apiClient.get<unknown>('/version');
      version = unwrapEnvelope<VersionInfo>(
        response.data,
        () => new Error('Invalid version response')
      );
    } catch (error) {
      const authError = new AuthError(host, error);
      logger.error('Proxmox connection probe failed', { host, error: authError.message });
      throw authError;
    }

    logger.info('Connected to Proxmox API', { host, version: version.version });
    return session;
  }
}

/**
 * Assemble an immutable session descriptor without contacting the server
 */
export function createSession(
  host: string,
  tokenId: string,
  secret: string,
  transport: Partial<TransportOptions> = {}
): Session {
  return Object.freeze({
    baseUri: `https://${host}:${PROXMOX_API_PORT}${PROXMOX_API_PATH}`,
    authHeader: `${AUTH_SCHEME} ${tokenId}=${secret}`,
    serverHost: host,
    transport: Object.freeze({ ...DEFAULT_TRANSPORT_OPTIONS, ...transport })
  });
}
