import { Session } from '../types';

/**
 * Interface for building authenticated sessions
 */
export interface IProxmoxConnector {
  /**
   * Probe the server with the token and return a session on success
   */
  connect(host: string, tokenId: string, secret: string): Promise<Session>;
}
