import axios, { AxiosInstance } from 'axios';
import https from 'https';
import { ApiEnvelope, HttpMethod, Session } from '../types';
import { RequestError } from '../errors';
import { logger } from '../utils/logger';

/**
 * Request dispatch shared by every accessor and mutator.
 *
 * Sends one request per call with the session's auth header, timeout and
 * certificate policy, and hands back the unwrapped `data` payload.
 */
export class ApiTransport {
  private readonly session: Session;
  private readonly apiClient: AxiosInstance;

  constructor(session: Session) {
    this.session = session;
    this.apiClient = createApiClient(session);
  }

  get host(): string {
    return this.session.serverHost;
  }

  async get<T>(endpoint: string): Promise<T> {
    return this.request<T>('GET', endpoint);
  }

  /**
   * GET a listing; a payload that is not an array is a RequestError
   */
  async getList<T>(endpoint: string): Promise<T[]> {
    const payload = await this.request<unknown>('GET', endpoint);
    if (!Array.isArray(payload)) {
      throw new RequestError(this.host, 'GET', endpoint, new Error('Expected a list in the data envelope'));
    }
    return payload;
  }

  async post<T>(endpoint: string, body?: object): Promise<T> {
    return this.request<T>('POST', endpoint, body);
  }

  async delete<T>(endpoint: string): Promise<T> {
    return this.request<T>('DELETE', endpoint);
  }

  private async request<T>(method: HttpMethod, endpoint: string, body?: object): Promise<T> {
    logger.debug('Proxmox API request', { host: this.host, method, endpoint });

    let payload: unknown;
    try {
      const response = await this.apiClient.request<unknown>({
        method,
        url: endpoint,
        data: body
      });
      payload = response.data;
    } catch (error) {
      const requestError = new RequestError(this.host, method, endpoint, error);
      logger.error('Proxmox API request failed', {
        host: this.host,
        method,
        endpoint,
        status: requestError.status,
        error: requestError.message
      });
      throw requestError;
    }

    return unwrapEnvelope<T>(payload, () => new RequestError(
      this.host,
      method,
      endpoint,
      new Error('Response is missing the data envelope')
    ));
  }
}

/**
 * Join path segments with each one URI-encoded, e.g. apiPath('nodes', node, 'qemu')
 */
export function apiPath(...segments: Array<string | number>): string {
  return segments.map(segment => `/${encodeURIComponent(String(segment))}`).join('');
}

/**
 * Build an axios instance bound to a session
 */
export function createApiClient(session: Session): AxiosInstance {
  return axios.create({
    baseURL: session.baseUri,
    timeout: session.transport.timeout,
    httpsAgent: new https.Agent({
      rejectUnauthorized: session.transport.rejectUnauthorized
    }),
    headers: {
      'Authorization': session.authHeader,
      'Content-Type': 'application/json'
    }
  });
}

/**
 * Return `data` from a `{ data: T }` envelope, or throw when it is absent
 */
export function unwrapEnvelope<T>(payload: unknown, onMissing: () => Error): T {
  if (!isEnvelope<T>(payload) || payload.data === undefined || payload.data === null) {
    throw onMissing();
  }
  return payload.data;
}

function isEnvelope<T>(payload: unknown): payload is ApiEnvelope<T> {
  return typeof payload === 'object' && payload !== null && 'data' in payload;
}
