import axios, { AxiosError, AxiosHeaders, AxiosResponse } from 'axios';
import { createSession } from '../../clients/ProxmoxConnector';
import { Session } from '../../types';

export const TEST_HOST = 'pve.test';

export function testSession(): Session {
  return createSession(TEST_HOST, 'root@pam!ci', 'test-secret');
}

/**
 * Route axios.create to one real instance whose request methods are spies.
 * Unstubbed calls reject, so nothing reaches the network.
 */
export function mockApi() {
  const instance = axios.create();
  const create = jest.spyOn(axios, 'create').mockReturnValue(instance);
  const request = jest.spyOn(instance, 'request').mockRejectedValue(new Error('unexpected request'));
  const get = jest.spyOn(instance, 'get').mockRejectedValue(new Error('unexpected request'));
  return { instance, create, request, get };
}

export type MockApi = ReturnType<typeof mockApi>;

export function okResponse<T>(data: T, status: number = 200): AxiosResponse<T> {
  return {
    data,
    status,
    statusText: 'OK',
    headers: {},
    config: { headers: new AxiosHeaders() }
  };
}

/** Successful response wrapped in the `{ data }` envelope */
export function envelope<T>(payload: T): AxiosResponse<{ data: T }> {
  return okResponse({ data: payload });
}

export function httpError(status: number, statusText: string, data: unknown = {}): AxiosError {
  const response: AxiosResponse<unknown> = {
    data,
    status,
    statusText,
    headers: {},
    config: { headers: new AxiosHeaders() }
  };
  return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_REQUEST', undefined, undefined, response);
}

export function networkError(message: string = 'connect ECONNREFUSED'): AxiosError {
  return new AxiosError(message, 'ECONNREFUSED');
}
