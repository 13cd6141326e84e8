import axios from 'axios';
import { ErrorType, HttpMethod, ResourceKind } from '../types';

/**
 * Base class for every error raised by the client
 */
export class ProxmoxApiError extends Error {
  readonly type: ErrorType;
  readonly host?: string;
  readonly originalError?: unknown;

  constructor(type: ErrorType, message: string, host?: string, originalError?: unknown) {
    super(message);
    this.name = new.target.name;
    this.type = type;
    this.host = host;
    this.originalError = originalError;
  }
}

/**
 * The connection probe failed: unreachable host, rejected token or non-2xx answer
 */
export class AuthError extends ProxmoxApiError {
  constructor(host: string, originalError?: unknown) {
    super(
      'authentication',
      describeError(`Failed to authenticate with Proxmox API at ${host}`, originalError),
      host,
      originalError
    );
  }
}

/**
 * Any other transport failure, non-2xx answer or malformed response envelope
 */
export class RequestError extends ProxmoxApiError {
  readonly method: HttpMethod;
  readonly endpoint: string;
  readonly status?: number;

  constructor(host: string, method: HttpMethod, endpoint: string, originalError?: unknown) {
    super(
      'network',
      describeError(`${method} ${endpoint} failed on ${host}`, originalError),
      host,
      originalError
    );
    this.method = method;
    this.endpoint = endpoint;
    this.status = axios.isAxiosError(originalError) ? originalError.response?.status : undefined;
  }
}

/**
 * A lookup by name or id matched nothing
 */
export class NotFoundError extends ProxmoxApiError {
  readonly kind: ResourceKind;
  readonly value: string;

  constructor(kind: ResourceKind, value: string | number, host: string, scope?: string) {
    const where = scope ? ` in ${scope}` : '';
    super('resource_not_found', `No ${kind} matching '${value}' found${where} on ${host}`, host);
    this.kind = kind;
    this.value = String(value);
  }
}

/**
 * A closed-set parameter received a value outside its permitted values
 */
export class ValidationError extends ProxmoxApiError {
  readonly parameter: string;
  readonly allowed: readonly string[];

  constructor(parameter: string, value: unknown, allowed: readonly string[]) {
    super(
      'validation',
      `Invalid ${parameter}: ${JSON.stringify(value)}. Valid values: ${allowed.join(', ')}`
    );
    this.parameter = parameter;
    this.allowed = allowed;
  }
}

/**
 * Append HTTP status, server-side errors or the cause message to a base message
 */
export function describeError(message: string, originalError?: unknown): string {
  let errorMessage = message;

  if (axios.isAxiosError(originalError)) {
    const status = originalError.response?.status;
    const statusText = originalError.response?.statusText;
    const responseData: unknown = originalError.response?.data;

    if (status && statusText) {
      errorMessage += ` (HTTP ${status}: ${statusText})`;
    } else if (originalError.message) {
      errorMessage += `: ${originalError.message}`;
    }

    if (isRecord(responseData) && responseData.errors) {
      errorMessage += ` - ${JSON.stringify(responseData.errors)}`;
    }
  } else if (originalError instanceof Error) {
    errorMessage += `: ${originalError.message}`;
  } else if (typeof originalError === 'string') {
    errorMessage += `: ${originalError}`;
  }

  return errorMessage;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}
