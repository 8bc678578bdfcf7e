import type { AxiosError } from 'axios';

export type HardwareErrorKind = 'transport' | 'validation' | 'hardware_fault' | 'timeout' | 'cancelled';

/**
 * Failure reported by a hardware client. Plain data so it can travel inside
 * a `Result` and be serialised into progress events.
 */
export interface HardwareError {
  kind: HardwareErrorKind;
  message: string;
  status?: number;
  body?: string;
}

export function hardwareError(kind: HardwareErrorKind, message: string, extra: Pick<HardwareError, 'status' | 'body'> = {}): HardwareError {
  return { kind, message, ...extra };
}

export class HardwareRequestError extends Error {
  constructor(
    public kind: HardwareErrorKind,
    message: string,
    public status?: number,
    public body?: string,
  ) {
    super(message);
    this.name = 'HardwareRequestError';
  }

  static fromAxiosError(error: AxiosError): HardwareRequestError {
    const response = error.response;
    if (!response) {
      return new HardwareRequestError('transport', describeTransportFailure(error));
    }

    const body = stringifyBody(response.data);
    const message = `HTTP ${response.status}: ${body || response.statusText || 'no body'}`;
    // 4xx: the request was malformed for the instrument; 5xx: the instrument faulted
    const kind: HardwareErrorKind = response.status >= 500 ? 'hardware_fault' : 'validation';
    return new HardwareRequestError(kind, message, response.status, body);
  }

  toHardwareError(): HardwareError {
    return { kind: this.kind, message: this.message, status: this.status, body: this.body };
  }
}

export function toHardwareError(error: unknown): HardwareError {
  if (error instanceof HardwareRequestError) return error.toHardwareError();
  const message = error instanceof Error ? error.message : String(error);
  return hardwareError('transport', `network error: ${message}`);
}

function describeTransportFailure(error: AxiosError): string {
  switch (error.code) {
    case 'ECONNREFUSED':
      return 'connection refused';
    case 'ECONNABORTED':
    case 'ETIMEDOUT':
      return 'request timed out';
    default:
      return `network error: ${error.message}`;
  }
}

function stringifyBody(data: unknown): string {
  if (data === undefined || data === null) return '';
  if (typeof data === 'string') return data;
  try {
    return JSON.stringify(data);
  } catch {
    return String(data);
  }
}
