// ABOUTME: The single failure kind of the Echo Nest client.
// ABOUTME: Covers transport errors, HTTP errors and service-reported status codes alike.

import { ExternalApiError } from '@tastemaker/shared';

export interface EchoNestErrorOptions {
  /** HTTP status of the failed call, when one was received */
  status?: number;
  /** `response.status.code` reported by the service */
  serviceCode?: number;
  cause?: unknown;
}

export class EchoNestError extends ExternalApiError {
  public readonly serviceCode?: number;

  constructor(message: string, options: EchoNestErrorOptions = {}) {
    super(
      'Echo Nest',
      message,
      options.status ?? 502,
      options.serviceCode !== undefined ? { serviceCode: options.serviceCode } : undefined
    );
    this.name = 'EchoNestError';
    this.serviceCode = options.serviceCode;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export function isEchoNestError(error: unknown): error is EchoNestError {
  return error instanceof EchoNestError;
}
