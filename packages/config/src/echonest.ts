// Echo Nest service configuration: endpoint constants and environment loading

import { DEFAULT_TIMEOUT_MS, ValidationError } from '@tastemaker/shared';

export const ECHONEST_CONFIG = {
  host: 'developer.echonest.com',
  apiSelector: 'api',
  apiVersion: 'v4',
  userAgent: 'tastemaker/1.0',
  // Page size the service uses when `results` is not given
  defaultResults: 15,
  defaultIdSpace: 'musicbrainz',
  timeoutMs: DEFAULT_TIMEOUT_MS,
} as const;

export interface EchoNestConfig {
  apiKey: string;
  host?: string;
  userAgent?: string;
  timeoutMs?: number;
  /** Log every outgoing URL (with the key masked) */
  trace?: boolean;
}

export type EnvRecord = Record<string, string | undefined>;

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);

/**
 * Build an EchoNestConfig from a process.env-shaped record.
 *
 * Reads ECHO_NEST_API_KEY (required), ECHO_NEST_API_HOST,
 * ECHO_NEST_TRACE_API_CALLS and ECHO_NEST_CALL_TIMEOUT_MS.
 */
export function loadEchoNestConfig(env: EnvRecord = process.env): EchoNestConfig {
  const apiKey = env.ECHO_NEST_API_KEY?.trim();
  if (!apiKey) {
    throw new ValidationError('ECHO_NEST_API_KEY is not set');
  }

  const config: EchoNestConfig = { apiKey };

  const host = env.ECHO_NEST_API_HOST?.trim();
  if (host) {
    config.host = host;
  }

  const rawTimeout = env.ECHO_NEST_CALL_TIMEOUT_MS?.trim();
  if (rawTimeout) {
    const timeoutMs = Number(rawTimeout);
    if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
      throw new ValidationError('ECHO_NEST_CALL_TIMEOUT_MS must be a positive integer', {
        value: rawTimeout,
      });
    }
    config.timeoutMs = timeoutMs;
  }

  const trace = env.ECHO_NEST_TRACE_API_CALLS?.trim().toLowerCase();
  if (trace) {
    config.trace = TRUTHY.has(trace);
  }

  return config;
}
