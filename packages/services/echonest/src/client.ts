// ABOUTME: Remote call gateway for the Echo Nest v4 API.
// ABOUTME: Builds the request URL, performs the call and surfaces every failure as EchoNestError.

import { ECHONEST_CONFIG, type EchoNestConfig } from '@tastemaker/config';
import { fetchWithTimeout } from '@tastemaker/shared';
import { isRecord } from './decode';
import { EchoNestError } from './errors';
import type { EchoNestEnvelope, EchoNestStatus, RequestParams } from './types';

/**
 * Anything that can perform an Echo Nest call. The artist entity and the
 * query functions only ever talk to this interface.
 */
export interface RemoteCallGateway {
  call(path: string, params: RequestParams): Promise<EchoNestEnvelope>;
}

export function isEnvelope(value: unknown): value is EchoNestEnvelope {
  return isRecord(value) && isRecord(value.response);
}

function readStatus(envelope: EchoNestEnvelope): EchoNestStatus | null {
  const status = envelope.response.status;
  if (isRecord(status) && typeof status.code === 'number') {
    return status;
  }
  return null;
}

export class EchoNestClient implements RemoteCallGateway {
  private readonly apiKey: string;
  private readonly host: string;
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly trace: boolean;

  constructor(config: EchoNestConfig) {
    this.apiKey = config.apiKey;
    this.host = config.host || ECHONEST_CONFIG.host;
    this.userAgent = config.userAgent || ECHONEST_CONFIG.userAgent;
    this.timeoutMs = config.timeoutMs ?? ECHONEST_CONFIG.timeoutMs;
    this.trace = config.trace ?? false;
  }

  /**
   * Build the URL for a call. List values repeat their key once per
   * element, in order (`bucket=a&bucket=b`).
   */
  buildUrl(path: string, params: RequestParams): URL {
    const url = new URL(
      `http://${this.host}/${ECHONEST_CONFIG.apiSelector}/${ECHONEST_CONFIG.apiVersion}/${path}`
    );
    url.searchParams.append('api_key', this.apiKey);
    url.searchParams.append('format', 'json');

    for (const [key, value] of Object.entries(params)) {
      if (typeof value === 'string' || typeof value === 'number') {
        url.searchParams.append(key, String(value));
      } else {
        for (const item of value) {
          url.searchParams.append(key, item);
        }
      }
    }

    return url;
  }

  async call(path: string, params: RequestParams): Promise<EchoNestEnvelope> {
    const url = this.buildUrl(path, params);

    if (this.trace) {
      console.log(`[EchoNest] GET ${maskApiKey(url)}`);
    }

    let response: Response;
    try {
      response = await fetchWithTimeout(url, {
        timeoutMs: this.timeoutMs,
        headers: {
          'User-Agent': this.userAgent,
          Accept: 'application/json',
        },
      });
    } catch (fetchError) {
      console.error(`[EchoNest] Fetch failed for ${path}:`, fetchError);
      const message = fetchError instanceof Error ? fetchError.message : String(fetchError);
      throw new EchoNestError(message, { cause: fetchError });
    }

    if (!response.ok) {
      const status = await this.readErrorStatus(response);
      console.error(`[EchoNest] API error ${response.status} for ${path}`);
      throw new EchoNestError(status?.message || `${response.status} ${response.statusText}`, {
        status: response.status,
        serviceCode: status?.code,
      });
    }

    const text = await response.text();
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (parseError) {
      console.error(`[EchoNest] Non-JSON body for ${path}: ${text.slice(0, 200)}`);
      throw new EchoNestError(`Malformed response for ${path}: body is not JSON`, { cause: parseError });
    }
    if (!isEnvelope(data)) {
      throw new EchoNestError(`Malformed response for ${path}: missing "response"`);
    }

    const status = readStatus(data);
    if (status && status.code !== 0) {
      console.error(`[EchoNest] Service error ${status.code} for ${path}: ${status.message}`);
      throw new EchoNestError(status.message, { serviceCode: status.code });
    }

    return data;
  }

  /**
   * The service sends its status block on 4xx responses too; fall back to
   * the HTTP status line when the body is not JSON.
   */
  private async readErrorStatus(response: Response): Promise<EchoNestStatus | null> {
    const text = await response.text();
    try {
      const body: unknown = JSON.parse(text);
      return isEnvelope(body) ? readStatus(body) : null;
    } catch (parseError) {
      console.error(`[EchoNest] Non-JSON error body (${response.status}): ${text.slice(0, 200)}`, parseError);
      return null;
    }
  }
}

function maskApiKey(url: URL): string {
  const masked = new URL(url);
  masked.searchParams.set('api_key', '***');
  return masked.toString();
}
