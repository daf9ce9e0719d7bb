import axios, { AxiosInstance } from 'axios';

import { createServiceLogger } from '../observability/logger';
import { externalCallDuration } from '../observability/metrics';
import { isRecord, readNumber, readString } from '../utils/parse';

import { KeyIssuanceError, KeyIssuer } from './key-issuer';

const log = createServiceLogger('cidms');

export interface CidmsOptions {
  url: string;
  apiKey: string;
  timeoutMs: number;
  userAgent: string;
}

const REJECTION_MARKERS = ['invalid', 'failed', 'blocked', 'banned'];
const MIN_CONFIRMATION_LENGTH = 10;

/**
 * Interpret a 200 response body. The service answers with JSON for most
 * outcomes but sometimes with the bare confirmation id as text.
 */
export const parseCidmsBody = (body: string): string => {
  const text = body.trim();

  if (text.startsWith('{') && text.endsWith('}')) {
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch {
      data = undefined;
    }

    if (isRecord(data)) {
      const confirmationId = readString(data, 'confirmationid');
      if (data.result === 'Successfully' && confirmationId) {
        return confirmationId;
      }

      const errorExecuting = readString(data, 'errorexecuting') ?? readString(data, 'error_executing');
      const hadOccurred = readNumber(data, 'hadoccurred') ?? readNumber(data, 'had_occurred') ?? 0;
      if (errorExecuting || hadOccurred !== 0) {
        throw new KeyIssuanceError('rejected', errorExecuting || 'Key service reported an error');
      }
      throw new KeyIssuanceError('unavailable', 'Unexpected key service response');
    }
  }

  const lowered = text.toLowerCase();
  if (REJECTION_MARKERS.some((marker) => lowered.includes(marker))) {
    throw new KeyIssuanceError('rejected', text);
  }
  if (text.length < MIN_CONFIRMATION_LENGTH) {
    throw new KeyIssuanceError('rejected', 'Key service returned no usable confirmation id');
  }
  return text;
};

const statusFailure = (status: number): KeyIssuanceError => {
  if (status === 400 || status === 403) {
    return new KeyIssuanceError('rejected', 'Installation id blocked by the key service');
  }
  if (status === 401) {
    return new KeyIssuanceError('unavailable', 'Key service authentication failed');
  }
  if (status === 429) {
    return new KeyIssuanceError('unavailable', 'Key service rate limit reached, try again later');
  }
  return new KeyIssuanceError('unavailable', `Key service error (status ${status})`);
};

/**
 * CIDMS confirmation-id API client
 */
export class CidmsKeyIssuer implements KeyIssuer {
  private readonly http: AxiosInstance;

  constructor(
    private readonly options: CidmsOptions,
    http?: AxiosInstance
  ) {
    this.http =
      http ??
      axios.create({
        timeout: options.timeoutMs,
        headers: { 'User-Agent': options.userAgent },
        responseType: 'text',
        // The body is parsed by parseCidmsBody
        transformResponse: (data: unknown) => data,
      });
  }

  async issueConfirmationId(installationId: string): Promise<string> {
    const endTimer = externalCallDuration.startTimer({ service: 'cidms' });
    log.info({ installationIdPrefix: installationId.slice(0, 10) }, 'Requesting confirmation id');

    let status: number;
    let body: string;
    try {
      const response = await this.http.get<unknown>(this.options.url, {
        params: { iids: installationId, justforcheck: 0, apikey: this.options.apiKey },
        validateStatus: () => true,
      });
      status = response.status;
      body = typeof response.data === 'string' ? response.data : JSON.stringify(response.data);
    } catch (error) {
      endTimer({ outcome: 'unavailable' });
      const message = axios.isAxiosError(error)
        ? error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT'
          ? 'Key service timed out'
          : `Key service unreachable: ${error.message}`
        : 'Key service call failed';
      log.error({ error: error instanceof Error ? error.message : String(error) }, message);
      throw new KeyIssuanceError('unavailable', message);
    }

    if (status !== 200) {
      const failure = statusFailure(status);
      endTimer({ outcome: failure.kind });
      log.warn({ status }, failure.message);
      throw failure;
    }

    try {
      const confirmationId = parseCidmsBody(body);
      endTimer({ outcome: 'success' });
      return confirmationId;
    } catch (error) {
      endTimer({ outcome: error instanceof KeyIssuanceError ? error.kind : 'unavailable' });
      throw error;
    }
  }
}
