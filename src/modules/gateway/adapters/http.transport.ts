/**
 * CyberSource Gateway - HTTP Transport
 * Delivers SOAP envelopes over HTTPS via axios
 *
 * - 2xx: reply body returned
 * - 500: reply body returned (SOAP 1.1 faults travel with status 500)
 * - anything else, timeouts, refused connections: TransportError
 *
 * No retries here; a caller that wants them inspects TransportError.retryable.
 */

import axios, { AxiosError, AxiosInstance, CreateAxiosDefaults } from 'axios';
import { TransportError } from '../../../shared/errors';
import { TransportPort } from '../transport.port';

export interface HttpTransportConfig {
  readonly timeoutMs: number;
  readonly adapter?: CreateAxiosDefaults['adapter'];
}

const SOAP_FAULT_STATUS = 500;

export class HttpTransport implements TransportPort {
  private readonly client: AxiosInstance;

  constructor(config: HttpTransportConfig) {
    this.client = axios.create({
      timeout: config.timeoutMs,
      responseType: 'text',
      transformResponse: (data: unknown) => data,
      validateStatus: (status) => (status >= 200 && status < 300) || status === SOAP_FAULT_STATUS,
      headers: {
        'Content-Type': 'text/xml; charset=utf-8',
        SOAPAction: '"runTransaction"',
      },
      ...(config.adapter && { adapter: config.adapter }),
    });
  }

  async send(url: string, body: string): Promise<string> {
    try {
      const response = await this.client.post<unknown>(url, body);
      if (response.status === SOAP_FAULT_STATUS) {
        console.warn(`[HttpTransport] ${url} answered ${SOAP_FAULT_STATUS}, reading reply as SOAP fault`);
      }
      return typeof response.data === 'string' ? response.data : String(response.data ?? '');
    } catch (error) {
      if (axios.isAxiosError(error)) {
        throw this.toTransportError(error, url);
      }
      throw error;
    }
  }

  private toTransportError(error: AxiosError, url: string): TransportError {
    const status = error.response?.status;

    // Network error or timeout - retryable
    if (!error.response || error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      console.error(`[HttpTransport] Network error for ${url}: ${error.message}`);
      return new TransportError(`Processor unreachable: ${error.message}`, null, true);
    }

    // Server errors (5xx) - retryable
    if (status !== undefined && status >= 500) {
      console.error(`[HttpTransport] Server error ${status} from ${url}`);
      return new TransportError(`Processor server error: ${status}`, status, true);
    }

    console.error(`[HttpTransport] HTTP ${status} from ${url}`);
    return new TransportError(`Processor rejected request: HTTP ${status}`, status ?? null, false);
  }
}
