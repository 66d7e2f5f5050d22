import { describe, it, expect } from '@jest/globals';
import { AxiosError, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { HttpTransport } from './http.transport';
import { TransportError } from '../../../shared/errors';

const URL = 'https://processor.invalid/commerce/1.x/transactionProcessor';

function respond(config: InternalAxiosRequestConfig, status: number, data: string): AxiosResponse {
  return { data, status, statusText: String(status), headers: {}, config };
}

function transportWith(adapter: (config: InternalAxiosRequestConfig) => Promise<AxiosResponse>): HttpTransport {
  return new HttpTransport({ timeoutMs: 1000, adapter });
}

describe('HttpTransport', () => {
  it('posts the envelope as text/xml and returns the reply body', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const transport = transportWith(async (config) => {
      seen.push(config);
      return respond(config, 200, '<reply/>');
    });

    const reply = await transport.send(URL, '<envelope/>');

    expect(reply).toBe('<reply/>');
    expect(seen).toHaveLength(1);
    expect(seen[0].method).toBe('post');
    expect(seen[0].url).toBe(URL);
    expect(seen[0].data).toBe('<envelope/>');
    expect(seen[0].headers.get('Content-Type')).toBe('text/xml; charset=utf-8');
    expect(seen[0].headers.get('SOAPAction')).toBe('"runTransaction"');
    expect(seen[0].timeout).toBe(1000);
  });

  it('returns the body of a 500 reply so SOAP faults can be parsed', async () => {
    const transport = transportWith(async (config) => respond(config, 500, '<soap:Fault/>'));

    await expect(transport.send(URL, '<envelope/>')).resolves.toBe('<soap:Fault/>');
  });

  it('reports timeouts as retryable transport errors', async () => {
    const transport = transportWith(async (config) => {
      throw new AxiosError('timeout of 1000ms exceeded', 'ECONNABORTED', config);
    });

    const failure = await transport.send(URL, '<envelope/>').catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(TransportError);
    expect(failure).toMatchObject({ code: 'TRANSPORT_FAILED', statusCode: null, retryable: true });
  });

  it('reports 5xx statuses as retryable', async () => {
    const transport = transportWith(async (config) => {
      throw new AxiosError('Request failed with status code 503', 'ERR_BAD_RESPONSE', config, null, respond(config, 503, ''));
    });

    const failure = await transport.send(URL, '<envelope/>').catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(TransportError);
    expect(failure).toMatchObject({ statusCode: 503, retryable: true });
  });

  it('reports other statuses as permanent', async () => {
    const transport = transportWith(async (config) => {
      throw new AxiosError('Request failed with status code 404', 'ERR_BAD_REQUEST', config, null, respond(config, 404, 'Not Found'));
    });

    const failure = await transport.send(URL, '<envelope/>').catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(TransportError);
    expect(failure).toMatchObject({ statusCode: 404, retryable: false });
  });

  it('passes through errors that did not come from axios', async () => {
    const transport = transportWith(async () => {
      throw new Error('boom');
    });

    await expect(transport.send(URL, '<envelope/>')).rejects.toThrow('boom');
  });
});
