import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest';
import { HttpTransport } from '../src/backends/http-transport.js';
import { loadConfig } from '../src/config.js';
import { PayloadTooLargeError, TransportError } from '../src/errors.js';

const ENDPOINT = 'http://test.local:5101';

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    ...init,
    headers: { 'Content-Type': 'application/json' },
  });
}

function binaryResponse(bytes: number[]): Response {
  return new Response(Uint8Array.from(bytes), {
    headers: { 'Content-Type': 'application/octet-stream' },
  });
}

describe('HttpTransport', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  function call(n = 0): { url: string; init: RequestInit | undefined } {
    const [url, init] = fetchMock.mock.calls[n];
    return { url: String(url), init };
  }

  describe('getArrayInfo', () => {
    test('should read shape, type and chunk layout', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({
          id: 'd-1',
          shape: { class: 'H5S_SIMPLE', dims: [10, 4], maxdims: [0, 4] },
          type: { class: 'H5T_INTEGER', base: 'H5T_STD_I32LE' },
          layout: { class: 'H5D_CHUNKED', dims: [5, 4] },
        })
      );
      const transport = new HttpTransport({ endpoint: `${ENDPOINT}/`, domain: '/home/test/data.h5' });
      const info = await transport.getArrayInfo('d-1');

      expect(info).toEqual({
        id: 'd-1',
        shape: [10, 4],
        maxshape: [null, 4],
        type: { class: 'H5T_INTEGER', base: 'H5T_STD_I32LE' },
        chunks: [5, 4],
      });
      expect(call().url).toBe(`${ENDPOINT}/datasets/d-1?domain=%2Fhome%2Ftest%2Fdata.h5`);
      expect(call().init?.method).toBe('GET');
    });

    test('should map null and scalar dataspaces', async () => {
      const type = { class: 'H5T_FLOAT', base: 'H5T_IEEE_F64LE' };
      fetchMock
        .mockResolvedValueOnce(jsonResponse({ id: 'd-2', shape: { class: 'H5S_NULL' }, type }))
        .mockResolvedValueOnce(jsonResponse({ id: 'd-3', shape: { class: 'H5S_SCALAR' }, type }));
      const transport = new HttpTransport({ endpoint: ENDPOINT });

      const nullInfo = await transport.getArrayInfo('d-2');
      const scalarInfo = await transport.getArrayInfo('d-3');
      expect(nullInfo.shape).toBeNull();
      expect(nullInfo.chunks).toBeNull();
      expect(scalarInfo.shape).toEqual([]);
    });
  });

  describe('authentication', () => {
    test('should send a bearer token for an api key', async () => {
      fetchMock.mockResolvedValueOnce(binaryResponse([]));
      const transport = new HttpTransport({ endpoint: ENDPOINT, apiKey: 'test-secret' });
      await transport.getValue({ id: 'd-1' });
      expect(new Headers(call().init?.headers).get('Authorization')).toBe('Bearer test-secret');
    });

    test('should send basic credentials', async () => {
      fetchMock.mockResolvedValueOnce(binaryResponse([]));
      const transport = new HttpTransport({
        endpoint: ENDPOINT,
        auth: { username: 'alice', password: 'test-secret' },
      });
      await transport.getValue({ id: 'd-1' });
      expect(new Headers(call().init?.headers).get('Authorization')).toBe('Basic YWxpY2U6dGVzdC1zZWNyZXQ=');
    });

    test('should be built from configuration', async () => {
      fetchMock.mockResolvedValueOnce(binaryResponse([]));
      const config = loadConfig(
        { hs_endpoint: 'http://cfg.local', hs_username: 'alice', hs_password: 'test-secret', hs_bucket: 'b1' },
        { cwd: '/nonexistent-hslab', homeDir: '/nonexistent-hslab', env: {} }
      );
      const transport = HttpTransport.fromConfig(config);
      await transport.getValue({ id: 'd-1' });
      expect(call().url).toBe('http://cfg.local/datasets/d-1/value?bucket=b1');
      expect(new Headers(call().init?.headers).get('Authorization')).toBe('Basic YWxpY2U6dGVzdC1zZWNyZXQ=');
    });
  });

  describe('values', () => {
    test('should fetch binary values with the select parameter', async () => {
      fetchMock.mockResolvedValueOnce(binaryResponse([1, 0, 0, 0]));
      const transport = new HttpTransport({ endpoint: ENDPOINT });
      const res = await transport.getValue({ id: 'd-1', select: '[0:1]' });

      expect(res).toEqual({ kind: 'binary', bytes: Uint8Array.from([1, 0, 0, 0]) });
      expect(call().url).toBe(`${ENDPOINT}/datasets/d-1/value?select=%5B0%3A1%5D`);
      expect(new Headers(call().init?.headers).get('Accept')).toBe('application/octet-stream');
    });

    test('should unwrap JSON values', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ value: [1, 2] }));
      const transport = new HttpTransport({ endpoint: ENDPOINT });
      expect(await transport.getValue({ id: 'd-1' })).toEqual({ kind: 'json', value: [1, 2] });
    });

    test('should post points as JSON', async () => {
      fetchMock.mockResolvedValueOnce(binaryResponse([7]));
      const transport = new HttpTransport({ endpoint: ENDPOINT });
      await transport.postValue({ id: 'd-1', points: [[0, 1], [2, 3]] });

      expect(call().init?.method).toBe('POST');
      expect(call().init?.body).toBe('{"points":[[0,1],[2,3]]}');
    });

    test('should post long selections as JSON', async () => {
      fetchMock.mockResolvedValueOnce(binaryResponse([]));
      const transport = new HttpTransport({ endpoint: ENDPOINT });
      await transport.postValue({ id: 'd-1', select: '[[1,2,3]]' });
      expect(call().init?.body).toBe('{"select":"[[1,2,3]]"}');
    });

    test('should put packed bytes to a selection', async () => {
      fetchMock.mockResolvedValueOnce(new Response(null, { status: 200 }));
      const transport = new HttpTransport({ endpoint: ENDPOINT });
      await transport.putValue({ id: 'd-1', select: '[0:2]', body: Uint8Array.from([9, 8]) });

      const { url, init } = call();
      expect(url).toBe(`${ENDPOINT}/datasets/d-1/value?select=%5B0%3A2%5D`);
      expect(init?.method).toBe('PUT');
      expect(new Headers(init?.headers).get('Content-Type')).toBe('application/octet-stream');
      const body = init?.body;
      expect(body).toBeInstanceOf(Blob);
      if (body instanceof Blob) {
        expect(new Uint8Array(await body.arrayBuffer())).toEqual(Uint8Array.from([9, 8]));
      }
    });

    test('should put point values as base64 JSON', async () => {
      fetchMock.mockResolvedValueOnce(new Response(null, { status: 200 }));
      const transport = new HttpTransport({ endpoint: ENDPOINT });
      await transport.putValue({ id: 'd-1', points: [[1, 1]], body: Uint8Array.from([1, 2, 3]) });
      expect(call().init?.body).toBe('{"points":[[1,1]],"value_base64":"AQID"}');
    });

    test('should resize through the shape resource', async () => {
      fetchMock.mockResolvedValueOnce(new Response(null, { status: 200 }));
      const transport = new HttpTransport({ endpoint: ENDPOINT });
      await transport.resize('d-1', [20, 4]);
      expect(call().url).toBe(`${ENDPOINT}/datasets/d-1/shape`);
      expect(call().init?.method).toBe('PUT');
      expect(call().init?.body).toBe('{"shape":[20,4]}');
    });
  });

  describe('errors', () => {
    test('should map 413 to PayloadTooLargeError without retrying', async () => {
      fetchMock.mockResolvedValueOnce(new Response('too big', { status: 413 }));
      const transport = new HttpTransport({ endpoint: ENDPOINT });
      await expect(transport.getValue({ id: 'd-1' })).rejects.toBeInstanceOf(PayloadTooLargeError);
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    test('should carry the status of failed requests', async () => {
      fetchMock.mockResolvedValueOnce(
        new Response('boom', { status: 500, statusText: 'Internal Server Error' })
      );
      const transport = new HttpTransport({ endpoint: ENDPOINT });
      const err = await transport.getArrayInfo('d-1').catch((e: unknown) => e);
      expect(err).toBeInstanceOf(TransportError);
      expect(err instanceof TransportError && err.status).toBe(500);
      expect(err instanceof Error && err.message).toBe('GET /datasets/d-1 failed: 500 Internal Server Error boom');
    });

    test('should retry network failures with backoff', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      fetchMock
        .mockRejectedValueOnce(new TypeError('fetch failed'))
        .mockResolvedValueOnce(binaryResponse([5]));
      const transport = new HttpTransport({ endpoint: ENDPOINT, initialDelay: 0.001 });

      const res = await transport.getValue({ id: 'd-1' });
      expect(res).toEqual({ kind: 'binary', bytes: Uint8Array.from([5]) });
      expect(fetchMock).toHaveBeenCalledTimes(2);
      expect(warn).toHaveBeenCalledTimes(1);
    });

    test('should give up after maxRetries', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      fetchMock.mockRejectedValue(new TypeError('fetch failed'));
      const transport = new HttpTransport({ endpoint: ENDPOINT, maxRetries: 2, initialDelay: 0.001 });

      await expect(transport.getValue({ id: 'd-1' })).rejects.toThrow('fetch failed');
      expect(fetchMock).toHaveBeenCalledTimes(3);
    });

    test('should not retry other errors', async () => {
      fetchMock.mockRejectedValueOnce(new Error('This operation was aborted'));
      const transport = new HttpTransport({ endpoint: ENDPOINT, initialDelay: 0.001 });
      await expect(transport.getValue({ id: 'd-1' })).rejects.toThrow('This operation was aborted');
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    test('should refuse requests once closed', async () => {
      const transport = new HttpTransport({ endpoint: ENDPOINT });
      await transport.close();
      await expect(transport.getValue({ id: 'd-1' })).rejects.toThrow('Transport has been closed');
      expect(fetchMock).not.toHaveBeenCalled();
    });

    test('should validate retry options', () => {
      expect(() => new HttpTransport({ endpoint: ENDPOINT, maxRetries: -1 })).toThrow(
        'maxRetries must be non-negative'
      );
      expect(() => new HttpTransport({ endpoint: ENDPOINT, backoffFactor: 0.5 })).toThrow(
        'backoffFactor must be >= 1.0'
      );
    });
  });
});
