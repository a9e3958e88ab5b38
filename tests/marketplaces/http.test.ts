import { describe, it, expect } from 'vitest';
import { AxiosError } from 'axios';
import { createHttpClient, describeHttpFailure } from '../../src/marketplaces/http';

describe('createHttpClient', () => {
  it('should apply base URL, timeout and JSON headers', () => {
    const http = createHttpClient({
      baseURL: 'https://stub.test',
      timeoutMs: 5000,
      headers: { 'Api-Key': 'test-secret' },
    });

    expect(http.defaults.baseURL).toBe('https://stub.test');
    expect(http.defaults.timeout).toBe(5000);
    expect(http.defaults.headers['Api-Key']).toBe('test-secret');
    expect(http.defaults.headers['Content-Type']).toBe('application/json');
  });
});

describe('describeHttpFailure', () => {
  it('should describe plain errors by message', () => {
    expect(describeHttpFailure(new Error('boom'))).toEqual({ reason: 'boom' });
  });

  it('should describe non-errors by their string form', () => {
    expect(describeHttpFailure('nope')).toEqual({ reason: 'nope' });
  });

  it('should describe coded axios errors without a response', () => {
    const error = new AxiosError('getaddrinfo ENOTFOUND stub.test', 'ENOTFOUND');
    expect(describeHttpFailure(error)).toEqual({ reason: 'ENOTFOUND: getaddrinfo ENOTFOUND stub.test' });
  });

  it('should describe timeouts', () => {
    const error = new AxiosError('timeout of 100ms exceeded', 'ETIMEDOUT');
    expect(describeHttpFailure(error)).toEqual({ reason: 'timeout (timeout of 100ms exceeded)' });
  });
});
