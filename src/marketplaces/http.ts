import axios, { AxiosInstance, RawAxiosRequestHeaders } from 'axios';

export interface HttpClientOptions {
  baseURL: string;
  headers: RawAxiosRequestHeaders;
  timeoutMs: number;
}

export function createHttpClient(options: HttpClientOptions): AxiosInstance {
  return axios.create({
    baseURL: options.baseURL,
    timeout: options.timeoutMs,
    headers: {
      'Content-Type': 'application/json',
      Accept: 'application/json',
      ...options.headers,
    },
  });
}

export interface HttpFailure {
  reason: string;
  httpStatus?: number;
}

/**
 * Summarize a failed request for error messages and logs
 */
export function describeHttpFailure(error: unknown): HttpFailure {
  if (axios.isAxiosError(error)) {
    const httpStatus = error.response?.status;
    if (httpStatus !== undefined) {
      return { reason: `HTTP ${httpStatus}${error.response?.statusText ? ` ${error.response.statusText}` : ''}`, httpStatus };
    }
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return { reason: `timeout (${error.message})` };
    }
    return { reason: error.code ? `${error.code}: ${error.message}` : error.message };
  }

  return { reason: error instanceof Error ? error.message : String(error) };
}
