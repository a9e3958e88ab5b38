import axios, { AxiosError, AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios';

export interface RecordedRequest {
  method: string;
  url: string;
  params: unknown;
  body: unknown;
}

export type StubReply =
  | { status?: number; statusText?: string; data: unknown }
  | { networkError: string; code: string };

/**
 * Axios instance whose adapter answers in-process instead of opening sockets
 */
export function createStubHttp(reply: (request: RecordedRequest) => StubReply): {
  http: AxiosInstance;
  requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];

  const http = axios.create({
    baseURL: 'https://stub.test',
    adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      const request: RecordedRequest = {
        method: (config.method ?? 'get').toUpperCase(),
        url: config.url ?? '',
        params: config.params,
        body: typeof config.data === 'string' ? JSON.parse(config.data) : config.data,
      };
      requests.push(request);

      const answer = reply(request);
      if ('networkError' in answer) {
        throw new AxiosError(answer.networkError, answer.code, config);
      }

      const response: AxiosResponse = {
        data: answer.data,
        status: answer.status ?? 200,
        statusText: answer.statusText ?? '',
        headers: {},
        config,
      };
      if (response.status >= 400) {
        throw new AxiosError(
          `Request failed with status code ${response.status}`,
          AxiosError.ERR_BAD_RESPONSE,
          config,
          undefined,
          response
        );
      }
      return response;
    },
  });

  return { http, requests };
}
