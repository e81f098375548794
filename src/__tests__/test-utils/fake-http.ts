import axios, { AxiosInstance, InternalAxiosRequestConfig } from 'axios';

export interface RecordedRequest {
  method: string;
  url: string;
  data: unknown;
  headers: Record<string, unknown>;
}

export interface FakeReply {
  status: number;
  data?: unknown;
  headers?: Record<string, string>;
}

export type FakeRoute = (req: RecordedRequest) => FakeReply | undefined;

/**
 * axios instance whose transport is an in-process handler. Routes are tried
 * in order; the first one returning a reply wins, otherwise 404.
 */
export function createFakeHttp(routes: FakeRoute[]): { http: AxiosInstance; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const http = axios.create({
    adapter: async (config: InternalAxiosRequestConfig) => {
      const req: RecordedRequest = {
        method: (config.method ?? 'get').toUpperCase(),
        url: config.url ?? '',
        data: config.data,
        headers: { ...config.headers },
      };
      requests.push(req);
      const reply = routes.reduce<FakeReply | undefined>((found, route) => found ?? route(req), undefined) ?? {
        status: 404,
        data: { error: 'no route' },
      };
      return {
        data: reply.data,
        status: reply.status,
        statusText: String(reply.status),
        headers: reply.headers ?? {},
        config,
      };
    },
  });
  return { http, requests };
}
