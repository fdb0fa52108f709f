import axios, { AxiosAdapter, AxiosError, AxiosResponse, InternalAxiosRequestConfig } from 'axios';

export interface StubReply {
  status: number;
  data: unknown;
  headers?: Record<string, string>;
}

export type StubHandler = (config: InternalAxiosRequestConfig) => StubReply | Promise<StubReply>;

/**
 * Routes every axios client created afterwards through `handler`.
 * Returns a function restoring the previous adapter.
 */
export const stubHttp = (handler: StubHandler): (() => void) => {
  const previous = axios.defaults.adapter;
  const adapter: AxiosAdapter = async (config) => {
    const reply = await handler(config);
    const response: AxiosResponse = {
      data: reply.data,
      status: reply.status,
      statusText: String(reply.status),
      headers: reply.headers ?? {},
      config,
    };
    if (reply.status >= 400) {
      throw new AxiosError(
        `Request failed with status code ${reply.status}`,
        reply.status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
        config,
        null,
        response,
      );
    }
    return response;
  };
  axios.defaults.adapter = adapter;
  return () => {
    axios.defaults.adapter = previous;
  };
};
