import { AxiosAdapter, InternalAxiosRequestConfig } from 'axios';

export interface StubReply {
  status: number;
  data: unknown;
}

/**
 * Axios adapter answering from a handler instead of the network.
 * Every request config is kept for assertions.
 */
export const stubAdapter = (
  handler: (config: InternalAxiosRequestConfig) => StubReply | Promise<StubReply>
): { adapter: AxiosAdapter; requests: InternalAxiosRequestConfig[] } => {
  const requests: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    requests.push(config);
    const reply = await handler(config);
    return {
      data: reply.data,
      status: reply.status,
      statusText: String(reply.status),
      headers: {},
      config,
    };
  };
  return { adapter, requests };
};
