import axios, { AxiosError, type AxiosResponse, type InternalAxiosRequestConfig } from "axios";
import { vi } from "vitest";

export type Reply = { status: number; data: unknown } | "network-error";

export type Route = (config: InternalAxiosRequestConfig) => Reply;

/** Axios instance whose transport is a local function instead of the network. */
export function createStubHttp(route: Route) {
  const adapter = vi.fn(async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    const reply = route(config);
    if (reply === "network-error") {
      throw new AxiosError("Network Error", AxiosError.ERR_NETWORK, config);
    }
    return {
      data: reply.data,
      status: reply.status,
      statusText: String(reply.status),
      headers: {},
      config,
    };
  });
  const http = axios.create({ baseURL: "http://scan.test", adapter });
  return { http, adapter };
}

export function requestBody(config: InternalAxiosRequestConfig): unknown {
  return typeof config.data === "string" ? JSON.parse(config.data) : config.data;
}
