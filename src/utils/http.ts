// CHANGE: Single-attempt HTTP helpers that convert non-2xx responses into UpstreamError.
// WHY: Any failed upstream call ends the audit; there is no retry or partial result.

import axios, { AxiosInstance, AxiosResponse, isAxiosError } from "axios";
import { NET } from "../config.js";
import { PipelineStage, UpstreamError } from "../errors.js";
import { debug } from "../logger.js";

export type QueryParams = Readonly<Record<string, string | number>>;

export interface RequestOptions {
  readonly headers?: Readonly<Record<string, string>>;
  readonly params?: QueryParams;
}

export interface JsonResponse<T> {
  readonly data: T;
  readonly status: number;
}

const httpClient: AxiosInstance = axios.create({
  timeout: NET.TIMEOUT,
  maxRedirects: 5,
  headers: {
    "User-Agent": "scan-coverage-audit/1.0",
    Accept: "application/json"
  }
});

/**
 * Render the request target as it appears on the wire, for diagnostics.
 */
export function describeUrl(url: string, params?: QueryParams): string {
  if (!params || Object.keys(params).length === 0) {
    return url;
  }
  const query = new URLSearchParams(Object.entries(params).map(([key, value]): [string, string] => [key, String(value)]));
  return `${url}${url.includes("?") ? "&" : "?"}${query.toString()}`;
}

function toUpstreamError(rawError: unknown, stage: PipelineStage, target: string): Error {
  if (isAxiosError(rawError)) {
    const status = rawError.response?.status ?? 0;
    return new UpstreamError(stage, status, target, status === 0 ? rawError.message : rawError.response?.statusText);
  }
  return rawError instanceof Error ? rawError : new Error(String(rawError));
}

async function execute<T>(
  operation: () => Promise<AxiosResponse<T>>,
  stage: PipelineStage,
  target: string
): Promise<JsonResponse<T>> {
  let response: AxiosResponse<T>;
  try {
    response = await operation();
  } catch (rawError) {
    throw toUpstreamError(rawError, stage, target);
  }
  if (response.status < 200 || response.status >= 300) {
    throw new UpstreamError(stage, response.status, target, response.statusText);
  }
  debug(`${stage}: ${target} -> ${response.status}`);
  return {
    data: response.data,
    status: response.status
  };
}

/**
 * Perform GET request expecting JSON payload.
 *
 * @param stage - Pipeline stage reported if the request fails.
 * @throws UpstreamError on a non-2xx status or a missing response.
 */
export async function getJson<T>(url: string, stage: PipelineStage, options: RequestOptions = {}): Promise<JsonResponse<T>> {
  const target = describeUrl(url, options.params);
  return execute(
    () =>
      httpClient.get<T>(url, {
        headers: { ...options.headers },
        params: options.params ? { ...options.params } : undefined
      }),
    stage,
    target
  );
}

/**
 * Perform POST request with an `application/x-www-form-urlencoded` body, expecting JSON back.
 *
 * @throws UpstreamError on a non-2xx status or a missing response.
 */
export async function postForm<T>(
  url: string,
  fields: Readonly<Record<string, string>>,
  stage: PipelineStage,
  options: RequestOptions = {}
): Promise<JsonResponse<T>> {
  const body = new URLSearchParams(Object.entries(fields));
  return execute(
    () =>
      httpClient.post<T>(url, body.toString(), {
        headers: {
          "Content-Type": "application/x-www-form-urlencoded",
          ...options.headers
        }
      }),
    stage,
    url
  );
}

export { httpClient };
