import axios, { type AxiosRequestConfig } from "axios";
import type { ErrorResponse } from "./types.js";

export interface ClientConfig {
  /** Base URL for the API server (e.g., "http://localhost:3000") */
  baseUrl: string;
  /** Request timeout in milliseconds (default: 10000) */
  timeout?: number;
}

export interface RequestParams {
  path?: string;
  body?: unknown;
  query?: Record<string, unknown>;
}

/** A non-2xx response, or no response at all (status 0) */
export class ApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly details?: Record<string, string>,
  ) {
    super(message);
    this.name = "ApiError";
  }
}

function isErrorResponse(data: unknown): data is ErrorResponse {
  return (
    typeof data === "object" &&
    data !== null &&
    "message" in data &&
    typeof data.message === "string"
  );
}

/** Turn an axios failure into an ApiError carrying the server's message. */
export function toApiError(err: unknown): unknown {
  if (!axios.isAxiosError(err)) return err;
  const status = err.response?.status ?? 0;
  const data: unknown = err.response?.data;
  if (isErrorResponse(data)) {
    return new ApiError(data.message, status, data.details);
  }
  return new ApiError(err.message, status);
}

export class BaseClient {
  protected baseUrl: string;
  protected resource: string;
  protected timeout: number;

  constructor(resource: string, config: ClientConfig) {
    this.resource = "/" + resource;
    this.baseUrl = config.baseUrl;
    this.timeout = config.timeout ?? 10000;
  }

  protected buildPath(params: RequestParams): string {
    return params.path ? this.resource + "/" + params.path : this.resource;
  }

  protected buildConfig(params: RequestParams): AxiosRequestConfig {
    const config: AxiosRequestConfig = {
      baseURL: this.baseUrl,
      timeout: this.timeout,
      headers: {
        "Content-Type": "application/json",
        Accept: "application/json",
      },
    };

    if (params.query) {
      config.params = params.query;
    }

    return config;
  }

  public async get<T>(params: RequestParams = {}): Promise<T> {
    try {
      const response = await axios.get<T>(this.buildPath(params), this.buildConfig(params));
      return response.data;
    } catch (err) {
      throw toApiError(err);
    }
  }

  public async post<T>(params: RequestParams = {}): Promise<T> {
    try {
      const response = await axios.post<T>(
        this.buildPath(params),
        params.body,
        this.buildConfig(params),
      );
      return response.data;
    } catch (err) {
      throw toApiError(err);
    }
  }
}
