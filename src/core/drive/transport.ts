/**
 * Authenticated HTTP transport consumed by DriveClient.
 *
 * Credentials are owned by the caller; the transport only asks for a token per request.
 */

import fetch from "node-fetch";
import type { Readable } from "stream";

export type HttpMethod = "GET" | "POST" | "PATCH" | "PUT" | "DELETE";

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  body?: string | Buffer | Readable;
}

export interface TransportResponse {
  status: number;
  text(): Promise<string>;
  buffer(): Promise<Buffer>;
}

export type DriveTransport = (request: TransportRequest) => Promise<TransportResponse>;

export type AccessTokenSource = () => string | Promise<string>;

/**
 * Transport that sends every request with `Authorization: Bearer <token>`.
 */
export function createBearerTransport(getAccessToken: AccessTokenSource): DriveTransport {
  return async (request) => {
    const token = await getAccessToken();
    const res = await fetch(request.url, {
      method: request.method,
      headers: { ...request.headers, Authorization: `Bearer ${token}` },
      body: request.body,
    });
    return {
      status: res.status,
      text: () => res.text(),
      buffer: () => res.buffer(),
    };
  };
}
