import axios, { type AxiosInstance, type AxiosResponse } from "axios";
import { createWriteStream } from "fs";
import { Readable, Transform } from "stream";
import { pipeline } from "stream/promises";
import type { Session, TransferClient } from "../domain/engine-contracts";
import {
  AccountLockedError,
  AuthenticationError,
  PermanentError,
  QuotaExhaustedError,
  TransientError,
  ValidationError,
  errorMessageOf,
} from "../core/errors";

const HTML_ERROR_PAGE_MAX_BYTES = 10000;

export interface HttpTransferClientOptions {
  timeoutMs: number;
  client?: AxiosInstance;
}

function headerOf(headers: AxiosResponse["headers"], name: string): string | undefined {
  const value: unknown = headers[name];
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return undefined;
}

function rejectStatus(response: AxiosResponse<Readable>): Error | null {
  const { status } = response;
  if (status === 509 || headerOf(response.headers, "x-quota-exhausted") !== undefined) {
    return new QuotaExhaustedError(`Remote reported the daily quota as exhausted (HTTP ${status})`);
  }
  if (status >= 200 && status < 300) return null;
  if (status === 429 || status >= 500) return new TransientError(`Transfer answered HTTP ${status}`);
  if (status === 401) return new AuthenticationError("Session was rejected by the remote (HTTP 401)");
  if (status === 403) return new AccountLockedError("Account is blocked by the remote (HTTP 403)");
  return new PermanentError(`Transfer failed with HTTP ${status}`);
}

export class HttpTransferClient implements TransferClient {
  private client: AxiosInstance;

  constructor(options: HttpTransferClientOptions) {
    this.client =
      options.client ??
      axios.create({
        timeout: options.timeoutMs,
        validateStatus: () => true,
      });
  }

  async transfer(session: Session, locator: string, destination: string): Promise<number> {
    let response: AxiosResponse<Readable>;
    try {
      response = await this.client.get<Readable>(locator, {
        headers: session.headers,
        responseType: "stream",
        validateStatus: () => true,
      });
    } catch (error) {
      throw new TransientError(`Transfer request failed: ${errorMessageOf(error)}`, { cause: error });
    }

    const body = response.data;
    const rejection = rejectStatus(response);
    if (rejection) {
      body.destroy();
      throw rejection;
    }

    const contentType = headerOf(response.headers, "content-type") ?? "";
    const contentLength = Number(headerOf(response.headers, "content-length") ?? 0);
    if (contentType.includes("text/html") && contentLength < HTML_ERROR_PAGE_MAX_BYTES) {
      body.destroy();
      throw new ValidationError("Remote answered with an HTML page instead of the file");
    }

    let bytes = 0;
    const counter = new Transform({
      transform(chunk: Buffer, _encoding, callback) {
        bytes += chunk.length;
        callback(null, chunk);
      },
    });

    try {
      await pipeline(body, counter, createWriteStream(destination));
    } catch (error) {
      throw new TransientError(`Transfer interrupted: ${errorMessageOf(error)}`, { cause: error });
    }

    return bytes;
  }
}
