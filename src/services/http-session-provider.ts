import axios, { type AxiosInstance, type AxiosResponse } from "axios";
import type { Account } from "../db/schema";
import type { Session, SessionProvider } from "../domain/engine-contracts";
import {
  AccountLockedError,
  AuthenticationError,
  TransientError,
  errorMessageOf,
} from "../core/errors";
import { logger } from "../core/logger";

export interface HttpSessionProviderOptions {
  loginUrl: string;
  timeoutMs: number;
  client?: AxiosInstance;
}

/** Keeps the `name=value` part of each `Set-Cookie` header. */
export function sessionCookies(setCookie: unknown): string[] {
  const values: unknown[] = Array.isArray(setCookie) ? setCookie : [setCookie];
  return values
    .filter((value): value is string => typeof value === "string")
    .map((value) => value.split(";")[0]?.trim() ?? "")
    .filter((pair) => pair.includes("="));
}

export class HttpSessionProvider implements SessionProvider {
  private client: AxiosInstance;

  constructor(private options: HttpSessionProviderOptions) {
    this.client =
      options.client ??
      axios.create({
        timeout: options.timeoutMs,
        maxRedirects: 0,
        validateStatus: () => true,
      });
  }

  async acquire(account: Account): Promise<Session> {
    const form = new URLSearchParams({ email: account.id, password: account.secret });

    let response: AxiosResponse<unknown>;
    try {
      response = await this.client.post<unknown>(this.options.loginUrl, form.toString(), {
        headers: { "content-type": "application/x-www-form-urlencoded" },
        maxRedirects: 0,
        validateStatus: () => true,
      });
    } catch (error) {
      throw new TransientError(`Login request failed: ${errorMessageOf(error)}`, { cause: error });
    }

    const { status } = response;
    if (status === 429 || status >= 500) {
      throw new TransientError(`Login endpoint answered HTTP ${status}`);
    }
    if (status === 403 || status === 423) {
      throw new AccountLockedError(`Account ${account.id} is blocked by the remote (HTTP ${status})`);
    }
    if (status >= 400) {
      throw new AuthenticationError(`Login rejected for ${account.id} (HTTP ${status})`);
    }

    const cookies = sessionCookies(response.headers["set-cookie"]);
    if (cookies.length === 0) {
      throw new AuthenticationError(`Login for ${account.id} returned no session cookies`);
    }

    logger.info({ accountId: account.id, cookieCount: cookies.length }, "Session acquired");
    return {
      accountId: account.id,
      createdAt: new Date(),
      headers: { cookie: cookies.join("; ") },
    };
  }
}
