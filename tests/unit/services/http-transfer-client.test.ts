import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { Readable } from "stream";
import { HttpTransferClient } from "../../../src/services/http-transfer-client";
import type { Session } from "../../../src/domain/engine-contracts";
import {
  AccountLockedError,
  AuthenticationError,
  PermanentError,
  QuotaExhaustedError,
  TransientError,
  ValidationError,
} from "../../../src/core/errors";
import { stubAxios, type StubResponse } from "../../helpers/axios-stub";

const LOCATOR = "https://files.example.test/item-1";
const session: Session = { accountId: "reader-one", createdAt: new Date(0), headers: { cookie: "sid=abc" } };

function body(size: number): Readable {
  return Readable.from([Buffer.alloc(size, 7)]);
}

function clientAnswering(response: StubResponse) {
  return stubAxios(() => response);
}

describe("HttpTransferClient", () => {
  let dir: string;
  let destination: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "quotaflow-transfer-"));
    destination = join(dir, "item-1.pdf");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should stream the body to the destination and count the bytes", async () => {
    const { client, requests } = clientAnswering({
      status: 200,
      headers: { "content-type": "application/pdf", "content-length": "1500" },
      data: body(1500),
    });
    const transfer = new HttpTransferClient({ timeoutMs: 1000, client });

    const size = await transfer.transfer(session, LOCATOR, destination);

    expect(size).toBe(1500);
    expect((await readFile(destination)).length).toBe(1500);
    expect(requests[0]?.url).toBe(LOCATOR);
    expect(requests[0]?.headers.get("cookie")).toBe("sid=abc");
  });

  it.each([
    { status: 503, expected: TransientError },
    { status: 429, expected: TransientError },
    { status: 401, expected: AuthenticationError },
    { status: 403, expected: AccountLockedError },
    { status: 509, expected: QuotaExhaustedError },
    { status: 404, expected: PermanentError },
  ])("should map HTTP $status to the matching error", async ({ status, expected }) => {
    const { client } = clientAnswering({ status, data: body(10) });
    const transfer = new HttpTransferClient({ timeoutMs: 1000, client });

    await expect(transfer.transfer(session, LOCATOR, destination)).rejects.toBeInstanceOf(expected);
  });

  it("should honour the quota header on an otherwise successful response", async () => {
    const { client } = clientAnswering({ status: 200, headers: { "x-quota-exhausted": "1" }, data: body(10) });
    const transfer = new HttpTransferClient({ timeoutMs: 1000, client });

    await expect(transfer.transfer(session, LOCATOR, destination)).rejects.toBeInstanceOf(QuotaExhaustedError);
  });

  it("should reject a small HTML page served in place of the file", async () => {
    const { client } = clientAnswering({
      status: 200,
      headers: { "content-type": "text/html; charset=utf-8", "content-length": "512" },
      data: body(512),
    });
    const transfer = new HttpTransferClient({ timeoutMs: 1000, client });

    await expect(transfer.transfer(session, LOCATOR, destination)).rejects.toBeInstanceOf(ValidationError);
  });

  it("should treat network errors as transient", async () => {
    const { client } = stubAxios(() => new Error("ECONNRESET"));
    const transfer = new HttpTransferClient({ timeoutMs: 1000, client });

    await expect(transfer.transfer(session, LOCATOR, destination)).rejects.toThrow(
      "Transfer request failed: ECONNRESET"
    );
  });

  it("should treat a body that breaks mid-stream as transient", async () => {
    const broken = new Readable({
      read() {
        this.destroy(new Error("connection reset"));
      },
    });
    const { client } = clientAnswering({ status: 200, headers: { "content-type": "application/pdf" }, data: broken });
    const transfer = new HttpTransferClient({ timeoutMs: 1000, client });

    await expect(transfer.transfer(session, LOCATOR, destination)).rejects.toBeInstanceOf(TransientError);
  });
});
