import type { Account } from "../../src/db/schema";
import type { ImportedItem } from "../../src/domain/models";
import type { EngineConfig } from "../../src/core/config";

export const TEST_NOW = new Date(2024, 4, 10, 12, 0, 0);

export function makeAccount(id: string, overrides: Partial<Account> = {}): Account {
  return {
    id,
    secret: "test-secret",
    status: "active",
    maxDailyDownloads: 10,
    dailyDownloads: 0,
    lastReset: "2024-05-10",
    lastErrorCode: null,
    lastErrorDetail: null,
    lastErrorAt: null,
    createdAt: 0,
    updatedAt: 0,
    ...overrides,
  };
}

export function makeItem(id: string, overrides: Partial<ImportedItem> = {}): ImportedItem {
  return {
    id,
    kind: "file",
    title: `Title ${id}`,
    author: "Test Author",
    locator: `https://files.example.test/${id}`,
    extension: "pdf",
    ...overrides,
  };
}

export function makeConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return {
    rotationThreshold: 3,
    maxConsecutiveFailures: 3,
    authFailuresBeforeDisqualify: 2,
    maxAttempts: 3,
    retryBaseDelayMs: 10,
    retryMaxDelayMs: 100,
    minFileSizeBytes: 1000,
    maxFileSizeBytes: 1_000_000,
    downloadDelayMs: 0,
    ...overrides,
  };
}
