import type { Account, WorkItem } from "../db/schema";
import type { ErrorKind } from "../core/errors";
import type { RunStatus, RunTrigger } from "./models";

export interface Session {
  accountId: string;
  createdAt: Date;
  headers: Record<string, string>;
}

/**
 * Produces an authenticated session for one account.
 *
 * Rejects with `AuthenticationError` for bad credentials, `AccountLockedError` when the
 * remote side has blocked the account and `TransientError` for network trouble.
 */
export interface SessionProvider {
  acquire(account: Account): Promise<Session>;
  release?(session: Session): Promise<void>;
}

/** Moves one item to `destination` and resolves with the number of bytes written. */
export interface TransferClient {
  transfer(session: Session, locator: string, destination: string): Promise<number>;
}

export interface AccountStore {
  listUsable(now: Date): Promise<Account[]>;
  recordSuccess(accountId: string): Promise<Account>;
  recordFailure(accountId: string, error: unknown): Promise<void>;
}

export interface ItemFailure {
  kind: ErrorKind;
  detail: string;
}

export interface ItemCompletion {
  accountId: string;
  sizeBytes: number;
  destination: string;
}

export interface DownloadQueue {
  /** Returns the items moved from `in_progress` back to `pending`. */
  recoverInterrupted(): Promise<WorkItem[]>;
  nextPending(): Promise<WorkItem | null>;
  findById(id: string): Promise<WorkItem | null>;
  markInProgress(id: string): Promise<WorkItem>;
  markDone(id: string, completion: ItemCompletion): Promise<WorkItem>;
  markFailed(id: string, failure: ItemFailure): Promise<WorkItem>;
  markSkipped(id: string, reason: string): Promise<WorkItem>;
  markRetry(id: string, failure: ItemFailure): Promise<WorkItem>;
  resetToPending(id: string): Promise<WorkItem>;
  countByStatus(): Promise<Record<WorkItem["status"], number>>;
}

export interface OutputStorage {
  resolveDestination(item: Pick<WorkItem, "kind" | "title" | "author" | "extension">): string;
  /** Path a transfer writes to; the file only appears at `destination` once committed. */
  stagingPath(destination: string): string;
  exists(destination: string): Promise<boolean>;
  prepare(destination: string): Promise<void>;
  commit(destination: string): Promise<void>;
  /** Removes both the destination and its staging file. */
  discard(destination: string): Promise<void>;
}

export interface RunLog {
  recoverStaleRunningRuns(timeoutSeconds: number): Promise<number>;
  startRun(trigger: RunTrigger): Promise<number>;
  finishRun(id: number, status: Exclude<RunStatus, "running">, notes: unknown): Promise<void>;
}
