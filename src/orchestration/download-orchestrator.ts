import type { Account, WorkItem } from "../db/schema";
import type {
  AccountStore,
  DownloadQueue,
  OutputStorage,
  RunLog,
  Session,
  SessionProvider,
  TransferClient,
} from "../domain/engine-contracts";
import type { RunOutcome, RunTrigger } from "../domain/models";
import type { EngineConfig } from "../core/config";
import {
  ItemNotFoundError,
  UnknownAccountError,
  ValidationError,
  errorKindOf,
  errorMessageOf,
} from "../core/errors";
import { decide } from "../domain/retry-policy";
import {
  initialRotationState,
  onFailure,
  onSuccess,
  selectAccount,
  type RotationState,
} from "../domain/rotation-policy";
import { applyCooldown } from "../core/cooldown";
import { sleep as defaultSleep, type SleepFn } from "../core/retry";
import { logger } from "../core/logger";

export interface DownloadOrchestratorDeps {
  accounts: AccountStore;
  queue: DownloadQueue;
  sessions: SessionProvider;
  transfer: TransferClient;
  storage: OutputStorage;
  runs: RunLog;
  config: EngineConfig;
  sleep?: SleepFn;
  now?: () => Date;
  runLockTimeoutSeconds?: number;
}

export interface RunOptions {
  signal?: AbortSignal;
}

export interface RunFailure {
  itemId: string;
  lastError: string;
}

export interface RunReport {
  runId: number;
  outcome: RunOutcome;
  done: number;
  failed: number;
  skipped: number;
  pendingRemaining: number;
  failures: RunFailure[];
}

type Tally = Pick<RunReport, "done" | "failed" | "skipped" | "failures">;

interface DrainScope {
  trigger: RunTrigger;
  nextItem: () => Promise<WorkItem | null>;
  pendingRemaining: () => Promise<number>;
}

const DEFAULT_RUN_LOCK_TIMEOUT_SECONDS = 3600;

/**
 * Sequential download loop. One item at a time: pick an account through the rotation
 * policy, reuse or open a session, transfer, then persist the outcome before moving on.
 */
export class DownloadOrchestrator {
  private readonly sleep: SleepFn;
  private readonly now: () => Date;

  constructor(private deps: DownloadOrchestratorDeps) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? (() => new Date());
  }

  async runAll(options: RunOptions = {}): Promise<RunReport> {
    const { queue } = this.deps;
    return this.execute(
      {
        trigger: "all",
        nextItem: () => queue.nextPending(),
        pendingRemaining: async () => (await queue.countByStatus()).pending,
      },
      options
    );
  }

  async runOne(itemId: string, options: RunOptions = {}): Promise<RunReport> {
    const { queue } = this.deps;
    const item = await queue.findById(itemId);
    if (!item) {
      throw new ItemNotFoundError(itemId);
    }

    if (item.status === "done" || item.status === "skipped") {
      logger.info({ itemId, status: item.status }, "Item already settled, nothing to download");
    } else if (item.status === "failed") {
      await queue.resetToPending(itemId);
    }

    const pendingItem = async (): Promise<WorkItem | null> => {
      const current = await queue.findById(itemId);
      return current?.status === "pending" ? current : null;
    };

    return this.execute(
      {
        trigger: "single",
        nextItem: pendingItem,
        pendingRemaining: async () => ((await pendingItem()) ? 1 : 0),
      },
      options
    );
  }

  private async execute(scope: DrainScope, options: RunOptions): Promise<RunReport> {
    const { queue, runs, storage } = this.deps;

    for (const item of await queue.recoverInterrupted()) {
      await storage.discard(storage.resolveDestination(item));
    }
    await runs.recoverStaleRunningRuns(this.deps.runLockTimeoutSeconds ?? DEFAULT_RUN_LOCK_TIMEOUT_SECONDS);

    const runId = await runs.startRun(scope.trigger);
    logger.info({ runId, trigger: scope.trigger }, "Download run started");

    const tally: Tally = { done: 0, failed: 0, skipped: 0, failures: [] };

    let outcome: RunOutcome;
    try {
      outcome = await this.drain(scope, tally, options.signal);
    } catch (error) {
      logger.error({ runId, error: errorMessageOf(error), ...tally }, "Download run aborted");
      await runs.finishRun(runId, "failed", { error: errorMessageOf(error), kind: errorKindOf(error), ...tally });
      throw error;
    }

    const report: RunReport = {
      runId,
      outcome,
      ...tally,
      pendingRemaining: await scope.pendingRemaining(),
    };
    await runs.finishRun(runId, outcome, report);

    logger.info(
      {
        runId,
        outcome,
        done: report.done,
        failed: report.failed,
        skipped: report.skipped,
        pendingRemaining: report.pendingRemaining,
      },
      "Download run finished"
    );
    return report;
  }

  private async drain(scope: DrainScope, tally: Tally, signal: AbortSignal | undefined): Promise<RunOutcome> {
    const { accounts, queue, sessions, transfer, storage, config } = this.deps;

    let rotation: RotationState = initialRotationState();
    let session: Session | null = null;
    const attemptsThisRun = new Map<string, number>();

    const dropSession = async (): Promise<void> => {
      if (!session) return;
      const closing = session;
      session = null;
      if (!sessions.release) return;
      try {
        await sessions.release(closing);
      } catch (error) {
        logger.warn({ accountId: closing.accountId, error: errorMessageOf(error) }, "Failed to release session");
      }
    };

    const sessionFor = async (account: Account): Promise<Session> => {
      if (session && session.accountId === account.id) return session;
      await dropSession();
      session = await sessions.acquire(account);
      return session;
    };

    try {
      for (;;) {
        if (signal?.aborted) {
          logger.warn("Cancellation requested, stopping before the next item");
          return "cancelled";
        }

        const item = await scope.nextItem();
        if (!item) return "completed";

        const destination = storage.resolveDestination(item);
        if (await storage.exists(destination)) {
          await queue.markSkipped(item.id, "already_exists");
          tally.skipped++;
          logger.info({ itemId: item.id, destination }, "Item already on disk, skipped");
          continue;
        }

        const selection = await selectAccount(accounts, rotation, this.now(), config);
        rotation = selection.state;
        if (!selection.ok) {
          logger.warn({ itemId: item.id }, selection.error.message);
          return "quota_exhausted";
        }
        const { account } = selection;

        await queue.markInProgress(item.id);
        const attempt = (attemptsThisRun.get(item.id) ?? 0) + 1;
        attemptsThisRun.set(item.id, attempt);

        try {
          const active = await sessionFor(account);
          await storage.prepare(destination);
          const sizeBytes = await transfer.transfer(active, item.locator, storage.stagingPath(destination));

          if (sizeBytes < config.minFileSizeBytes || sizeBytes > config.maxFileSizeBytes) {
            await storage.discard(destination);
            throw new ValidationError(
              `Downloaded ${sizeBytes} bytes, expected between ${config.minFileSizeBytes} and ${config.maxFileSizeBytes}`
            );
          }
          await storage.commit(destination);

          await accounts.recordSuccess(account.id);
          rotation = onSuccess(rotation);
          await queue.markDone(item.id, { accountId: account.id, sizeBytes, destination });
          tally.done++;
          logger.info({ itemId: item.id, accountId: account.id, sizeBytes, attempt }, "Item downloaded");

          await applyCooldown(config.downloadDelayMs, this.sleep);
        } catch (error) {
          if (error instanceof UnknownAccountError) throw error;

          await storage.discard(destination);

          const decision = decide(attempt, error, config);
          await accounts.recordFailure(account.id, error);
          rotation = onFailure(rotation, decision, config);
          if (decision.rotate) {
            await dropSession();
          }

          const failure = { kind: decision.errorKind, detail: errorMessageOf(error) };
          logger.warn(
            {
              itemId: item.id,
              accountId: account.id,
              attempt,
              errorClass: decision.errorClass,
              retry: decision.retry,
              error: failure.detail,
            },
            "Item attempt failed"
          );

          if (decision.retry) {
            await queue.markRetry(item.id, failure);
            if (decision.delayMs > 0) {
              await this.sleep(decision.delayMs);
            }
          } else {
            await queue.markFailed(item.id, failure);
            tally.failed++;
            tally.failures.push({ itemId: item.id, lastError: failure.kind });
          }
        }
      }
    } finally {
      await dropSession();
    }
  }
}
