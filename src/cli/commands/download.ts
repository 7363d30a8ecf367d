import type { Command } from "commander";
import { DownloadOrchestrator, type RunReport } from "../../orchestration/download-orchestrator";
import { accountsRepo } from "../../db/repositories/accounts.repo";
import { workItemsRepo } from "../../db/repositories/work-items.repo";
import { runsRepo } from "../../db/repositories/runs.repo";
import { closeDb } from "../../db/client";
import { HttpSessionProvider } from "../../services/http-session-provider";
import { HttpTransferClient } from "../../services/http-transfer-client";
import { LocalOutputStorage } from "../../services/output-storage";
import { ConfigError } from "../../core/errors";
import { env, engineConfigFromEnv } from "../../core/config";
import { logger } from "../../core/logger";
import { exitCodeFor } from "../exit-codes";

function buildOrchestrator(): DownloadOrchestrator {
  if (!env.REMOTE_LOGIN_URL) {
    throw new ConfigError("REMOTE_LOGIN_URL must be set to download");
  }

  return new DownloadOrchestrator({
    accounts: accountsRepo,
    queue: workItemsRepo,
    runs: runsRepo,
    sessions: new HttpSessionProvider({ loginUrl: env.REMOTE_LOGIN_URL, timeoutMs: env.HTTP_TIMEOUT_MS }),
    transfer: new HttpTransferClient({ timeoutMs: env.HTTP_TIMEOUT_MS }),
    storage: new LocalOutputStorage(env.DOWNLOAD_DIR, env.MAX_FILENAME_LENGTH),
    config: engineConfigFromEnv(),
    runLockTimeoutSeconds: env.RUN_LOCK_TIMEOUT_SECONDS,
  });
}

/** First signal stops the loop before the next item; the item in flight is allowed to finish. */
function cancellationSignal(): AbortSignal {
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    logger.warn({ signal }, "Stopping after the current item");
    controller.abort();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
  return controller.signal;
}

function finish(report: RunReport): never {
  logger.info(
    {
      runId: report.runId,
      outcome: report.outcome,
      done: report.done,
      failed: report.failed,
      skipped: report.skipped,
      pendingRemaining: report.pendingRemaining,
    },
    "Download summary"
  );
  if (report.failures.length > 0) {
    logger.warn({ failures: report.failures }, "Items failed during the run");
  }
  closeDb();
  process.exit(exitCodeFor(report));
}

export const commands = (program: Command) => {
  program
    .command("download:all")
    .description("Download every pending item until the queue drains or quota runs out")
    .action(async () => {
      const orchestrator = buildOrchestrator();
      finish(await orchestrator.runAll({ signal: cancellationSignal() }));
    });

  program
    .command("download:one")
    .requiredOption("--item <id>", "Work item id")
    .action(async (options: { item: string }) => {
      const orchestrator = buildOrchestrator();
      finish(await orchestrator.runOne(options.item, { signal: cancellationSignal() }));
    });
};
