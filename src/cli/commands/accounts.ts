import type { Command } from "commander";
import { accountsRepo } from "../../db/repositories/accounts.repo";
import { closeDb } from "../../db/client";
import { logger } from "../../core/logger";
import { env } from "../../core/config";
import { AccountStatusSchema, NewAccountInputSchema } from "../../domain/models";
import { remainingQuota } from "../../domain/quota";
import { ExitCode } from "../exit-codes";

export const commands = (program: Command) => {
  const accountsCmd = program.command("accounts").description("Manage download accounts");

  accountsCmd
    .command("add")
    .requiredOption("--id <id>", "Account identifier (the login name)")
    .requiredOption("--secret <secret>", "Account password")
    .option("--max-daily <n>", "Daily download quota", String(env.DEFAULT_MAX_DAILY_DOWNLOADS))
    .action(async (options: { id: string; secret: string; maxDaily: string }) => {
      const parsed = NewAccountInputSchema.safeParse({
        id: options.id,
        secret: options.secret,
        maxDailyDownloads: options.maxDaily,
      });
      if (!parsed.success) {
        logger.error({ issues: parsed.error.issues }, "Invalid account");
        process.exit(ExitCode.Failure);
      }

      const existing = await accountsRepo.findById(parsed.data.id);
      if (existing) {
        logger.error({ accountId: parsed.data.id }, "Account already exists");
        process.exit(ExitCode.Failure);
      }

      const account = await accountsRepo.create(parsed.data);
      logger.info({ accountId: account.id, maxDailyDownloads: account.maxDailyDownloads }, "Account added");
      closeDb();
    });

  accountsCmd
    .command("list")
    .action(async () => {
      const list = await accountsRepo.listAll();
      const now = new Date();

      logger.info({ count: list.length }, "Accounts");
      for (const account of list) {
        console.log(
          `  [${account.id}] ${account.status} - ${remainingQuota(account, now)}/${account.maxDailyDownloads} left today` +
            (account.lastErrorCode ? ` (last error: ${account.lastErrorCode})` : "")
        );
      }
      closeDb();
    });

  accountsCmd
    .command("update-status")
    .requiredOption("--id <id>", "Account identifier")
    .requiredOption("--status <status>", "New status (active, disabled)")
    .action(async (options: { id: string; status: string }) => {
      const status = AccountStatusSchema.safeParse(options.status);
      if (!status.success) {
        logger.error({ status: options.status }, "Unknown account status");
        process.exit(ExitCode.Failure);
      }

      const updated = await accountsRepo.updateStatus(options.id, status.data);
      if (!updated) {
        logger.error({ accountId: options.id }, "Account not found");
        process.exit(ExitCode.Failure);
      }

      logger.info({ accountId: updated.id, status: updated.status }, "Account status updated");
      closeDb();
    });
};
