import type { Command } from "commander";
import { accountsRepo } from "../../db/repositories/accounts.repo";
import { workItemsRepo } from "../../db/repositories/work-items.repo";
import { closeDb } from "../../db/client";
import { logger } from "../../core/logger";
import { remainingQuota } from "../../domain/quota";

export const commands = (program: Command) => {
  program
    .command("stats")
    .description("Show queue progress and remaining quota per account")
    .action(async () => {
      const counts = await workItemsRepo.countByStatus();
      const accounts = await accountsRepo.listAll();
      const now = new Date();

      const quota = accounts.map((account) => ({
        accountId: account.id,
        status: account.status,
        remaining: remainingQuota(account, now),
        max: account.maxDailyDownloads,
      }));
      const remainingToday = quota
        .filter((entry) => entry.status === "active")
        .reduce((sum, entry) => sum + entry.remaining, 0);

      logger.info({ ...counts, remainingToday }, "Queue stats");
      for (const entry of quota) {
        console.log(`  [${entry.accountId}] ${entry.status} - ${entry.remaining}/${entry.max} left today`);
      }
      closeDb();
    });
};
