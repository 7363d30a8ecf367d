import type { Command } from "commander";
import { readFileSync } from "fs";
import { workItemsRepo } from "../../db/repositories/work-items.repo";
import { closeDb } from "../../db/client";
import { logger } from "../../core/logger";
import { errorMessageOf } from "../../core/errors";
import { ImportedItemListSchema, WorkItemStatusSchema } from "../../domain/models";
import { ExitCode } from "../exit-codes";

function readJson(path: string): unknown {
  try {
    return JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    logger.error({ path, error: errorMessageOf(error) }, "Could not read import file");
    process.exit(ExitCode.Failure);
  }
}

export const commands = (program: Command) => {
  const queueCmd = program.command("queue").description("Manage the download queue");

  queueCmd
    .command("import")
    .argument("<file>", "JSON array of item metadata")
    .action(async (file: string) => {
      const parsed = ImportedItemListSchema.safeParse(readJson(file));
      if (!parsed.success) {
        logger.error({ file, issues: parsed.error.issues.slice(0, 10) }, "Import file failed validation");
        process.exit(ExitCode.Failure);
      }

      const inserted = await workItemsRepo.enqueue(parsed.data);
      logger.info(
        { file, received: parsed.data.length, inserted, alreadyQueued: parsed.data.length - inserted },
        "Items imported"
      );
      closeDb();
    });

  queueCmd
    .command("list")
    .option("--status <status>", "Filter by status", "pending")
    .option("--limit <n>", "Number of items to show", "50")
    .action(async (options: { status: string; limit: string }) => {
      const status = WorkItemStatusSchema.safeParse(options.status);
      if (!status.success) {
        logger.error({ status: options.status }, "Unknown item status");
        process.exit(ExitCode.Failure);
      }

      const items = await workItemsRepo.listByStatus(status.data, parseInt(options.limit, 10));

      logger.info({ count: items.length, status: status.data }, "Work items");
      for (const item of items) {
        const error = item.lastError ? ` [${item.lastError}]` : "";
        console.log(`  [${item.id}] ${item.kind} "${item.title}" by ${item.author} (attempts: ${item.attempts})${error}`);
      }
      closeDb();
    });

  queueCmd
    .command("retry-failed")
    .description("Send every failed item back to pending")
    .action(async () => {
      const count = await workItemsRepo.resetFailed();
      logger.info({ count }, "Failed items requeued");
      closeDb();
    });
};
