import type { Command } from "commander";
import { runsRepo } from "../../db/repositories/runs.repo";
import { closeDb } from "../../db/client";
import { logger } from "../../core/logger";

export const commands = (program: Command) => {
  const runsCmd = program.command("runs");

  runsCmd
    .command("list")
    .option("--limit <n>", "Number of runs to show", "20")
    .action(async (options: { limit: string }) => {
      const limit = parseInt(options.limit, 10);
      const runs = await runsRepo.listRecent(limit);

      logger.info({ count: runs.length }, "Recent download runs");

      for (const run of runs) {
        const ended = run.endedAt ? ` -> ${new Date(run.endedAt * 1000).toISOString()}` : "";
        console.log(
          `  [${run.id}] ${run.trigger} - ${run.status} - ${new Date(run.startedAt * 1000).toISOString()}${ended}`
        );
      }
      closeDb();
    });
};
