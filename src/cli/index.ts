#!/usr/bin/env node
import { Command } from "commander";
import { commands as accountsCommands } from "./commands/accounts";
import { commands as queueCommands } from "./commands/queue";
import { commands as downloadCommands } from "./commands/download";
import { commands as statsCommands } from "./commands/stats";
import { commands as runsCommands } from "./commands/runs";
import { commands as dbCommands } from "./commands/db";
import { logger } from "../core/logger";
import { errorKindOf, errorMessageOf } from "../core/errors";
import { closeDb } from "../db/client";
import { ExitCode } from "./exit-codes";

const program = new Command();

program
  .name("quotaflow")
  .description("Quota-aware multi-account download queue with rotation and resumable progress")
  .version("0.1.0");

accountsCommands(program);
queueCommands(program);
downloadCommands(program);
statsCommands(program);
runsCommands(program);
dbCommands(program);

program.parseAsync().catch((error: unknown) => {
  logger.fatal({ kind: errorKindOf(error), error: errorMessageOf(error) }, "Command failed");
  closeDb();
  process.exit(ExitCode.Failure);
});
