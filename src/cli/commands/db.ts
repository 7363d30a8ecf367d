import type { Command } from "commander";
import { runMigrations } from "../../db/migrate";
import { closeDb, getSqlite } from "../../db/client";

export const commands = (program: Command) => {
  const dbCmd = program.command("db");

  dbCmd
    .command("migrate")
    .description("Run database migrations")
    .action(() => {
      runMigrations(getSqlite());
      closeDb();
    });
};
