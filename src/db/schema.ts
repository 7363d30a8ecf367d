import { sqliteTable, text, integer, index } from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";

export const accounts = sqliteTable(
  "accounts",
  {
    id: text("id").primaryKey(),
    secret: text("secret").notNull(),
    status: text("status", { enum: ["active", "disabled"] }).notNull().default("active"),
    maxDailyDownloads: integer("max_daily_downloads").notNull(),
    dailyDownloads: integer("daily_downloads").notNull().default(0),
    lastReset: text("last_reset").notNull(),
    lastErrorCode: text("last_error_code"),
    lastErrorDetail: text("last_error_detail"),
    lastErrorAt: integer("last_error_at"),
    createdAt: integer("created_at").notNull().default(sql`(unixepoch())`),
    updatedAt: integer("updated_at").notNull().default(sql`(unixepoch())`),
  },
  (table) => ({
    statusIdx: index("accounts_status_idx").on(table.status),
  })
);

export const workItems = sqliteTable(
  "work_items",
  {
    seq: integer("seq").primaryKey({ autoIncrement: true }),
    id: text("id").notNull().unique(),
    kind: text("kind", { enum: ["file", "cover"] }).notNull().default("file"),
    title: text("title").notNull(),
    author: text("author").notNull(),
    locator: text("locator").notNull(),
    extension: text("extension").notNull().default("pdf"),
    status: text("status", {
      enum: ["pending", "in_progress", "done", "failed", "skipped"],
    }).notNull().default("pending"),
    attempts: integer("attempts").notNull().default(0),
    lastError: text("last_error"),
    lastErrorDetail: text("last_error_detail"),
    skipReason: text("skip_reason"),
    downloadAccountId: text("download_account_id"),
    sizeBytes: integer("size_bytes"),
    destination: text("destination"),
    createdAt: integer("created_at").notNull().default(sql`(unixepoch())`),
    updatedAt: integer("updated_at").notNull().default(sql`(unixepoch())`),
  },
  (table) => ({
    statusSeqIdx: index("work_items_status_seq_idx").on(table.status, table.seq),
  })
);

export const downloadRuns = sqliteTable("download_runs", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  trigger: text("trigger", { enum: ["all", "single"] }).notNull(),
  status: text("status", {
    enum: ["running", "completed", "quota_exhausted", "cancelled", "failed"],
  }).notNull().default("running"),
  startedAt: integer("started_at").notNull(),
  endedAt: integer("ended_at"),
  notes: text("notes"),
});

export type Account = typeof accounts.$inferSelect;
export type NewAccount = typeof accounts.$inferInsert;
export type WorkItem = typeof workItems.$inferSelect;
export type NewWorkItem = typeof workItems.$inferInsert;
export type DownloadRun = typeof downloadRuns.$inferSelect;
export type NewDownloadRun = typeof downloadRuns.$inferInsert;
