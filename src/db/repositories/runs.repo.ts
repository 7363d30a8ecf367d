import { eq, and, desc, lt } from "drizzle-orm";
import type { DownloadRun, NewDownloadRun } from "../schema";
import { downloadRuns } from "../schema";
import { getDb, type AppDatabase } from "../client";
import { logger } from "../../core/logger";
import type { RunLog } from "../../domain/engine-contracts";
import type { RunStatus, RunTrigger } from "../../domain/models";

const nowSeconds = () => Math.floor(Date.now() / 1000);

export class RunsRepository implements RunLog {
  constructor(private db: AppDatabase = getDb()) {}

  async createRun(data: NewDownloadRun): Promise<DownloadRun> {
    const result = await this.db.insert(downloadRuns).values(data).returning();
    if (!result || result.length === 0 || !result[0]) {
      throw new Error("Failed to create download run");
    }
    logger.info({ runId: result[0].id, trigger: result[0].trigger }, "Download run created");
    return result[0];
  }

  async startRun(trigger: RunTrigger): Promise<number> {
    const run = await this.createRun({ trigger, status: "running", startedAt: nowSeconds() });
    return run.id;
  }

  async finishRun(id: number, status: Exclude<RunStatus, "running">, notes: unknown): Promise<void> {
    await this.updateRun(id, { status, endedAt: nowSeconds(), notes: JSON.stringify(notes) });
  }

  async findById(id: number): Promise<DownloadRun | null> {
    const [result] = await this.db.select().from(downloadRuns).where(eq(downloadRuns.id, id)).limit(1);
    return result ?? null;
  }

  async listRecent(limit: number = 20): Promise<DownloadRun[]> {
    return this.db
      .select()
      .from(downloadRuns)
      .orderBy(desc(downloadRuns.startedAt), desc(downloadRuns.id))
      .limit(limit);
  }

  async updateRun(id: number, data: Partial<NewDownloadRun>): Promise<DownloadRun | null> {
    const [result] = await this.db.update(downloadRuns).set(data).where(eq(downloadRuns.id, id)).returning();
    return result ?? null;
  }

  /** Runs left "running" past the lock timeout belong to a process that died; close them as failed. */
  async recoverStaleRunningRuns(timeoutSeconds: number): Promise<number> {
    const cutoff = nowSeconds() - timeoutSeconds;
    const recovered = await this.db
      .update(downloadRuns)
      .set({
        status: "failed",
        endedAt: nowSeconds(),
        notes: JSON.stringify({ error: "Run abandoned before completion" }),
      })
      .where(and(eq(downloadRuns.status, "running"), lt(downloadRuns.startedAt, cutoff)))
      .returning({ id: downloadRuns.id });
    if (recovered.length > 0) {
      logger.warn({ runIds: recovered.map((r) => r.id), timeoutSeconds }, "Recovered stale running download runs");
    }
    return recovered.length;
  }
}

export const runsRepo = new RunsRepository();
