import { eq, asc, sql } from "drizzle-orm";
import type { SQLiteUpdateSetSource } from "drizzle-orm/sqlite-core";
import type { WorkItem, NewWorkItem } from "../schema";
import { workItems } from "../schema";
import { getDb, type AppDatabase } from "../client";
import { logger } from "../../core/logger";
import { ItemNotFoundError } from "../../core/errors";
import type { DownloadQueue, ItemCompletion, ItemFailure } from "../../domain/engine-contracts";
import type { ImportedItem, WorkItemStatus } from "../../domain/models";

const nowSeconds = () => Math.floor(Date.now() / 1000);

export type StatusCounts = Record<WorkItemStatus, number>;

export class WorkItemsRepository implements DownloadQueue {
  constructor(private db: AppDatabase = getDb()) {}

  /** Inserts unseen items; rows that already exist keep their status and history. */
  async enqueue(items: ImportedItem[]): Promise<number> {
    let inserted = 0;
    for (const item of items) {
      const values: NewWorkItem = {
        id: item.id,
        kind: item.kind,
        title: item.title,
        author: item.author,
        locator: item.locator,
        extension: item.extension,
      };
      const result = await this.db.insert(workItems).values(values).onConflictDoNothing().returning({ id: workItems.id });
      inserted += result.length;
    }
    logger.info({ received: items.length, inserted }, "Work items enqueued");
    return inserted;
  }

  async findById(id: string): Promise<WorkItem | null> {
    const [result] = await this.db.select().from(workItems).where(eq(workItems.id, id)).limit(1);
    return result ?? null;
  }

  async listByStatus(status: WorkItemStatus, limit: number = 50): Promise<WorkItem[]> {
    return this.db
      .select()
      .from(workItems)
      .where(eq(workItems.status, status))
      .orderBy(asc(workItems.seq))
      .limit(limit);
  }

  async countByStatus(): Promise<StatusCounts> {
    const rows = await this.db
      .select({ status: workItems.status, count: sql<number>`count(*)` })
      .from(workItems)
      .groupBy(workItems.status);

    const counts: StatusCounts = { pending: 0, in_progress: 0, done: 0, failed: 0, skipped: 0 };
    for (const row of rows) {
      counts[row.status] = Number(row.count);
    }
    return counts;
  }

  /** A crash mid-transfer gives no guarantee about the partial file, so interrupted items start over. */
  async recoverInterrupted(): Promise<WorkItem[]> {
    const recovered = await this.db
      .update(workItems)
      .set({ status: "pending", updatedAt: nowSeconds() })
      .where(eq(workItems.status, "in_progress"))
      .returning();
    if (recovered.length > 0) {
      logger.warn({ itemIds: recovered.map((r) => r.id) }, "Recovered interrupted work items");
    }
    return recovered;
  }

  async nextPending(): Promise<WorkItem | null> {
    const [result] = await this.db
      .select()
      .from(workItems)
      .where(eq(workItems.status, "pending"))
      .orderBy(asc(workItems.seq))
      .limit(1);
    return result ?? null;
  }

  async markInProgress(id: string): Promise<WorkItem> {
    return this.update(id, { status: "in_progress" });
  }

  async markDone(id: string, completion: ItemCompletion): Promise<WorkItem> {
    return this.update(id, {
      status: "done",
      attempts: sql`${workItems.attempts} + 1`,
      lastError: null,
      lastErrorDetail: null,
      downloadAccountId: completion.accountId,
      sizeBytes: completion.sizeBytes,
      destination: completion.destination,
    });
  }

  async markFailed(id: string, failure: ItemFailure): Promise<WorkItem> {
    return this.update(id, {
      status: "failed",
      attempts: sql`${workItems.attempts} + 1`,
      lastError: failure.kind,
      lastErrorDetail: failure.detail,
    });
  }

  async markRetry(id: string, failure: ItemFailure): Promise<WorkItem> {
    return this.update(id, {
      status: "pending",
      attempts: sql`${workItems.attempts} + 1`,
      lastError: failure.kind,
      lastErrorDetail: failure.detail,
    });
  }

  async markSkipped(id: string, reason: string): Promise<WorkItem> {
    return this.update(id, { status: "skipped", skipReason: reason });
  }

  async resetToPending(id: string): Promise<WorkItem> {
    return this.update(id, { status: "pending" });
  }

  async resetFailed(): Promise<number> {
    const result = await this.db
      .update(workItems)
      .set({ status: "pending", updatedAt: nowSeconds() })
      .where(eq(workItems.status, "failed"))
      .returning({ id: workItems.id });
    logger.info({ count: result.length }, "Failed work items returned to pending");
    return result.length;
  }

  private async update(id: string, data: SQLiteUpdateSetSource<typeof workItems>): Promise<WorkItem> {
    const [result] = await this.db
      .update(workItems)
      .set({ ...data, updatedAt: nowSeconds() })
      .where(eq(workItems.id, id))
      .returning();
    if (!result) {
      throw new ItemNotFoundError(id);
    }
    return result;
  }
}

export const workItemsRepo = new WorkItemsRepository();
