import { eq, and, asc, lt, sql } from "drizzle-orm";
import type { Account } from "../schema";
import { accounts } from "../schema";
import { getDb, type AppDatabase } from "../client";
import { logger } from "../../core/logger";
import { UnknownAccountError, errorKindOf, errorMessageOf } from "../../core/errors";
import type { AccountStore } from "../../domain/engine-contracts";
import type { AccountStatus, NewAccountInput } from "../../domain/models";
import { calendarDate } from "../../domain/quota";

const nowSeconds = () => Math.floor(Date.now() / 1000);

export class AccountsRepository implements AccountStore {
  constructor(private db: AppDatabase = getDb()) {}

  async create(data: NewAccountInput, now: Date = new Date()): Promise<Account> {
    const result = await this.db
      .insert(accounts)
      .values({
        id: data.id,
        secret: data.secret,
        maxDailyDownloads: data.maxDailyDownloads,
        dailyDownloads: 0,
        lastReset: calendarDate(now),
      })
      .returning();
    if (!result || result.length === 0 || !result[0]) {
      throw new Error("Failed to create account");
    }
    logger.info({ accountId: result[0].id, maxDailyDownloads: result[0].maxDailyDownloads }, "Account created");
    return result[0];
  }

  async findById(id: string): Promise<Account | null> {
    const [result] = await this.db.select().from(accounts).where(eq(accounts.id, id)).limit(1);
    return result ?? null;
  }

  async listAll(): Promise<Account[]> {
    return this.db.select().from(accounts).orderBy(asc(accounts.id));
  }

  /**
   * Active accounts with quota left today, ordered by id. Counters whose `last_reset`
   * predates today are zeroed and re-dated before the quota check.
   */
  async listUsable(now: Date): Promise<Account[]> {
    const today = calendarDate(now);

    const reset = await this.db
      .update(accounts)
      .set({ dailyDownloads: 0, lastReset: today, updatedAt: nowSeconds() })
      .where(lt(accounts.lastReset, today))
      .returning({ id: accounts.id });
    if (reset.length > 0) {
      logger.info({ accountIds: reset.map((r) => r.id), day: today }, "Daily download counters reset");
    }

    return this.db
      .select()
      .from(accounts)
      .where(and(eq(accounts.status, "active"), lt(accounts.dailyDownloads, accounts.maxDailyDownloads)))
      .orderBy(asc(accounts.id));
  }

  async recordSuccess(accountId: string): Promise<Account> {
    const [updated] = await this.db
      .update(accounts)
      .set({ dailyDownloads: sql`${accounts.dailyDownloads} + 1`, updatedAt: nowSeconds() })
      .where(and(eq(accounts.id, accountId), lt(accounts.dailyDownloads, accounts.maxDailyDownloads)))
      .returning();
    if (updated) return updated;

    const existing = await this.findById(accountId);
    if (!existing) {
      throw new UnknownAccountError(accountId);
    }
    logger.warn(
      { accountId, dailyDownloads: existing.dailyDownloads, maxDailyDownloads: existing.maxDailyDownloads },
      "Daily quota already reached, counter left unchanged"
    );
    return existing;
  }

  async recordFailure(accountId: string, error: unknown): Promise<void> {
    const [updated] = await this.db
      .update(accounts)
      .set({
        lastErrorCode: errorKindOf(error),
        lastErrorDetail: errorMessageOf(error),
        lastErrorAt: nowSeconds(),
        updatedAt: nowSeconds(),
      })
      .where(eq(accounts.id, accountId))
      .returning({ id: accounts.id });
    if (!updated) {
      throw new UnknownAccountError(accountId);
    }
  }

  async updateStatus(id: string, status: AccountStatus): Promise<Account | null> {
    const [result] = await this.db
      .update(accounts)
      .set({ status, updatedAt: nowSeconds() })
      .where(eq(accounts.id, id))
      .returning();
    return result ?? null;
  }
}

export const accountsRepo = new AccountsRepository();
