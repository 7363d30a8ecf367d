import dayjs from "dayjs";

export interface QuotaCounters {
  maxDailyDownloads: number;
  dailyDownloads: number;
  lastReset: string;
}

/** Local calendar date used as the quota day, formatted `YYYY-MM-DD`. */
export function calendarDate(now: Date): string {
  return dayjs(now).format("YYYY-MM-DD");
}

export function needsDailyReset(account: QuotaCounters, now: Date): boolean {
  return account.lastReset < calendarDate(now);
}

export function effectiveDailyDownloads(account: QuotaCounters, now: Date): number {
  return needsDailyReset(account, now) ? 0 : account.dailyDownloads;
}

export function remainingQuota(account: QuotaCounters, now: Date): number {
  return Math.max(0, account.maxDailyDownloads - effectiveDailyDownloads(account, now));
}
