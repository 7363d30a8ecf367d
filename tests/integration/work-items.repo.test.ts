import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { WorkItemsRepository } from "../../src/db/repositories/work-items.repo";
import type { DatabaseHandle } from "../../src/db/client";
import { ItemNotFoundError } from "../../src/core/errors";
import { createTestDb } from "../helpers/test-db";
import { makeItem } from "../helpers/fixtures";

describe("WorkItemsRepository", () => {
  let handle: DatabaseHandle;
  let repo: WorkItemsRepository;

  beforeEach(() => {
    handle = createTestDb();
    repo = new WorkItemsRepository(handle.db);
  });

  afterEach(() => {
    handle.sqlite.close();
  });

  it("should enqueue new items and ignore ones already known", async () => {
    expect(await repo.enqueue([makeItem("item-1"), makeItem("item-2")])).toBe(2);
    await repo.markDone("item-1", { accountId: "acct-a", sizeBytes: 2048, destination: "/tmp/item-1.pdf" });

    expect(await repo.enqueue([makeItem("item-1", { title: "Changed" }), makeItem("item-3")])).toBe(1);

    const existing = await repo.findById("item-1");
    expect(existing?.status).toBe("done");
    expect(existing?.title).toBe("Title item-1");
  });

  it("should hand out pending items in insertion order", async () => {
    await repo.enqueue([makeItem("item-b"), makeItem("item-a")]);

    expect((await repo.nextPending())?.id).toBe("item-b");
    await repo.markSkipped("item-b", "already_exists");
    expect((await repo.nextPending())?.id).toBe("item-a");
  });

  it("should keep a retried item at the head of the queue", async () => {
    await repo.enqueue([makeItem("item-1"), makeItem("item-2")]);
    await repo.markInProgress("item-1");
    const retried = await repo.markRetry("item-1", { kind: "transient", detail: "timeout" });

    expect(retried.status).toBe("pending");
    expect(retried.attempts).toBe(1);
    expect(retried.lastError).toBe("transient");
    expect((await repo.nextPending())?.id).toBe("item-1");
  });

  it("should record completion details and clear earlier errors", async () => {
    await repo.enqueue([makeItem("item-1")]);
    await repo.markRetry("item-1", { kind: "transient", detail: "timeout" });
    const done = await repo.markDone("item-1", { accountId: "acct-a", sizeBytes: 2048, destination: "/tmp/item-1.pdf" });

    expect(done.status).toBe("done");
    expect(done.attempts).toBe(2);
    expect(done.lastError).toBeNull();
    expect(done.downloadAccountId).toBe("acct-a");
    expect(done.sizeBytes).toBe(2048);
    expect(done.destination).toBe("/tmp/item-1.pdf");
  });

  it("should return interrupted items to pending", async () => {
    await repo.enqueue([makeItem("item-1"), makeItem("item-2")]);
    await repo.markInProgress("item-2");

    const recovered = await repo.recoverInterrupted();
    expect(recovered.map((item) => item.id)).toEqual(["item-2"]);
    expect(recovered[0]?.status).toBe("pending");
    expect((await repo.findById("item-2"))?.status).toBe("pending");
  });

  it("should count every status and requeue failures", async () => {
    await repo.enqueue([makeItem("item-1"), makeItem("item-2"), makeItem("item-3")]);
    await repo.markFailed("item-1", { kind: "permanent", detail: "gone" });
    await repo.markSkipped("item-2", "already_exists");

    expect(await repo.countByStatus()).toEqual({ pending: 1, in_progress: 0, done: 0, failed: 1, skipped: 1 });

    expect(await repo.resetFailed()).toBe(1);
    const requeued = await repo.findById("item-1");
    expect(requeued?.status).toBe("pending");
    expect(requeued?.attempts).toBe(1);
  });

  it("should list items by status", async () => {
    await repo.enqueue([makeItem("item-1"), makeItem("item-2"), makeItem("item-3")]);
    await repo.markFailed("item-2", { kind: "permanent", detail: "gone" });

    expect((await repo.listByStatus("pending")).map((i) => i.id)).toEqual(["item-1", "item-3"]);
    expect((await repo.listByStatus("pending", 1)).map((i) => i.id)).toEqual(["item-1"]);
  });

  it("should refuse transitions for unknown items", async () => {
    await expect(repo.markInProgress("ghost")).rejects.toBeInstanceOf(ItemNotFoundError);
  });
});
