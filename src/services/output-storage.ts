import { access, mkdir, rename, rm } from "fs/promises";
import { dirname, join } from "path";
import { sanitizeFilename } from "../core/normalize";
import type { OutputStorage } from "../domain/engine-contracts";
import type { WorkItem } from "../db/schema";

const KIND_FOLDERS: Record<WorkItem["kind"], string> = {
  file: "files",
  cover: "covers",
};

export class LocalOutputStorage implements OutputStorage {
  constructor(
    private rootDir: string,
    private maxFilenameLength: number
  ) {}

  resolveDestination(item: Pick<WorkItem, "kind" | "title" | "author" | "extension">): string {
    const base = sanitizeFilename(item.title, item.author, this.maxFilenameLength);
    return join(this.rootDir, KIND_FOLDERS[item.kind], `${base}.${item.extension}`);
  }

  stagingPath(destination: string): string {
    return `${destination}.part`;
  }

  async exists(destination: string): Promise<boolean> {
    try {
      await access(destination);
      return true;
    } catch {
      return false;
    }
  }

  async prepare(destination: string): Promise<void> {
    await mkdir(dirname(destination), { recursive: true });
  }

  async commit(destination: string): Promise<void> {
    await rename(this.stagingPath(destination), destination);
  }

  async discard(destination: string): Promise<void> {
    await rm(destination, { force: true });
    await rm(this.stagingPath(destination), { force: true });
  }
}
