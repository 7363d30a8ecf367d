import { describe, it, expect } from "vitest";
import { ImportedItemListSchema, ImportedItemSchema, NewAccountInputSchema } from "../../src/domain/models";

describe("ImportedItemSchema", () => {
  it("should fill defaults and stringify numeric ids", () => {
    expect(ImportedItemSchema.parse({ id: 7, locator: "https://files.example.test/7" })).toEqual({
      id: "7",
      kind: "file",
      title: "Unknown",
      author: "Unknown",
      locator: "https://files.example.test/7",
      extension: "pdf",
    });
  });

  it("should default covers to jpg", () => {
    const item = ImportedItemSchema.parse({ id: "c1", kind: "cover", locator: "https://files.example.test/c1" });
    expect(item.extension).toBe("jpg");
  });

  it("should infer a cover's extension from its locator", () => {
    const png = ImportedItemSchema.parse({ id: "c2", kind: "cover", locator: "https://files.example.test/c2.PNG" });
    expect(png.extension).toBe("png");

    const explicit = ImportedItemSchema.parse({
      id: "c3",
      kind: "cover",
      locator: "https://files.example.test/c3.png",
      extension: "gif",
    });
    expect(explicit.extension).toBe("gif");

    const file = ImportedItemSchema.parse({ id: "f1", locator: "https://files.example.test/f1.png" });
    expect(file.extension).toBe("pdf");
  });

  it("should keep an explicit extension", () => {
    const item = ImportedItemSchema.parse({ id: "e1", locator: "https://files.example.test/e1", extension: "epub" });
    expect(item.extension).toBe("epub");
  });

  it("should reject extensions that could escape the file name", () => {
    const result = ImportedItemSchema.safeParse({ id: "x", locator: "https://files.example.test/x", extension: "../pdf" });
    expect(result.success).toBe(false);
  });

  it("should reject items without a locator", () => {
    expect(ImportedItemListSchema.safeParse([{ id: "x" }]).success).toBe(false);
  });
});

describe("NewAccountInputSchema", () => {
  it("should coerce the daily quota from CLI text", () => {
    expect(NewAccountInputSchema.parse({ id: "reader-one", secret: "test-secret", maxDailyDownloads: "5" })).toEqual({
      id: "reader-one",
      secret: "test-secret",
      maxDailyDownloads: 5,
    });
  });

  it("should reject a zero quota", () => {
    expect(NewAccountInputSchema.safeParse({ id: "r", secret: "test-secret", maxDailyDownloads: 0 }).success).toBe(false);
  });
});
