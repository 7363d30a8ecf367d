import { z } from "zod";
import { coverExtension } from "../core/normalize";

export const AccountStatusSchema = z.enum(["active", "disabled"]);
export type AccountStatus = z.infer<typeof AccountStatusSchema>;

export const WorkItemStatusSchema = z.enum(["pending", "in_progress", "done", "failed", "skipped"]);
export type WorkItemStatus = z.infer<typeof WorkItemStatusSchema>;

export const WorkItemKindSchema = z.enum(["file", "cover"]);
export type WorkItemKind = z.infer<typeof WorkItemKindSchema>;

export const RunTriggerSchema = z.enum(["all", "single"]);
export type RunTrigger = z.infer<typeof RunTriggerSchema>;

export const RunStatusSchema = z.enum(["running", "completed", "quota_exhausted", "cancelled", "failed"]);
export type RunStatus = z.infer<typeof RunStatusSchema>;

export const RunOutcomeSchema = z.enum(["completed", "quota_exhausted", "cancelled"]);
export type RunOutcome = z.infer<typeof RunOutcomeSchema>;

export const ImportedItemSchema = z
  .object({
    id: z.union([z.string().min(1), z.number().int()]).transform(String),
    kind: WorkItemKindSchema.default("file"),
    title: z.string().default("Unknown"),
    author: z.string().default("Unknown"),
    locator: z.string().min(1),
    extension: z.string().regex(/^[A-Za-z0-9]+$/).optional(),
  })
  .transform((item) => ({
    ...item,
    extension: item.extension ?? (item.kind === "cover" ? coverExtension(item.locator) : "pdf"),
  }));
export type ImportedItem = z.infer<typeof ImportedItemSchema>;

export const ImportedItemListSchema = z.array(ImportedItemSchema);

export const NewAccountInputSchema = z.object({
  id: z.string().min(1),
  secret: z.string().min(1),
  maxDailyDownloads: z.coerce.number().int().positive(),
});
export type NewAccountInput = z.infer<typeof NewAccountInputSchema>;
