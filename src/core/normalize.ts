const INVALID_FILENAME_CHARS = /[<>:"/\\|?*]/g;
const COVER_EXTENSIONS = new Set(["jpg", "jpeg", "png", "gif", "webp"]);

export function normalizeWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

/**
 * Builds `"{title} - {author}"` with characters that are illegal in file names removed.
 * Names longer than `maxLength` are cut back to the last whole word.
 */
export function sanitizeFilename(title: string, author: string, maxLength: number): string {
  let filename = normalizeWhitespace(`${title} - ${author}`.replace(INVALID_FILENAME_CHARS, ""));

  if (filename.length > maxLength) {
    const truncated = filename.slice(0, maxLength);
    const lastSpace = truncated.lastIndexOf(" ");
    filename = lastSpace > 0 ? truncated.slice(0, lastSpace) : truncated;
  }

  return filename.trim();
}

/** Image extension taken from the last path segment of a locator, `jpg` when it names none we know. */
export function coverExtension(locator: string): string {
  const path = locator.split(/[?#]/, 1)[0] ?? "";
  const segment = path.slice(path.lastIndexOf("/") + 1);
  const dot = segment.lastIndexOf(".");
  const extension = dot > 0 ? segment.slice(dot + 1).toLowerCase() : "";
  return COVER_EXTENSIONS.has(extension) ? extension : "jpg";
}
