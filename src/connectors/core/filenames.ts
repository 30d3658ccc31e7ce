/**
 * Filesystem-safe naming for stored artifacts.
 *
 *   eml/{folder path}/{YYYY}/{MM}/{subject}_{HHmm}[_{n}].eml
 *
 * All date parts are UTC so the same item always maps to the same name.
 */

const ILLEGAL_CHARS = /[?*:"<>|/\\]/g;
const CONTROL_CHARS = /[\u0000-\u001f\u007f-\u009f]/g;

export const DEFAULT_MAX_FILENAME_LENGTH = 100;
export const MAX_FOLDER_SEGMENT_LENGTH = 50;

function trimDotsAndSpaces(text: string): string {
  return text.replace(/^[. ]+/, "").replace(/[. ]+$/, "");
}

/**
 * Sanitize a single path segment. Never returns an empty string.
 */
export function sanitizeFilename(
  name: string,
  maxLength = DEFAULT_MAX_FILENAME_LENGTH,
): string {
  let result = trimDotsAndSpaces(
    name.normalize("NFC").replace(CONTROL_CHARS, "").replace(ILLEGAL_CHARS, "_"),
  );
  if (!result.trim()) return "unnamed";

  // Count code points so a surrogate pair is never split.
  const chars = Array.from(result);
  if (chars.length > maxLength) {
    result = chars.slice(0, maxLength).join("").replace(/[. ]+$/, "");
  }
  return result.trim() ? result : "unnamed";
}

/**
 * Sanitize a slash-separated folder path segment by segment.
 */
export function sanitizeFolderPath(folderPath: string): string {
  if (!folderPath.trim()) return "Unknown";
  return folderPath
    .split("/")
    .filter((segment) => segment.length > 0)
    .map((segment) => sanitizeFilename(segment, MAX_FOLDER_SEGMENT_LENGTH))
    .join("/");
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/** `YYYY/MM` for the UTC month of `date`. */
export function datePath(date: Date): string {
  return `${pad(date.getUTCFullYear(), 4)}/${pad(date.getUTCMonth() + 1)}`;
}

export function artifactFilename(
  subject: string | null,
  receivedAt: Date,
  collisionCounter = 0,
  maxSubjectLength = DEFAULT_MAX_FILENAME_LENGTH,
): string {
  const base = sanitizeFilename(subject ?? "No Subject", maxSubjectLength);
  const time = `${pad(receivedAt.getUTCHours())}${pad(receivedAt.getUTCMinutes())}`;
  const suffix = collisionCounter > 0 ? `_${collisionCounter}` : "";
  return `${base}_${time}${suffix}.eml`;
}
