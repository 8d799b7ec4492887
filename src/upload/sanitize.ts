import slugify from "@sindresorhus/slugify";

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Local wall-clock time as `YYYY-MM-DD HH:MM:SS`.
 */
export function formatTimestamp(date: Date): string {
  const day = [
    date.getFullYear(),
    pad(date.getMonth() + 1),
    pad(date.getDate()),
  ].join("-");
  const time = [
    pad(date.getHours()),
    pad(date.getMinutes()),
    pad(date.getSeconds()),
  ].join(":");
  return `${day} ${time}`;
}

/**
 * Turn an uploaded file name into the name it is stored under:
 * `<YYYY-MM-DD HH:MM:SS> - <slug>`.
 *
 * The slug drops path separators and anything else unsafe, so the result is
 * a single path segment. Two uploads of the same name within one clock
 * second produce the same result; the exclusive open in UploadWriter
 * reports that collision as EEXIST.
 */
export function sanitizeFileName(name: string, now: Date = new Date()): string {
  return `${formatTimestamp(now)} - ${slugify(name)}`;
}
