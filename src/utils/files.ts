/**
 * Turn a suite or case name into a file name component.
 * Path separators, characters Windows rejects and whitespace become "_".
 */
export function safeName(name: string): string {
  const cleaned = name.trim().replace(/[\\/:*?"<>|\s]+/g, "_");
  return cleaned.length > 0 ? cleaned : "unnamed";
}

/**
 * Local time as YYYYMMDD_HHMMSS
 */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}
