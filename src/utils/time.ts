const BAR_TIMESTAMP = /^(\d{4})\.(\d{2})\.(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

/**
 * Parses a bar timestamp written as `YYYY.MM.DD HH:MM:SS` (UTC) into epoch
 * milliseconds. Returns null unless the text names a real calendar instant.
 */
export const parseBarTimestamp = (text: string): number | null => {
  const match = BAR_TIMESTAMP.exec(text);
  if (!match) return null;

  const [year, month, day, hour, minute, second] = match.slice(1).map(Number);
  if (hour > 23 || minute > 59 || second > 59) return null;

  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  // Date.UTC maps years 0-99 onto 1900-1999.
  if (year < 100) date.setUTCFullYear(year, month - 1, day);

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date.getTime();
};

/** RFC 3339 in UTC with whole seconds: `2025-09-15T00:00:00Z`. */
export const toIsoSeconds = (epochMs: number): string =>
  new Date(epochMs).toISOString().replace(/\.\d{3}Z$/, "Z");

export const toUnixSeconds = (date: Date): number => Math.floor(date.getTime() / 1000);
