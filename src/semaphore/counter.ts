const COUNTER_PATTERN = /^\d+$/;

export interface ParsedCounter {
  value: number;
  valid: boolean; // false when content was present but not a count
}

/**
 * Parse semaphore file content.
 * Empty or missing content is a fresh counter (0, valid). Anything that is
 * not a plain non-negative integer also reads as 0 but is flagged.
 */
export function parseCounter(content: string | null | undefined): ParsedCounter {
  const trimmed = (content ?? "").trim();
  if (trimmed === "") return { value: 0, valid: true };
  if (!COUNTER_PATTERN.test(trimmed)) return { value: 0, valid: false };
  const value = Number(trimmed);
  if (!Number.isSafeInteger(value)) return { value: 0, valid: false };
  return { value, valid: true };
}

export function formatCounter(value: number): string {
  return `${value}\n`;
}
