// ──────────────────────────────────────────────
// Weft - Utility Helpers
// ──────────────────────────────────────────────

export function safeJsonParse(text: string): { success: true; data: unknown } | { success: false; error: string } {
  try {
    return { success: true, data: JSON.parse(text) };
  } catch (err) {
    return { success: false, error: err instanceof Error ? err.message : "Invalid JSON" };
  }
}

export function truncateString(str: string, maxLength: number): string {
  if (str.length <= maxLength) return str;
  return str.slice(0, Math.max(0, maxLength - 3)) + "...";
}

export function measureDuration(startTime: bigint): number {
  const duration = process.hrtime.bigint() - startTime;
  return Number(duration / 1_000_000n); // Convert nanoseconds to milliseconds
}

export function startTimer(): bigint {
  return process.hrtime.bigint();
}

export function sanitizeErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    // Strip potential API key leaks from error messages
    return error.message
      .replace(/key[=:]\s*["']?[a-zA-Z0-9_-]{20,}["']?/gi, "key=[REDACTED]")
      .replace(/Bearer\s+[a-zA-Z0-9._-]+/gi, "Bearer [REDACTED]");
  }
  return "An unexpected error occurred";
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

// Removes everything up to and including the last reasoning block terminator
export function stripReasoning(text: string): string {
  const marker = "</think>";
  const index = text.lastIndexOf(marker);
  return index >= 0 ? text.slice(index + marker.length) : text;
}
