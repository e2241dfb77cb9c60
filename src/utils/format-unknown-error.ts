const DEFAULT_DIAGNOSTIC_CHARS = 300;

function stringifyUnknownObject(value: object): string {
  const seen = new WeakSet<object>();
  const serialized = JSON.stringify(value, (_key, candidate: unknown) => {
    if (typeof candidate === "bigint") {
      return `${candidate.toString()}n`;
    }
    if (typeof candidate === "object" && candidate !== null) {
      if (seen.has(candidate)) {
        return "[Circular]";
      }
      seen.add(candidate);
    }
    return candidate;
  });
  return serialized ?? String(value);
}

export function formatUnknownError(error: unknown): string {
  if (error instanceof Error) {
    const message = error.message?.trim();
    return message && message.length > 0 ? message : error.name;
  }
  if (typeof error === "string") {
    return error;
  }
  if (error && typeof error === "object") {
    try {
      return stringifyUnknownObject(error);
    } catch {
      return String(error);
    }
  }
  return String(error);
}

/**
 * Single-line, length-capped rendering of an arbitrary value for log output.
 */
export function formatDiagnostic(
  value: unknown,
  maxChars = DEFAULT_DIAGNOSTIC_CHARS
): string {
  const normalized = Array.from(formatUnknownError(value), (char) => {
    const code = char.charCodeAt(0);
    return (code >= 0 && code < 32) || code === 127 ? " " : char;
  })
    .join("")
    .replace(/\s+/g, " ")
    .trim();
  const fallback = normalized.length > 0 ? normalized : "unknown error";
  if (fallback.length <= maxChars) {
    return fallback;
  }
  const omittedChars = fallback.length - maxChars;
  return `${fallback.slice(0, maxChars)}... [truncated ${omittedChars} chars]`;
}
