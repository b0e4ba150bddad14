export type Mode =
  | { kind: "now" }
  | { kind: "today" }
  | { kind: "timestamp"; value: number }
  | { kind: "dateString"; text: string };

export type ModeKind = Mode["kind"];

const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;

export function parseDecimal(input: string): number | null {
  const trimmed = input.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    return null;
  }
  return Number(trimmed);
}

/**
 * Decides how the positional arguments should be read. A single token may
 * name the current time, today's midnight or a UNIX timestamp; anything else
 * is handed to the date parser as one space-joined string.
 */
export function classifyInput(positionals: readonly string[]): Mode {
  if (positionals.length === 0) {
    return { kind: "now" };
  }

  if (positionals.length === 1) {
    const [token] = positionals;
    const lowered = token.toLowerCase();
    if (lowered === "now") {
      return { kind: "now" };
    }
    if (lowered === "today") {
      return { kind: "today" };
    }

    const value = parseDecimal(token);
    if (value !== null) {
      return { kind: "timestamp", value };
    }
  }

  return { kind: "dateString", text: positionals.join(" ") };
}
