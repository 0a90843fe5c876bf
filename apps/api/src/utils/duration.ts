const SEGMENT_SOURCE = "(\\d+(?:\\.\\d+)?)(ms|h|m|s)";

function unitMs(unit: string): number {
  switch (unit) {
    case "h":
      return 3_600_000;
    case "m":
      return 60_000;
    case "s":
      return 1000;
    default:
      return 1;
  }
}

/**
 * Parses durations ("300ms", "1s", "5m", "1h", "1m30s") into whole
 * milliseconds. A bare "0" is accepted.
 */
export function parseDuration(input: string): number {
  const value = input.trim();
  if (value === "0") return 0;
  if (value.length === 0) {
    throw new Error(`invalid duration "${input}"`);
  }

  const pattern = new RegExp(SEGMENT_SOURCE, "y");
  let total = 0;
  let offset = 0;
  while (offset < value.length) {
    pattern.lastIndex = offset;
    const match = pattern.exec(value);
    if (!match) {
      throw new Error(`invalid duration "${input}"`);
    }
    total += Number(match[1] ?? "0") * unitMs(match[2] ?? "ms");
    offset = pattern.lastIndex;
  }
  return Math.round(total);
}

export function formatDuration(ms: number): string {
  if (ms === 0) return "0s";
  if (ms < 1000) return `${ms}ms`;

  const parts: string[] = [];
  let rest = ms;
  for (const [unit, size] of [["h", 3_600_000], ["m", 60_000], ["s", 1000]] as const) {
    const amount = Math.floor(rest / size);
    if (amount > 0) {
      parts.push(`${amount}${unit}`);
      rest -= amount * size;
    }
  }
  if (rest > 0) parts.push(`${rest}ms`);
  return parts.join("");
}
