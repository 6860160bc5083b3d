const ISO_8601 =
  /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/i;

function fromEpochMs(value: number): string | null {
  if (!Number.isFinite(value)) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
}

// Date keeps milliseconds only; carry any finer digits over from the input.
// Offsets are whole minutes, so the fraction is the same in UTC.
function withFraction(iso: string, input: string): string {
  const fraction = /:\d{2}\.(\d+)/.exec(input)?.[1];
  if (!fraction || fraction.length <= 3) return iso;
  return iso.replace(/\.\d{3}Z$/, `.${fraction}Z`);
}

/**
 * Normalizes an inbound timestamp to a UTC ISO-8601 string.
 *
 * Epoch milliseconds (number or all-digit string) and ISO-8601 strings keep their
 * instant; anything else falls back to `now`.
 */
export function normalizeTimestamp(value: unknown, now: () => Date = () => new Date()): string {
  if (typeof value === "number") {
    return fromEpochMs(value) ?? now().toISOString();
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (/^\d{10,16}$/.test(trimmed)) {
      return fromEpochMs(Number(trimmed)) ?? now().toISOString();
    }
    if (ISO_8601.test(trimmed)) {
      const parsed = Date.parse(trimmed);
      if (!Number.isNaN(parsed)) return withFraction(new Date(parsed).toISOString(), trimmed);
    }
  }
  return now().toISOString();
}
