/** Earliest instant a JS Date can hold; a cutoff of this value selects everything. */
export const EPOCH_FLOOR = new Date(-8.64e15);

const ISO_PATTERN =
  /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2})?)(?:\.(\d+))?(Z|[+-]\d{2}(?::?\d{2})?)?)?$/i;

/**
 * Parses an ISO-8601 date or date-time. Values without an offset are read as
 * UTC. Returns null for anything that is not a valid ISO-8601 string.
 */
export function parseIsoTimestamp(raw: string): Date | null {
  const match = ISO_PATTERN.exec(raw.trim());
  if (!match) return null;

  const [, datePart, timePart, fraction, offset] = match;
  if (!datePart) return null;
  if (!timePart) {
    return toValidDate(`${datePart}T00:00:00Z`, datePart);
  }

  const millis = fraction ? `.${fraction.slice(0, 3).padEnd(3, '0')}` : '';
  const time = timePart.length === 5 ? `${timePart}:00` : timePart;
  return toValidDate(`${datePart}T${time}${millis}${normalizeOffset(offset)}`, datePart);
}

function normalizeOffset(offset: string | undefined): string {
  if (!offset || offset.toUpperCase() === 'Z') return 'Z';
  const sign = offset.slice(0, 1);
  const digits = offset.slice(1).replace(':', '');
  const hours = digits.slice(0, 2);
  const minutes = digits.slice(2) || '00';
  return `${sign}${hours}:${minutes}`;
}

// Date.parse rolls over out-of-range days (2025-02-30 -> March 2); reject those.
function toValidDate(iso: string, datePart: string): Date | null {
  const ms = Date.parse(iso);
  if (Number.isNaN(ms)) return null;
  const [year, month, day] = datePart.split('-').map(Number);
  const check = new Date(Date.UTC(year ?? 0, (month ?? 1) - 1, day ?? 0));
  if (check.getUTCMonth() !== (month ?? 0) - 1 || check.getUTCDate() !== day) return null;
  return new Date(ms);
}
