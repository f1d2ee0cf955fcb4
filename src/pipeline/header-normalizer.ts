/**
 * Rewrites a column header into snake_case:
 * `Facility ID` -> `facility_id`, `HCAHPSAnswerPercent` -> `hcahps_answer_percent`,
 * `Año` -> `año`.
 * Applying it to its own output returns the same string.
 */
export function normalizeHeader(header: string): string {
  return header
    .trim()
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .replace(/([a-z\d])([A-Z])/g, '$1_$2')
    .replace(/[^\p{L}\p{M}\p{N}]+/gu, '_')
    .replace(/^_+|_+$/g, '')
    .toLowerCase();
}

export type HeaderNormalizer = (header: string) => string;
