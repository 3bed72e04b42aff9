export interface Candidate<T> {
  label: string;
  run: () => T | null | undefined;
}

/**
 * Runs candidates in order and returns the first value `accept` approves.
 * A candidate that throws is recorded in `notes` and skipped.
 */
export function firstAccepted<T>(
  candidates: readonly Candidate<T>[],
  accept: (value: T) => boolean,
  notes?: string[],
): T | undefined {
  for (const candidate of candidates) {
    try {
      const value = candidate.run();
      if (value !== null && value !== undefined && accept(value)) {
        return value;
      }
    } catch (error) {
      notes?.push(`${candidate.label} failed: ${String(error)}`);
    }
  }
  return undefined;
}

export function isNonEmpty(value: string): boolean {
  return value.trim().length > 0;
}
