/**
 * Shared verdict vocabulary for every reputation provider
 */

export const VERDICTS = ['clean', 'unknown', 'suspicious', 'phish'] as const;

/**
 * Severity order: clean < unknown < suspicious < phish
 */
export type Verdict = (typeof VERDICTS)[number];

export type Evidence = Readonly<Record<string, unknown>>;

export interface VerifierResult {
  readonly verdict: Verdict;
  /** Provider name, or "none" when no provider produced a usable verdict */
  readonly source: string;
  readonly evidence: Evidence;
}

export function severity(verdict: Verdict): number {
  switch (verdict) {
    case 'clean':
      return 0;
    case 'unknown':
      return 1;
    case 'suspicious':
      return 2;
    case 'phish':
      return 3;
  }
}

/**
 * Verdicts that warrant an alert broadcast
 */
export function isAlertable(verdict: Verdict): boolean {
  return verdict === 'suspicious' || verdict === 'phish';
}

export function isVerdict(value: unknown): value is Verdict {
  return VERDICTS.some((verdict) => verdict === value);
}

export function createResult(verdict: Verdict, source: string, evidence: Record<string, unknown> = {}): VerifierResult {
  return Object.freeze({ verdict, source, evidence: Object.freeze({ ...evidence }) });
}

export const NO_VERDICT: VerifierResult = createResult('unknown', 'none');
