/** A raw record lacks a field the canonical shape needs. The record is skipped. */
export class NormalizationError extends Error {
  readonly field: string;
  readonly sourceName: string;

  constructor(field: string, sourceName: string) {
    super(`Raw record from "${sourceName}" is missing required field: ${field}`);
    this.name = 'NormalizationError';
    this.field = field;
    this.sourceName = sourceName;
  }
}

/** A canonical article would break one of its invariants. */
export class ValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid canonical article: ${issues.join('; ')}`);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}
