// packages/game-core/src/errors.ts
//
// Fatal contract violations raised by the core.
//
// These signal a broken caller or malformed static data (bad word length,
// malformed dictionary line, a strategy guessing an unknown word, invalid
// options or environment). They are thrown, never retried, and never caught
// inside the core. A game that simply runs out of turns is NOT a violation.

export type ContractViolationKind =
  | 'word-length'
  | 'malformed-dictionary'
  | 'unknown-word'
  | 'invalid-options'
  | 'invalid-config';

export class ContractViolationError extends Error {
  readonly kind: ContractViolationKind;
  readonly details: Readonly<Record<string, unknown>>;

  constructor(
    kind: ContractViolationKind,
    message: string,
    details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = 'ContractViolationError';
    this.kind = kind;
    this.details = Object.freeze({ ...details });
  }
}

/** Narrow an unknown thrown value, optionally to one violation kind. */
export function isContractViolation(
  err: unknown,
  kind?: ContractViolationKind,
): err is ContractViolationError {
  return (
    err instanceof ContractViolationError &&
    (kind === undefined || err.kind === kind)
  );
}
