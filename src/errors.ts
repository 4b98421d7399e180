// src/errors.ts

/**
 * Raised when an operation is called on a parser whose state breaks its precondition,
 * e.g. rendering usage without an invocation path at `args[0]`.
 */
export class ContractViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ContractViolationError';
  }
}

/**
 * Raised when `parse` is reached with a kind the parser's registry has no entry for.
 * Typed callers cannot get here; the type checker rejects the call.
 */
export class UnsupportedKindError extends Error {
  readonly kind: string;

  constructor(kind: string, known: readonly string[]) {
    super(`No conversion registered for kind "${kind}" (known: ${known.join(', ')})`);
    this.name = 'UnsupportedKindError';
    this.kind = kind;
  }
}
