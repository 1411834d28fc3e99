export type SuiteErrorKind =
  | "transport"
  | "unexpected_status"
  | "contract_violation"
  | "precondition_unmet"
  | "fixture"
  | "config";

/**
 * Base class for every error the harness raises. `kind` lets the runner and
 * the report tell the taxonomy apart without instanceof chains.
 */
export class SuiteError extends Error {
  constructor(
    message: string,
    public readonly kind: SuiteErrorKind,
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

/** Connection refused, DNS failure, timeout: no HTTP response at all. */
export class TransportError extends SuiteError {
  constructor(
    public readonly method: string,
    public readonly url: string,
    cause: string,
  ) {
    super(`${method} ${url} failed: ${cause}`, "transport");
  }
}

export class UnexpectedStatus extends SuiteError {
  constructor(
    public readonly expected: number,
    public readonly actual: number,
    context: string,
  ) {
    super(`${context}. Expected status ${expected}, got ${actual}`, "unexpected_status");
  }
}

export class ContractViolation extends SuiteError {
  constructor(message: string) {
    super(message, "contract_violation");
  }
}

/** Raised when upstream run state is missing; reported as a skip. */
export class PreconditionUnmet extends SuiteError {
  constructor(reason: string) {
    super(reason, "precondition_unmet");
  }
}

export class FixtureError extends SuiteError {
  constructor(message: string) {
    super(message, "fixture");
  }
}

export class ConfigError extends SuiteError {
  constructor(message: string) {
    super(message, "config");
  }
}

export function isSuiteError(err: unknown): err is SuiteError {
  return err instanceof SuiteError;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
