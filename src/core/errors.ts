export type DeskErrorCode =
  | 'DATA_UNAVAILABLE'
  | 'LEDGER_INVARIANT_VIOLATION'
  | 'AGENT_CALL_FAILURE'
  | 'ROUNDING_POLICY_VIOLATION'
  | 'INVALID_INSTRUMENT'
  | 'DELIBERATION_BLOCKED'
  | 'INVALID_TRANSITION';

export class DeskError extends Error {
  readonly code: DeskErrorCode;

  constructor(code: DeskErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Quote or anchor price missing. Callers degrade to observation-only, never substitute values. */
export class DataUnavailableError extends DeskError {
  readonly symbol: string;

  constructor(symbol: string, message: string) {
    super('DATA_UNAVAILABLE', `${symbol}: ${message}`);
    this.symbol = symbol;
  }
}

export type LedgerViolationKind =
  | 'invalid_quantity'
  | 'invalid_price'
  | 'invalid_amount'
  | 'insufficient_shares'
  | 'locked_tranche'
  | 'base_exceeds_shares';

export class LedgerInvariantViolation extends DeskError {
  readonly symbol: string;
  readonly kind: LedgerViolationKind;

  constructor(symbol: string, kind: LedgerViolationKind, message: string) {
    super('LEDGER_INVARIANT_VIOLATION', `${symbol}: ${message}`);
    this.symbol = symbol;
    this.kind = kind;
  }
}

export class AgentCallFailure extends DeskError {
  readonly stage: string;

  constructor(stage: string, message: string) {
    super('AGENT_CALL_FAILURE', `${stage}: ${message}`);
    this.stage = stage;
  }
}

/** Internal assertion. A limit price off the tick grid is a defect, not an operator error. */
export class RoundingPolicyViolation extends DeskError {
  constructor(message: string) {
    super('ROUNDING_POLICY_VIOLATION', message);
  }
}

export class InvalidInstrumentError extends DeskError {
  constructor(symbol: string) {
    super('INVALID_INSTRUMENT', `Unrecognised instrument code: ${symbol}`);
  }
}

export class DeliberationBlockedError extends DeskError {
  constructor(message: string) {
    super('DELIBERATION_BLOCKED', message);
  }
}

export class InvalidTransitionError extends DeskError {
  constructor(message: string) {
    super('INVALID_TRANSITION', message);
  }
}

export const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));
