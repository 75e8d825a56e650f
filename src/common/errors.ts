export type PolicyDenyReason = 'TrialExpired' | 'OutsideActiveWindow' | 'DailyLimitReached';

export type RejectionReason =
  | 'OwnerNotFound'
  | 'OwnerInactive'
  | 'ConversationNotFound'
  | 'StoreTimeout'
  | PolicyDenyReason;

export type TransportErrorKind = 'Unreachable' | 'Blocked' | 'RateLimited' | 'InvalidCredential';

export type StoreErrorKind = 'Timeout' | 'ConstraintViolation';

export class RelayError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class TransportError extends RelayError {
  constructor(
    public readonly kind: TransportErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class StoreError extends RelayError {
  constructor(
    public readonly kind: StoreErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

// Anything a transport throws that it did not classify is treated as the counterpart being unreachable.
export const asTransportError = (error: unknown): TransportError => {
  if (error instanceof TransportError) {
    return error;
  }
  return new TransportError('Unreachable', errorMessage(error), { cause: error });
};

export const isStoreTimeout = (error: unknown): error is StoreError =>
  error instanceof StoreError && error.kind === 'Timeout';

export const isConstraintViolation = (error: unknown): error is StoreError =>
  error instanceof StoreError && error.kind === 'ConstraintViolation';
