import { StoreError, TransportError } from './errors';

// Races `work` against a timer; the timer is always cleared.
export const withTimeout = async <T>(
  work: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error
): Promise<T> => {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });

  try {
    return await Promise.race([work, timeout]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
};

// mysql2 reports unique-key conflicts with this code
export const isDuplicateKeyError = (error: unknown): boolean =>
  typeof error === 'object' &&
  error !== null &&
  'code' in error &&
  error.code === 'ER_DUP_ENTRY';

export const parseOwnerId = (value: string | undefined): number | null => {
  if (!value || !/^\d+$/.test(value)) {
    return null;
  }
  const id = Number(value);
  return Number.isSafeInteger(id) ? id : null;
};

export const storeCall = <T>(work: Promise<T>, timeoutMs: number, operation: string): Promise<T> =>
  withTimeout(work, timeoutMs, () => new StoreError('Timeout', `${operation} timed out after ${timeoutMs}ms`));

export const transportCall = <T>(work: Promise<T>, timeoutMs: number, operation: string): Promise<T> =>
  withTimeout(work, timeoutMs, () => new TransportError('Unreachable', `${operation} timed out after ${timeoutMs}ms`));
