import { TimeoutError } from '../types';

/**
 * Race an operation against a timer. The operation is not cancelled on
 * expiry; callers treat the stage as failed and leave state unchanged.
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  work: () => Promise<T>
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(operation, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([work(), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
