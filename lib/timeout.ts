import { ProviderUnavailableError } from './godaikin/errors';

/**
 * Races `operation` against a timer. When `controller` is given it is aborted
 * on timeout, so a request still queued or on the wire is cancelled; otherwise
 * the late result is ignored.
 */
export async function withTimeout<T>(
  operation: Promise<T>,
  ms: number,
  label: string,
  controller?: AbortController,
): Promise<T> {
  if (!Number.isFinite(ms) || ms <= 0) {
    return operation;
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller?.abort();
      reject(new ProviderUnavailableError(`${label} timed out after ${ms}ms`));
    }, ms);
  });

  try {
    return await Promise.race([operation, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export const delay = async (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));
