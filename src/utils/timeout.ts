import { TimeoutError } from "../errors.js";

/**
 * Race a promise against a timer. A missing or non-positive limit means no
 * timeout. The timer is always cleared so nothing is left running.
 */
export async function withTimeout<T>(
  work: Promise<T>,
  ms: number | undefined,
  label: string,
): Promise<T> {
  if (!ms || ms <= 0) return work;

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, ms)), ms);
  });

  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
