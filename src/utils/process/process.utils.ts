import packageJson from '../../../package.json';

export const logVersion = () => `Trading engine version: v${packageJson.version}, Node version: ${process.version}`;

/**
 * Races `promise` against a timer. When the timer wins, the returned promise
 * rejects with the error built by `onTimeout`; the wrapped promise keeps running.
 */
export const withTimeout = <T>(promise: Promise<T>, timeoutMs: number, onTimeout: () => Error): Promise<T> => {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
};
