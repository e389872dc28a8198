import { toError } from './errors';

interface TryRunOptions<T> {
  context: string;
  func: () => Promise<T>;
  onSuccess?: () => void;
  onError?: (error: Error, context: string) => void;
}

interface TryRunSyncOptions<T> {
  context: string;
  func: () => T;
  onSuccess?: () => void;
  onError?: (error: Error, context: string) => void;
}

/**
 * Execute async function, reporting any exception to `onError` and resolving to null
 */
export async function tryRun<T>(options: TryRunOptions<T>): Promise<T | null> {
  try {
    const result = await options.func();
    options.onSuccess?.();
    return result;
  } catch (error) {
    options.onError?.(toError(error), options.context);
    return null;
  }
}

/**
 * Execute sync function, reporting any exception to `onError` and returning null
 */
export function tryRunSync<T>(options: TryRunSyncOptions<T>): T | null {
  try {
    const result = options.func();
    options.onSuccess?.();
    return result;
  } catch (error) {
    options.onError?.(toError(error), options.context);
    return null;
  }
}
