import { TransientIOError } from '../errors/OrderEntryError';

/**
 * Runs `task` with an abort signal that fires after `timeoutMs` or when
 * `parent` aborts. The returned promise settles at the deadline even if the
 * task ignores its signal.
 */
export function withTimeout<T>(
  label: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  return new Promise<T>((resolve, reject) => {
    let settled = false;
    const finish = (fn: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
      fn();
    };
    const onParentAbort = () => {
      controller.abort();
      finish(() => reject(new TransientIOError('aborted', `${label}_aborted`, { label })));
    };
    const timer = setTimeout(() => {
      controller.abort();
      finish(() => reject(new TransientIOError('timeout', `${label}_timeout`, { label, timeoutMs })));
    }, timeoutMs);

    if (parent?.aborted) {
      onParentAbort();
      return;
    }
    parent?.addEventListener('abort', onParentAbort, { once: true });

    task(controller.signal).then(
      (value) => finish(() => resolve(value)),
      (error: unknown) => finish(() => reject(error))
    );
  });
}
