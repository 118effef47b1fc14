import { CancelledError, TimeoutError } from '../../domain/errors/ReviewErrors';

/**
 * Waits for the given duration. Resolves early, without error, when the signal aborts.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
        if (ms <= 0 || signal?.aborted) {
            resolve();
            return;
        }
        const onAbort = () => {
            clearTimeout(timer);
            resolve();
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * Runs an abortable operation under a deadline.
 *
 * The operation receives a signal that aborts on timeout or when the parent signal aborts.
 * The returned promise settles within the deadline even if the operation ignores its signal.
 *
 * @throws TimeoutError when the deadline passes first
 * @throws CancelledError when the parent signal aborts first
 */
export async function withTimeout<T>(
    operation: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
    parent?: AbortSignal
): Promise<T> {
    if (parent?.aborted) {
        throw new CancelledError();
    }

    const controller = new AbortController();
    let rejectDeadline: (error: Error) => void = () => undefined;
    const deadline = new Promise<never>((_, reject) => {
        rejectDeadline = reject;
    });

    const timer = setTimeout(() => {
        const error = new TimeoutError(timeoutMs);
        controller.abort(error);
        rejectDeadline(error);
    }, timeoutMs);
    const onParentAbort = () => {
        const error = new CancelledError();
        controller.abort(error);
        rejectDeadline(error);
    };
    parent?.addEventListener('abort', onParentAbort, { once: true });

    try {
        return await Promise.race([operation(controller.signal), deadline]);
    } catch (error) {
        // An aborted request may reject before the deadline does; report why it was aborted
        if (controller.signal.aborted && controller.signal.reason instanceof Error) {
            throw controller.signal.reason;
        }
        throw error;
    } finally {
        clearTimeout(timer);
        parent?.removeEventListener('abort', onParentAbort);
    }
}
