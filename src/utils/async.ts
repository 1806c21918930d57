/**
 * Async helpers for cancellable waits.
 */
import { cancellationError } from "./errors";

/**
 * Waits for `promise` unless `signal` aborts first. Aborting only rejects this
 * wait; the underlying promise keeps running for anyone else awaiting it.
 */
export function waitWithSignal<T>(
    promise: Promise<T>,
    signal: AbortSignal | undefined,
    operation: string
): Promise<T> {
    if (!signal) {
        return promise;
    }
    if (signal.aborted) {
        // The shared promise may still reject later; nobody else may be listening.
        promise.catch(() => undefined);
        return Promise.reject(cancellationError(operation));
    }

    return new Promise<T>((resolve, reject) => {
        const onAbort = () => {
            reject(cancellationError(operation));
        };
        signal.addEventListener("abort", onAbort, { once: true });

        promise.then(
            (value) => {
                signal.removeEventListener("abort", onAbort);
                resolve(value);
            },
            (error: unknown) => {
                signal.removeEventListener("abort", onAbort);
                reject(error);
            }
        );
    });
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    const timer = new Promise<void>((resolve) => {
        const handle = setTimeout(resolve, ms);
        signal?.addEventListener("abort", () => clearTimeout(handle), {
            once: true,
        });
    });
    return waitWithSignal(timer, signal, "sleep");
}
