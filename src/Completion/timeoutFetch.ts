/**
 * Wraps `fetch` so a request aborts when no response arrives within `timeoutMs`.
 * An abort signal supplied by the caller is still honoured.
 */
export function createTimeoutFetch(timeoutMs: number, baseFetch: typeof fetch = fetch): typeof fetch {
    return async (input, init) => {
        const controller = new AbortController();
        const timer = setTimeout(
            () => controller.abort(new Error(`No response from inference endpoint within ${timeoutMs}ms`)),
            timeoutMs,
        );

        const upstream = init?.signal;
        const forwardAbort = () => controller.abort(upstream?.reason);
        if (upstream?.aborted) {
            forwardAbort();
        } else {
            upstream?.addEventListener("abort", forwardAbort, { once: true });
        }

        try {
            return await baseFetch(input, { ...init, signal: controller.signal });
        } finally {
            clearTimeout(timer);
            upstream?.removeEventListener("abort", forwardAbort);
        }
    };
}
