/**
 * Timing helpers shared by page readiness, command retries and the RPC client.
 */

export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, Math.max(0, ms)));
}

export interface Deadline {
    readonly at: number;
    remaining(): number;
    expired(): boolean;
}

export function deadlineIn(ms: number, now: () => number = Date.now): Deadline {
    const at = now() + ms;
    return {
        at,
        remaining: () => Math.max(0, at - now()),
        expired: () => now() >= at
    };
}

/**
 * Calls `probe` every `intervalMs` until it returns something other than
 * undefined or the deadline passes. The probe always runs at least once.
 */
export async function pollUntil<T>(
    probe: () => Promise<T | undefined>,
    deadline: Deadline,
    intervalMs: number
): Promise<T | undefined> {
    for (;;) {
        const value = await probe();
        if (value !== undefined) return value;
        if (deadline.expired()) return undefined;
        await sleep(Math.min(intervalMs, deadline.remaining()));
    }
}
