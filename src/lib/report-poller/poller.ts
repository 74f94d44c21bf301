import { PollExhaustedError, ValidationError } from '@/utils/errors.js';
import type { PollAttempt, PollClassification, PollOptions } from './types.js';

/** Longest delay setTimeout honours; anything above fires after 1 ms */
const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Delay before the check following non-terminal attempt `attempt` (zero-based):
 * min(minInterval * 2^attempt, maxInterval).
 */
export function backoffDelay(attempt: number, minIntervalMs: number, maxIntervalMs: number): number {
    if (minIntervalMs === 0) {
        return 0;
    }
    return Math.min(minIntervalMs * 2 ** attempt, maxIntervalMs);
}

/**
 * The full wait schedule for `maxAttempts` checks that all come back pending.
 * There is one delay fewer than checks since nothing waits before the first.
 */
export function backoffSchedule(options: Pick<PollOptions, 'minIntervalMs' | 'maxIntervalMs' | 'maxAttempts'>): number[] {
    assertPollOptions(options);
    return Array.from({ length: options.maxAttempts - 1 }, (_, k) => backoffDelay(k, options.minIntervalMs, options.maxIntervalMs));
}

function assertPollOptions({ minIntervalMs, maxIntervalMs, maxAttempts }: Pick<PollOptions, 'minIntervalMs' | 'maxIntervalMs' | 'maxAttempts'>) {
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
        throw new ValidationError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
    }
    if (!Number.isFinite(minIntervalMs) || minIntervalMs < 0) {
        throw new ValidationError(`minInterval must be a non-negative number, got ${minIntervalMs}`);
    }
    if (!Number.isFinite(maxIntervalMs) || maxIntervalMs < minIntervalMs) {
        throw new ValidationError(`maxInterval (${maxIntervalMs}) must not be lower than minInterval (${minIntervalMs})`);
    }
    if (maxIntervalMs > MAX_TIMER_DELAY_MS) {
        throw new ValidationError(`maxInterval (${maxIntervalMs}) exceeds the longest supported delay of ${MAX_TIMER_DELAY_MS} ms`);
    }
}

/**
 * Poll a status check until it reports a terminal snapshot.
 *
 * State machine:
 * 1. Run the check and classify the snapshot
 * 2. Terminal → return the snapshot (FAILED is returned, not thrown)
 * 3. Pending → if checks remain, wait the current delay and go to 1
 * 4. No checks left → PollExhaustedError
 *
 * The check must be a pure read; it runs at most `maxAttempts` times and
 * is never preceded by a wait on the first attempt.
 */
export async function pollUntilTerminal<S>(check: () => Promise<S>, classify: (snapshot: S) => PollClassification<S>, options: PollOptions): Promise<S> {
    assertPollOptions(options);

    const { minIntervalMs, maxIntervalMs, maxAttempts, onAttempt } = options;
    const sleep = options.sleep ?? defaultSleep;
    const now = options.now ?? (() => new Date());

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
        const outcome = classify(await check());
        const hasNext = outcome.kind === 'pending' && attempt + 1 < maxAttempts;
        const nextDelayMs = hasNext ? backoffDelay(attempt, minIntervalMs, maxIntervalMs) : null;

        const record: PollAttempt = {
            attempt,
            terminal: outcome.kind === 'terminal',
            nextDelayMs,
            observedAt: now(),
        };
        onAttempt?.(record);

        if (outcome.kind === 'terminal') {
            return outcome.snapshot;
        }

        if (nextDelayMs !== null) {
            await sleep(nextDelayMs);
        }
    }

    throw new PollExhaustedError(`Report still running after ${maxAttempts} status checks`, {
        context: { maxAttempts, minIntervalMs, maxIntervalMs },
    });
}
