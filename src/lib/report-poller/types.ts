/**
 * Outcome of classifying one status snapshot. Pending is a normal result,
 * not an error.
 */
export type PollClassification<S> = { kind: 'terminal'; snapshot: S } | { kind: 'pending'; snapshot: S };

export interface PollAttempt {
    /** Zero-based index of the status check */
    attempt: number;
    terminal: boolean;
    /** Delay before the next check; null when no further check happens */
    nextDelayMs: number | null;
    observedAt: Date;
}

export interface PollOptions {
    minIntervalMs: number;
    maxIntervalMs: number;
    /** Upper bound on status checks */
    maxAttempts: number;
    sleep?: (ms: number) => Promise<void>;
    now?: () => Date;
    onAttempt?: (attempt: PollAttempt) => void;
}
