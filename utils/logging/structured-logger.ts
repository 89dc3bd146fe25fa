import { type LogLevel, logger } from '@/utils/logger';

interface InterceptionBudgetState {
    debug: number;
    info: number;
    budgetWarningEmitted: boolean;
}

interface DedupeItem {
    lastAt: number;
}

export interface StructuredLoggerOptions {
    debugBudget?: number;
    infoBudget?: number;
    dedupeTtlMs?: number;
    maxDedupeEntries?: number;
    now?: () => number;
}

/** Scope for events that belong to no interception, such as callbacks for unknown tasks. */
export const UNTRACKED_INTERCEPTION_ID = 'untracked';

/**
 * Emits log events scoped to one interception identifier.
 *
 * Debug and info events are budgeted per interception. Events with a dedupe key are
 * dropped when the same key was emitted within the TTL. Warnings, errors and untracked
 * events are never budgeted; untracked ones are only deduplicated.
 */
export class StructuredInterceptionLogger {
    private readonly debugBudget: number;
    private readonly infoBudget: number;
    private readonly dedupeTtlMs: number;
    private readonly maxDedupeEntries: number;
    private readonly now: () => number;
    private readonly budgets = new Map<string, InterceptionBudgetState>();
    private readonly dedupeCache = new Map<string, DedupeItem>();

    constructor(options: StructuredLoggerOptions = {}) {
        this.debugBudget = options.debugBudget ?? 50;
        this.infoBudget = options.infoBudget ?? 20;
        this.dedupeTtlMs = options.dedupeTtlMs ?? 1500;
        this.maxDedupeEntries = options.maxDedupeEntries ?? 1000;
        this.now = options.now ?? Date.now;
    }

    public emit(
        interceptionId: string,
        level: LogLevel,
        eventCode: string,
        message: string,
        data?: unknown,
        dedupeKey?: string,
    ): void {
        if (!this.withinBudget(interceptionId, level)) {
            return;
        }

        if (dedupeKey !== undefined && !this.shouldEmit(`${interceptionId}:${eventCode}:${dedupeKey}`)) {
            return;
        }

        const payload = {
            interceptionId,
            eventCode,
            ...(data !== undefined ? { data } : {}),
        };

        if (level === 'error') {
            logger.error(message, payload);
            return;
        }
        if (level === 'warn') {
            logger.warn(message, payload);
            return;
        }
        if (level === 'debug') {
            logger.debug(message, payload);
            return;
        }
        logger.info(message, payload);
    }

    /** Drops the budget kept for a finished interception. */
    public release(interceptionId: string): void {
        this.budgets.delete(interceptionId);
    }

    public get trackedInterceptionCount(): number {
        return this.budgets.size;
    }

    private withinBudget(interceptionId: string, level: LogLevel): boolean {
        if (level === 'warn' || level === 'error' || interceptionId === UNTRACKED_INTERCEPTION_ID) {
            return true;
        }

        const state = this.budgets.get(interceptionId) ?? {
            debug: 0,
            info: 0,
            budgetWarningEmitted: false,
        };
        this.budgets.set(interceptionId, state);

        if (level === 'debug') {
            state.debug += 1;
        } else {
            state.info += 1;
        }

        if (state.debug <= this.debugBudget && state.info <= this.infoBudget) {
            return true;
        }
        if (!state.budgetWarningEmitted) {
            state.budgetWarningEmitted = true;
            logger.warn('log_budget_exceeded', {
                interceptionId,
                debugCount: state.debug,
                infoCount: state.info,
            });
        }
        return false;
    }

    private shouldEmit(key: string): boolean {
        const now = this.now();
        const existing = this.dedupeCache.get(key);
        if (existing && now - existing.lastAt < this.dedupeTtlMs) {
            return false;
        }
        this.dedupeCache.delete(key);
        this.dedupeCache.set(key, { lastAt: now });

        // Map iteration order is insertion order, so the first keys are the oldest.
        while (this.dedupeCache.size > this.maxDedupeEntries) {
            const oldest = this.dedupeCache.keys().next();
            if (oldest.done) {
                break;
            }
            this.dedupeCache.delete(oldest.value);
        }

        return true;
    }
}
