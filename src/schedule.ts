import cron from 'node-cron';
import { ConfigError } from './errors.js';
import { createLogger } from './logger.js';

const logger = createLogger('schedule');

export type Scheduler = {
    validate(expression: string): boolean;
    schedule(expression: string, task: () => void): { start(): void };
};

export type ScheduledRuns = {
    /** Runs once unless a previous run is still in flight; resolves false when skipped. */
    tick(): Promise<boolean>;
};

export function assertCronExpression(expression: string, scheduler: Scheduler = cron): void {
    if (!scheduler.validate(expression)) {
        throw new ConfigError(`Invalid cron expression: ${expression}`);
    }
}

/**
 * Registers `run` on the cron expression. Overlapping ticks are skipped, and a
 * failed run is logged so the schedule keeps going.
 */
export function scheduleRuns(expression: string, run: () => Promise<unknown>, scheduler: Scheduler = cron): ScheduledRuns {
    assertCronExpression(expression, scheduler);
    let running = false;

    async function tick(): Promise<boolean> {
        if (running) {
            logger.warn('schedule.skip', { reason: 'previous run still in progress' });
            return false;
        }
        running = true;
        try {
            await run();
        } catch (e) {
            logger.error('schedule.error', { err: e instanceof Error ? e.message : String(e) });
        } finally {
            running = false;
        }
        return true;
    }

    scheduler.schedule(expression, () => { void tick(); }).start();
    logger.info('schedule.started', { expression });
    return { tick };
}

/** Only a one-shot run reports failed feeds through the exit code. */
export function exitCodeFor(result: { failedFeeds: string[] }, mode: { serve: boolean; schedule: boolean }): number {
    if (mode.serve || mode.schedule) return 0;
    return result.failedFeeds.length > 0 ? 1 : 0;
}
