import cron, { type ScheduledTask } from 'node-cron';
import { ConfigError } from '../shared/config.js';
import type { NewsService } from './news-service.js';
import { log, errorMessage } from './logging.js';

export interface DailyScheduleOptions {
    cron: string;
    timezone: string;
}

/**
 * Run the daily updates on a cron schedule (07:00 by default).
 * Returns the task so the caller can stop it.
 */
export function startDailySchedule(service: Pick<NewsService, 'sendDailyUpdates'>, options: DailyScheduleOptions): ScheduledTask {
    if (!cron.validate(options.cron)) {
        throw new ConfigError(`Invalid cron expression for daily updates: "${options.cron}"`);
    }

    const task = cron.schedule(options.cron, async () => {
        try {
            await service.sendDailyUpdates();
        } catch (err) {
            log('error', 'Daily updates run failed', { error: errorMessage(err) });
        }
    }, { timezone: options.timezone });

    log('info', 'Daily updates scheduled', { cron: options.cron, timezone: options.timezone });
    return task;
}
