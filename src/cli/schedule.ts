import { PipelineConfig } from '../core/schema';
import { formatISODate, localClock, localWallTimeToInstant, parseClock } from '../core/time';
import { loadPipelineConfig } from './context';

export interface CronEntry {
  session: 'refresh' | 'select';
  minute: number;
  hour: number;
  line: string;
}

/**
 * Cron lines (UTC) that start each session shortly after it opens. The entries fire every
 * day; the window guard decides whether the market calendar allows the work.
 */
export const cronEntries = (config: PipelineConfig, on: Date, delayMinutes = 5): CronEntry[] => {
  const referenceDate = localClock(on, config.timezone).date;
  const sessions: Array<['refresh' | 'select', string]> = [
    ['refresh', config.sessions.refresh.start],
    ['select', config.sessions.select.start]
  ];
  return sessions.map(([session, start]) => {
    const instant = localWallTimeToInstant(referenceDate, parseClock(start) + delayMinutes, config.timezone);
    const minute = instant.getUTCMinutes();
    const hour = instant.getUTCHours();
    return {
      session,
      minute,
      hour,
      line: `${minute} ${hour} * * * cd $(pwd) && npm run picks:run >> logs/${session}.log 2>&1`
    };
  });
};

const printSchedule = () => {
  const config = loadPipelineConfig();
  const now = new Date();
  console.log(`Cron (UTC) for sessions defined in ${config.timezone}:`);
  console.log('# m h dom mon dow cmd');
  cronEntries(config, now).forEach((entry) => console.log(entry.line));
  console.log('');
  console.log('0 2 * * SUN cd $(pwd) && npm run picks:reconcile   # dry run; add -- --apply to delete');
  console.log('');
  console.log(`Today is ${formatISODate(now)}. Use --now with picks:run to test a specific instant.`);
};

if (require.main === module) {
  printSchedule();
}
