import path from 'path';
import { PipelineConfig } from '../core/schema';
import { HttpTradingCalendar } from './httpTradingCalendar';
import { StaticTradingCalendar, loadStaticCalendar } from './tradingCalendar.static';
import { TradingCalendar } from './tradingCalendar.types';

export const getTradingCalendar = (config: PipelineConfig, env: NodeJS.ProcessEnv = process.env): TradingCalendar => {
  const provider = (env.CALENDAR_PROVIDER || 'static').toLowerCase();
  if (provider === 'http') {
    if (!env.CALENDAR_API_URL) {
      throw new Error('CALENDAR_PROVIDER=http but CALENDAR_API_URL is not set.');
    }
    return new HttpTradingCalendar(env.CALENDAR_API_URL, env.CALENDAR_API_TOKEN);
  }
  return loadStaticCalendar(path.resolve(process.cwd(), config.calendar.holidaysFile));
};

export { HttpTradingCalendar, StaticTradingCalendar };
export type { TradingCalendar };
