import fs from 'fs';
import { z } from 'zod';
import { CalendarUnavailableError } from '../core/errors';
import { isoDateSchema, parseDocument } from '../core/schema';
import { isWeekend } from '../core/time';
import { HolidayClass, TradingDayRecord } from '../core/types';
import { readJSONFile } from '../core/utils';
import { TradingCalendar } from './tradingCalendar.types';

const holidayFileSchema = z
  .object({
    coverage: z.object({ from: isoDateSchema, to: isoDateSchema }),
    holidays: z.array(isoDateSchema),
    specialClosures: z.array(isoDateSchema)
  })
  .refine((file) => file.coverage.from <= file.coverage.to, { message: 'coverage.from must not be after coverage.to' });

export interface CalendarCoverage {
  from: string;
  to: string;
}

/**
 * Weekends plus a fixed holiday list. Offline stand-in for the calendar service.
 * Dates outside `coverage` have no data and are reported as unavailable.
 */
export class StaticTradingCalendar implements TradingCalendar {
  private closures = new Map<string, HolidayClass>();
  private coverage: CalendarCoverage;

  constructor(coverage: CalendarCoverage, holidays: string[] = [], specialClosures: string[] = []) {
    this.coverage = coverage;
    holidays.forEach((d) => this.closures.set(d, 'HOLIDAY'));
    specialClosures.forEach((d) => this.closures.set(d, 'SPECIAL_CLOSURE'));
  }

  async query(date: string): Promise<TradingDayRecord> {
    if (date < this.coverage.from || date > this.coverage.to) {
      throw new CalendarUnavailableError(date, `outside static calendar coverage ${this.coverage.from}..${this.coverage.to}`);
    }
    const closure = this.closures.get(date) ?? (isWeekend(date) ? 'HOLIDAY' : undefined);
    if (closure) {
      return { date, isTradingDay: false, holidayClass: closure };
    }
    return { date, isTradingDay: true, holidayClass: 'TRADING' };
  }
}

export const loadStaticCalendar = (file: string): StaticTradingCalendar => {
  if (!fs.existsSync(file)) {
    throw new Error(`Holiday file ${file} not found`);
  }
  const parsed = parseDocument(holidayFileSchema, readJSONFile(file), file);
  return new StaticTradingCalendar(parsed.coverage, parsed.holidays, parsed.specialClosures);
};
