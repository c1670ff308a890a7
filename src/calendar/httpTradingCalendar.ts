import { z } from 'zod';
import { CalendarUnavailableError, errorMessage } from '../core/errors';
import { RetryPolicy, withRetry } from '../core/retry';
import { HolidayClass, TradingDayRecord } from '../core/types';
import { fetchJson } from '../integrations/httpClient';
import { TradingCalendar } from './tradingCalendar.types';

const calendarResponseSchema = z.object({
  data: z.array(
    z.object({
      Date: z.string(),
      HolDiv: z.string()
    })
  )
});

// "1" open, "0" weekend or public holiday, "2" exchange-specific closure (year end etc.)
const holidayDivisions: Record<string, HolidayClass> = {
  '1': 'TRADING',
  '0': 'HOLIDAY',
  '2': 'SPECIAL_CLOSURE'
};

const defaultPolicy: RetryPolicy = { maxRetries: 2, baseDelayMs: 500, timeoutMs: 10_000 };

export class HttpTradingCalendar implements TradingCalendar {
  private baseUrl: string;
  private token?: string;
  private policy: RetryPolicy;

  constructor(baseUrl: string, token?: string, policy: RetryPolicy = defaultPolicy) {
    this.baseUrl = baseUrl.replace(/\/$/, '');
    this.token = token;
    this.policy = policy;
  }

  private async fetchRows(date: string, signal: AbortSignal) {
    const url = new URL(`${this.baseUrl}/markets/calendar`);
    url.searchParams.set('from', date);
    url.searchParams.set('to', date);
    const json = await fetchJson(url.toString(), 'Trading calendar', {
      headers: this.token ? { Authorization: `Bearer ${this.token}` } : {},
      signal
    });
    const parsed = calendarResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new CalendarUnavailableError(date, 'response did not match calendar schema');
    }
    return parsed.data.data;
  }

  async query(date: string): Promise<TradingDayRecord> {
    let rows: Array<{ Date: string; HolDiv: string }>;
    try {
      rows = await withRetry((signal) => this.fetchRows(date, signal), this.policy, `calendar ${date}`);
    } catch (err) {
      if (err instanceof CalendarUnavailableError) throw err;
      throw new CalendarUnavailableError(date, errorMessage(err));
    }
    const row = rows.find((r) => r.Date === date);
    if (!row) {
      throw new CalendarUnavailableError(date, 'date missing from calendar response');
    }
    const holidayClass = holidayDivisions[row.HolDiv];
    if (!holidayClass) {
      throw new CalendarUnavailableError(date, `unknown HolDiv ${row.HolDiv}`);
    }
    return { date, isTradingDay: holidayClass === 'TRADING', holidayClass };
  }
}
