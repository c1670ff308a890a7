import { TradingDayRecord } from '../core/types';

/**
 * Answers whether a date is a trading day. Implementations throw
 * CalendarUnavailableError when they cannot answer; that is never the same as
 * `isTradingDay: false`.
 */
export interface TradingCalendar {
  query(date: string): Promise<TradingDayRecord>;
}
