import { CalendarUnavailableError, errorMessage } from '../core/errors';
import { addDays } from '../core/time';
import { ExecutionMode, ExecutionWindow, TradingDayRecord } from '../core/types';
import { TradingCalendar } from '../calendar/tradingCalendar.types';

export type WindowDenyReason = 'IDLE' | 'NOT_TRADING_DAY' | 'BLACKOUT_DATE' | 'CALENDAR_UNAVAILABLE';

export type WindowDecision =
  | {
      allowed: true;
      mode: ExecutionMode;
      referenceDate: string;
      checkedDate: string;
      reason: 'TRADING_DAY' | 'CHECK_SKIPPED';
      record?: TradingDayRecord;
    }
  | {
      allowed: false;
      mode: ExecutionMode;
      referenceDate: string;
      checkedDate: string | null;
      reason: WindowDenyReason;
      message: string;
      record?: TradingDayRecord;
      error?: CalendarUnavailableError;
    };

export interface WindowGuardOptions {
  blackoutDates?: string[];
  skipCalendarCheck?: boolean;
}

/**
 * The date whose trading status decides the run. Refresh work concerns the reference
 * session itself; tonight's selection is consumed by the next calendar day's session.
 */
export const calendarDateFor = (window: ExecutionWindow): string | null => {
  switch (window.mode) {
    case 'AFTERNOON_REFRESH':
      return window.referenceDate;
    case 'EVENING_SELECT':
      return addDays(window.referenceDate, 1);
    default:
      return null;
  }
};

export const evaluateWindowGuard = async (
  window: ExecutionWindow,
  calendar: TradingCalendar,
  options: WindowGuardOptions = {}
): Promise<WindowDecision> => {
  const { mode, referenceDate } = window;
  const checkedDate = calendarDateFor(window);
  if (checkedDate === null) {
    return { allowed: false, mode, referenceDate, checkedDate, reason: 'IDLE', message: 'Outside every session window.' };
  }
  if (options.skipCalendarCheck) {
    console.warn(`[window] calendar check skipped for ${mode} ${referenceDate} (operator override)`);
    return { allowed: true, mode, referenceDate, checkedDate, reason: 'CHECK_SKIPPED' };
  }

  let record: TradingDayRecord;
  try {
    record = await calendar.query(checkedDate);
  } catch (err) {
    const error = err instanceof CalendarUnavailableError ? err : new CalendarUnavailableError(checkedDate, errorMessage(err));
    return {
      allowed: false,
      mode,
      referenceDate,
      checkedDate,
      reason: 'CALENDAR_UNAVAILABLE',
      message: error.message,
      error
    };
  }

  if (!record.isTradingDay) {
    return {
      allowed: false,
      mode,
      referenceDate,
      checkedDate,
      reason: 'NOT_TRADING_DAY',
      message: `${checkedDate} is not a trading day (${record.holidayClass}).`,
      record
    };
  }
  if (mode === 'EVENING_SELECT' && (options.blackoutDates ?? []).includes(checkedDate)) {
    return {
      allowed: false,
      mode,
      referenceDate,
      checkedDate,
      reason: 'BLACKOUT_DATE',
      message: `${checkedDate} is a configured selection blackout date.`,
      record
    };
  }
  return { allowed: true, mode, referenceDate, checkedDate, reason: 'TRADING_DAY', record };
};
