export const formatISODate = (date: Date): string => date.toISOString().slice(0, 10);

export const MINUTES_PER_DAY = 24 * 60;

const isoDatePattern = /^\d{4}-\d{2}-\d{2}$/;

const utcMidnight = (isoDate: string): Date => {
  if (!isoDatePattern.test(isoDate)) {
    throw new Error(`Invalid ISO date: ${isoDate}`);
  }
  return new Date(`${isoDate}T00:00:00Z`);
};

export const addDays = (isoDate: string, days: number): string => {
  const d = utcMidnight(isoDate);
  d.setUTCDate(d.getUTCDate() + days);
  return formatISODate(d);
};

export const compactDate = (isoDate: string): string => {
  utcMidnight(isoDate);
  return isoDate.replace(/-/g, '');
};

export const isWeekend = (isoDate: string): boolean => {
  const day = utcMidnight(isoDate).getUTCDay();
  return day === 0 || day === 6;
};

// Wall-clock time in `tz`, re-expressed as if it were UTC so getUTC* reads local fields.
const tzDate = (date: Date, tz: string): Date => {
  const iso = date.toLocaleString('sv-SE', { timeZone: tz }).replace(' ', 'T');
  return new Date(`${iso}Z`);
};

const tzOffsetMs = (instant: Date, tz: string): number => {
  const floored = Math.floor(instant.getTime() / 1000) * 1000;
  return tzDate(new Date(floored), tz).getTime() - floored;
};

export interface LocalClock {
  date: string;
  minutes: number;
}

export const localClock = (now: Date, tz: string): LocalClock => {
  const local = tzDate(now, tz);
  return {
    date: formatISODate(local),
    minutes: local.getUTCHours() * 60 + local.getUTCMinutes()
  };
};

/**
 * Parses "HH:MM" into minutes after the reference date's local midnight.
 * Hours of 24 and above address the following calendar day ("26:00" is 02:00 next day).
 */
export const parseClock = (value: string): number => {
  const match = /^(\d{1,2}):(\d{2})$/.exec(value.trim());
  if (!match) {
    throw new Error(`Invalid clock time: ${value}`);
  }
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (minutes > 59 || hours > 47) {
    throw new Error(`Clock time out of range: ${value}`);
  }
  return hours * 60 + minutes;
};

export const localWallTimeToInstant = (isoDate: string, minutes: number, tz: string): Date => {
  const localMs = utcMidnight(isoDate).getTime() + minutes * 60_000;
  const guess = localMs - tzOffsetMs(new Date(localMs), tz);
  return new Date(localMs - tzOffsetMs(new Date(guess), tz));
};

export const parseNow = (value?: string): Date => {
  if (!value) return new Date();
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    throw new Error(`Invalid timestamp: ${value}`);
  }
  return parsed;
};

export const makeRunId = (now: Date, suffix: string): string => {
  // ISO up to minutes with colons replaced, safe as a directory name.
  const isoMinute = now.toISOString().slice(0, 16).replace(/:/g, '-');
  return `${isoMinute}-${suffix}`;
};
