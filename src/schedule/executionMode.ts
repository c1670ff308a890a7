import { PipelineConfig } from '../core/schema';
import { LocalClock, MINUTES_PER_DAY, addDays, localClock, localWallTimeToInstant, parseClock } from '../core/time';
import { ExecutionMode, ExecutionWindow } from '../core/types';

export interface ModeSelectionInput {
  now: Date;
  timezone: string;
  sessions: PipelineConfig['sessions'];
  forcedMode?: ExecutionMode;
}

interface SessionBounds {
  mode: Exclude<ExecutionMode, 'IDLE'>;
  start: number;
  end: number;
}

// Refresh is listed first so it wins if a misconfiguration makes the sessions overlap.
const sessionBounds = (sessions: PipelineConfig['sessions']): SessionBounds[] => [
  { mode: 'AFTERNOON_REFRESH', start: parseClock(sessions.refresh.start), end: parseClock(sessions.refresh.end) },
  { mode: 'EVENING_SELECT', start: parseClock(sessions.select.start), end: parseClock(sessions.select.end) }
];

// Reference date whose [start, end) window contains the clock, counting spill-over past midnight.
const referenceDateFor = (clock: LocalClock, session: SessionBounds): string | undefined => {
  if (clock.minutes >= session.start && clock.minutes < session.end) return clock.date;
  const carried = clock.minutes + MINUTES_PER_DAY;
  if (carried >= session.start && carried < session.end) return addDays(clock.date, -1);
  return undefined;
};

const windowFor = (session: SessionBounds, referenceDate: string, timezone: string): ExecutionWindow => ({
  referenceDate,
  mode: session.mode,
  windowStart: localWallTimeToInstant(referenceDate, session.start, timezone).toISOString(),
  windowEnd: localWallTimeToInstant(referenceDate, session.end, timezone).toISOString()
});

/**
 * Pure mapping from (time, override) to an execution window. Without an override the
 * configured sessions decide; outside both the answer is IDLE. A forced mode keeps the
 * reference date of its own session when `now` falls inside it, otherwise the local date.
 */
export const selectExecutionMode = (input: ModeSelectionInput): ExecutionWindow => {
  const clock = localClock(input.now, input.timezone);
  const idle: ExecutionWindow = { referenceDate: clock.date, mode: 'IDLE', windowStart: null, windowEnd: null };
  const bounds = sessionBounds(input.sessions);

  if (input.forcedMode === 'IDLE') return idle;
  if (input.forcedMode) {
    const forced = bounds.find((s) => s.mode === input.forcedMode);
    if (!forced) return idle;
    return windowFor(forced, referenceDateFor(clock, forced) ?? clock.date, input.timezone);
  }

  for (const session of bounds) {
    const referenceDate = referenceDateFor(clock, session);
    if (referenceDate) return windowFor(session, referenceDate, input.timezone);
  }
  return idle;
};
