import { PermanentProviderError } from '../core/errors';
import { PriceBar } from '../core/schema';
import { addDays, formatISODate, isWeekend } from '../core/time';
import { hashString, mulberry32, round } from '../core/utils';
import { MarketDataProvider } from './marketData.types';

const periodDays = (period: string): number => {
  const match = /^(\d+)(d|wk|mo|y)$/.exec(period);
  if (!match) throw new PermanentProviderError(`Unsupported period ${period}`);
  const n = Number(match[1]);
  const unit = match[2];
  if (unit === 'd') return n;
  if (unit === 'wk') return n * 7;
  if (unit === 'mo') return n * 30;
  return n * 365;
};

const basePriceFor = (instrumentId: string): number => {
  const rng = mulberry32(hashString(instrumentId));
  return 500 + rng() * 4500;
};

// Per-instrument daily drift between -0.4% and +0.4%.
const driftFor = (instrumentId: string): number => {
  const rng = mulberry32(hashString(`${instrumentId}drift`));
  return rng() * 0.008 - 0.004;
};

/** Deterministic daily bars for offline runs; same instrument and date give the same bar. */
export class StubMarketDataProvider implements MarketDataProvider {
  readonly name = 'stub';
  private clock: () => Date;

  constructor(clock: () => Date = () => new Date()) {
    this.clock = clock;
  }

  async fetchSeries(instrumentId: string, period: string, interval: string): Promise<PriceBar[]> {
    if (interval !== '1d') throw new PermanentProviderError(`Stub market data only serves 1d bars, not ${interval}`);
    const end = formatISODate(this.clock());
    const days = periodDays(period);
    const drift = driftFor(instrumentId);
    let close = basePriceFor(instrumentId);
    const bars: PriceBar[] = [];
    for (let offset = days; offset >= 0; offset--) {
      const date = addDays(end, -offset);
      if (isWeekend(date)) continue;
      const rng = mulberry32(hashString(`${instrumentId}-${date}`));
      const open = close;
      close = Math.max(1, close * (1 + drift + (rng() - 0.5) * 0.03));
      const spread = Math.abs(close - open) + close * rng() * 0.01;
      bars.push({
        date,
        open: round(open),
        high: round(Math.max(open, close) + spread / 2),
        low: round(Math.min(open, close) - spread / 2),
        close: round(close),
        volume: Math.floor(rng() * 1_000_000)
      });
    }
    return bars;
  }
}
