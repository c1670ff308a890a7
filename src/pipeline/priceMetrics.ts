import { PriceBar } from '../core/schema';
import { average, round } from '../core/utils';

const atrPeriod = 14;

/** Average true range over the last 14 bars as a percent of the last close; null without enough bars. */
export const computeAtrPct = (bars: PriceBar[]): number | null => {
  if (bars.length < 2) return null;
  const ranges: number[] = [];
  for (let i = Math.max(1, bars.length - atrPeriod); i < bars.length; i++) {
    const bar = bars[i];
    const prevClose = bars[i - 1].close;
    ranges.push(Math.max(bar.high - bar.low, Math.abs(bar.high - prevClose), Math.abs(bar.low - prevClose)));
  }
  const lastClose = bars[bars.length - 1].close;
  if (lastClose <= 0) return null;
  const atr = average(ranges);
  return round((atr / lastClose) * 100);
};
