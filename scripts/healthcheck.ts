import 'dotenv/config';
import { performance } from 'perf_hooks';
import { TradingCalendar } from '../src/calendar/tradingCalendar.types';
import { buildPipelineDeps, loadPipelineConfig } from '../src/cli/context';
import { errorMessage } from '../src/core/errors';
import { formatISODate } from '../src/core/time';
import { InstrumentMetadataProvider, MarketDataProvider } from '../src/data/marketData.types';

type ProbeStatus = 'OK' | 'EMPTY' | 'ERROR';

export interface ProviderHealth {
  ok: boolean;
  timestamp: string;
  calendar: { status: ProbeStatus; date: string; isTradingDay?: boolean; error?: string };
  metadata: { status: ProbeStatus; instruments: number; error?: string };
  prices: Record<string, { status: ProbeStatus; bars: number; latencyMs: number; error?: string }>;
}

export interface HealthcheckTargets {
  calendar: TradingCalendar;
  metadata: InstrumentMetadataProvider;
  marketData: MarketDataProvider;
  period: string;
  interval: string;
}

/** Probes each collaborator once, without retries, and reports what answered. */
export const providerHealthcheck = async (
  targets: HealthcheckTargets,
  sampleSize = 3,
  now: Date = new Date()
): Promise<ProviderHealth> => {
  const date = formatISODate(now);
  const health: ProviderHealth = {
    ok: false,
    timestamp: now.toISOString(),
    calendar: { status: 'ERROR', date },
    metadata: { status: 'ERROR', instruments: 0 },
    prices: {}
  };

  try {
    const record = await targets.calendar.query(date);
    health.calendar = { status: 'OK', date, isTradingDay: record.isTradingDay };
  } catch (err) {
    health.calendar = { status: 'ERROR', date, error: errorMessage(err) };
  }

  let sample: string[] = [];
  try {
    const instruments = await targets.metadata.fetchInstruments();
    health.metadata = { status: instruments.length ? 'OK' : 'EMPTY', instruments: instruments.length };
    sample = instruments.slice(0, sampleSize).map((i) => i.instrumentId);
  } catch (err) {
    health.metadata = { status: 'ERROR', instruments: 0, error: errorMessage(err) };
  }

  for (const instrumentId of sample) {
    const start = performance.now();
    try {
      const bars = await targets.marketData.fetchSeries(instrumentId, targets.period, targets.interval);
      health.prices[instrumentId] = { status: bars.length ? 'OK' : 'EMPTY', bars: bars.length, latencyMs: performance.now() - start };
    } catch (err) {
      health.prices[instrumentId] = { status: 'ERROR', bars: 0, latencyMs: performance.now() - start, error: errorMessage(err) };
    }
  }

  health.ok =
    health.calendar.status === 'OK' &&
    health.metadata.status === 'OK' &&
    Object.values(health.prices).some((p) => p.status === 'OK');
  return health;
};

if (require.main === module) {
  const config = loadPipelineConfig();
  const deps = buildPipelineDeps(config);
  providerHealthcheck({ ...deps, period: config.fetch.period, interval: config.fetch.interval })
    .then((res) => {
      console.log(JSON.stringify(res, null, 2));
      if (!res.ok) process.exitCode = 1;
    })
    .catch((err) => {
      console.error(err);
      process.exitCode = 1;
    });
}
