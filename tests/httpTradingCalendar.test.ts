import { CalendarUnavailableError } from '../src/core/errors';
import { HttpTradingCalendar } from '../src/calendar/httpTradingCalendar';

const policy = { maxRetries: 1, baseDelayMs: 0, timeoutMs: 1000 };

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

describe('HTTP trading calendar', () => {
  let fetchSpy: jest.SpyInstance;

  beforeEach(() => {
    fetchSpy = jest.spyOn(global, 'fetch');
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });
  afterEach(() => {
    jest.restoreAllMocks();
  });

  const calendar = () => new HttpTradingCalendar('https://calendar.test/', 'test-secret', policy);

  it('queries a single date with bearer auth', async () => {
    fetchSpy.mockImplementation(async () => jsonResponse({ data: [{ Date: '2026-10-16', HolDiv: '1' }] }));
    await expect(calendar().query('2026-10-16')).resolves.toEqual({
      date: '2026-10-16',
      isTradingDay: true,
      holidayClass: 'TRADING'
    });
    expect(fetchSpy).toHaveBeenCalledTimes(1);
    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe('https://calendar.test/markets/calendar?from=2026-10-16&to=2026-10-16');
    expect(init.headers).toEqual({ Accept: 'application/json', Authorization: 'Bearer test-secret' });
  });

  it('distinguishes holidays from exchange closures', async () => {
    fetchSpy.mockImplementation(async () => jsonResponse({ data: [{ Date: '2026-12-31', HolDiv: '2' }] }));
    await expect(calendar().query('2026-12-31')).resolves.toEqual({
      date: '2026-12-31',
      isTradingDay: false,
      holidayClass: 'SPECIAL_CLOSURE'
    });
  });

  it('retries a server error before answering', async () => {
    fetchSpy
      .mockImplementationOnce(async () => new Response('busy', { status: 503 }))
      .mockImplementation(async () => jsonResponse({ data: [{ Date: '2026-10-12', HolDiv: '0' }] }));
    await expect(calendar().query('2026-10-12')).resolves.toMatchObject({ isTradingDay: false, holidayClass: 'HOLIDAY' });
    expect(fetchSpy).toHaveBeenCalledTimes(2);
  });

  it('reports an unauthorised answer as unavailable without retrying', async () => {
    fetchSpy.mockImplementation(async () => new Response('nope', { status: 401 }));
    const pending = calendar().query('2026-10-16');
    await expect(pending).rejects.toBeInstanceOf(CalendarUnavailableError);
    await expect(pending).rejects.toThrow('Trading calendar unavailable for 2026-10-16: Trading calendar failed 401: nope');
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  it('reports a network failure once retries are spent', async () => {
    fetchSpy.mockImplementation(async () => {
      throw new TypeError('socket hang up');
    });
    await expect(calendar().query('2026-10-16')).rejects.toThrow(
      'Trading calendar unavailable for 2026-10-16: Trading calendar request failed: socket hang up'
    );
    expect(fetchSpy).toHaveBeenCalledTimes(2);
  });

  it('never guesses when the date or its division is missing', async () => {
    fetchSpy.mockImplementation(async () => jsonResponse({ data: [{ Date: '2026-10-15', HolDiv: '1' }] }));
    await expect(calendar().query('2026-10-16')).rejects.toThrow('date missing from calendar response');
    fetchSpy.mockImplementation(async () => jsonResponse({ data: [{ Date: '2026-10-16', HolDiv: '9' }] }));
    await expect(calendar().query('2026-10-16')).rejects.toThrow('unknown HolDiv 9');
    fetchSpy.mockImplementation(async () => jsonResponse({ rows: [] }));
    await expect(calendar().query('2026-10-16')).rejects.toThrow('response did not match calendar schema');
  });
});
