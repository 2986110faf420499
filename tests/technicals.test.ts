import { MinuteBar } from '../src/core/types';
import { computeTechnicals, emaSeries, rsi, summarizeSession } from '../src/analytics/technicals';
import { risingBars } from './helpers';

describe('indicator building blocks', () => {
  it('seeds the EMA with the first value', () => {
    expect(emaSeries([1, 2, 3], 3)).toEqual([1, 1.5, 2.25]);
  });

  it('averages gains against losses for RSI', () => {
    expect(rsi([10, 11, 10], 2)).toBe(50);
    expect(rsi([10, 10, 10], 2)).toBeNull();
    expect(rsi([10, 11], 2)).toBeNull();
  });
});

describe('computeTechnicals', () => {
  it('needs thirty bars', () => {
    expect(computeTechnicals(risingBars('2025-02-28', 29))).toBeNull();
  });

  it('reads a steady climb', () => {
    const tech = computeTechnicals(risingBars('2025-02-28', 40));
    if (!tech) throw new Error('expected indicators');

    expect(tech.bars).toBe(40);
    expect(tech.ma5).toBeCloseTo(10.37, 8);
    expect(tech.ma10).toBeCloseTo(10.345, 8);
    expect(tech.ma20).toBeCloseTo(10.295, 8);
    expect(tech.rsi14).toBe(100);
    expect(tech.bollinger.middle).toBeCloseTo(10.295, 8);
    expect(tech.bollinger.upper).toBeCloseTo(10.41332, 4);
    expect(tech.bollinger.lower).toBeCloseTo(10.17668, 4);
    expect(tech.kdj.k).toBeCloseTo(94.444, 2);
    expect(tech.kdj.d).toBeCloseTo(94.444, 2);
    expect(tech.macd.dif).toBeGreaterThan(0);
    expect(tech.macd.dif).toBeLessThan(0.07);
    expect(tech.macd.hist).toBeGreaterThan(0);
    expect(tech.signals).toContain('RSI overbought (>70)');
  });
});

describe('summarizeSession', () => {
  const bar = (clock: string, open: number, high: number, low: number, close: number, volume: number): MinuteBar => ({
    timestamp: `2025-03-03T${clock}:00+08:00`,
    open,
    high,
    low,
    close,
    volume
  });

  it('describes range, VWAP and the volume split', () => {
    const summary = summarizeSession([
      bar('09:30', 10, 10.1, 9.95, 10.1, 100),
      bar('10:00', 10.1, 10.1, 9.85, 9.9, 100),
      bar('13:30', 9.9, 10.35, 9.9, 10.3, 200)
    ]);

    expect(summary).toMatchObject({
      date: '2025-03-03',
      bars: 3,
      open: 10,
      high: 10.35,
      low: 9.85,
      last: 10.3,
      changePct: 3,
      lastVsVwapPct: 1.48,
      morningVolumePct: 50,
      highTime: '13:30',
      lowTime: '10:00'
    });
    expect(summary?.vwap).toBeCloseTo(10.15, 10);
  });

  it('is null without bars', () => {
    expect(summarizeSession([])).toBeNull();
  });
});
