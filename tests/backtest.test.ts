import { MinuteBar } from '../src/core/types';
import { USER_PARTICIPANT, buildAlphaExtractionRequest, runBacktest, scoresFor } from '../src/backtest/backtestEngine';
import { PositionLedger } from '../src/ledger/positionLedger';
import { MemoryStore } from '../src/ledger/storage';
import { StrategyLog } from '../src/strategyLog/strategyLog';
import { StaticQuoteProvider, decision, makeClassifier } from './helpers';

const bar = (clock: string, open: number, close: number): MinuteBar => ({
  timestamp: `2025-03-03T${clock}:00+08:00`,
  open,
  high: Math.max(open, close),
  low: Math.min(open, close),
  close,
  volume: 1000
});

const BARS = [bar('09:30', 10, 10), bar('09:31', 10, 9.8), bar('09:32', 9.8, 10.4)];
const ALPHA_MINUTE = '2025-03-03T09:31:00+08:00';

const setup = async () => {
  const store = new MemoryStore();
  const ledger = new PositionLedger({ store });
  const strategyLog = new StrategyLog(store);
  const quotes = new StaticQuoteProvider().setBars('600000', '2025-03-03', BARS);
  await ledger.applyTrade({ id: 'trd-user', symbol: '600000', side: 'buy', quantity: 1000, price: 9.8, timestamp: ALPHA_MINUTE });
  strategyLog.append(
    decision({
      id: 'dec-a',
      finalDecision: { direction: 'buy', size: 1000, limitPrice: 9.9, stopLoss: 9.5, commentary: 'Buy the dip.', verdict: 'accept: ok' }
    })
  );
  return { deps: { classifier: makeClassifier(), quotes, ledger, strategyLog }, strategyLog };
};

const params = { symbol: '600000', from: '2025-03-03', to: '2025-03-03', initialCapital: 100000 };

describe('runBacktest', () => {
  it("replays a model's limit order against the user's trades", async () => {
    const { deps } = await setup();
    const result = await runBacktest(params, deps);

    expect(result.participants).toEqual(['model-a', USER_PARTICIPANT]);
    expect(result.startShares).toBe(0);
    expect(result.points.map((p) => p.equity)).toEqual([
      { 'model-a': 100000, user: 100000 },
      { 'model-a': 99900, user: 100000 },
      { 'model-a': 100500, user: 100600 }
    ]);
    expect(result.fills).toEqual([
      { participant: 'model-a', timestamp: ALPHA_MINUTE, side: 'buy', quantity: 1000, price: 9.9, sourceId: 'dec-a' },
      { participant: USER_PARTICIPANT, timestamp: ALPHA_MINUTE, side: 'buy', quantity: 1000, price: 9.8, sourceId: 'trd-user' }
    ]);
    expect(result.summaries['model-a']).toEqual({
      participant: 'model-a',
      startEquity: 100000,
      finalEquity: 100500,
      returnPct: 0.5,
      maxDrawdownPct: 0.1,
      fills: 1
    });
    expect(result.summaries.user).toMatchObject({ finalEquity: 100600, returnPct: 0.6, maxDrawdownPct: 0, fills: 1 });
    expect(result.alphaMinutes).toEqual([ALPHA_MINUTE]);
  });

  it('waits for the target session before acting on a decision', async () => {
    const { deps, strategyLog } = await setup();
    strategyLog.append(
      decision({
        id: 'dec-b',
        modelTag: 'model-b',
        targetDate: '2025-03-04',
        finalDecision: { direction: 'buy', size: 1000, limitPrice: 11, stopLoss: null, commentary: '', verdict: 'accept: ok' }
      })
    );
    const result = await runBacktest({ ...params, participants: ['model-b'] }, deps);

    expect(result.participants).toEqual(['model-b', USER_PARTICIPANT]);
    expect(result.summaries['model-b']).toMatchObject({ finalEquity: 100000, returnPct: 0, fills: 0 });
    // the user only matched a flat model at the minute they traded
    expect(result.alphaMinutes).toEqual([]);
  });

  it('ignores decisions that were not completed orders', async () => {
    const { deps, strategyLog } = await setup();
    strategyLog.append(decision({ id: 'dec-r', modelTag: 'model-r', status: 'rejected', finalDecision: null }));
    strategyLog.append(decision({ id: 'dec-x', modelTag: 'model-x', status: 'abandoned', finalDecision: null }));
    const result = await runBacktest(params, deps);
    expect(result.participants).toEqual(['model-a', USER_PARTICIPANT]);
  });

  it('drops an unfilled order once the same model logs a newer hold', async () => {
    const { deps, strategyLog } = await setup();
    strategyLog.append(decision({ id: 'dec-a-hold', createdAt: '2025-03-02T13:00:00Z' }));
    const result = await runBacktest(params, deps);

    expect(result.fills).toEqual([
      { participant: USER_PARTICIPANT, timestamp: ALPHA_MINUTE, side: 'buy', quantity: 1000, price: 9.8, sourceId: 'trd-user' }
    ]);
    expect(result.summaries['model-a']).toMatchObject({ finalEquity: 100000, returnPct: 0, fills: 0 });
  });

  it('compares a model that only ever held', async () => {
    const { deps, strategyLog } = await setup();
    strategyLog.append(decision({ id: 'dec-b-hold', modelTag: 'model-b', createdAt: '2025-03-02T14:00:00Z' }));
    const result = await runBacktest(params, deps);

    expect(result.participants).toEqual(['model-a', 'model-b', USER_PARTICIPANT]);
    expect(result.summaries['model-b']).toMatchObject({ finalEquity: 100000, returnPct: 0, fills: 0 });
    expect(result.alphaMinutes).toEqual([]);
  });
});

describe('scoresFor', () => {
  it('scores decisions whose target session was replayed', async () => {
    const { deps, strategyLog } = await setup();
    strategyLog.append(decision({ id: 'dec-late', targetDate: '2025-03-05', createdAt: '2025-03-04T12:00:00Z' }));
    const result = await runBacktest(params, deps);

    const scores = scoresFor(result, strategyLog.list('600000'), new Date('2025-03-04T00:00:00Z'));

    expect(scores).toEqual([
      {
        id: 'dec-a',
        score: { scoredAt: '2025-03-04T00:00:00.000Z', from: '2025-03-03', to: '2025-03-03', returnPct: 0.5, userReturnPct: 0.6 }
      }
    ]);
  });
});

describe('buildAlphaExtractionRequest', () => {
  it('frames the minute the user beat every model', async () => {
    const { deps } = await setup();
    const result = await runBacktest(params, deps);
    const request = buildAlphaExtractionRequest(result, ALPHA_MINUTE);

    expect(request.userPrompt.split('\n')).toEqual([
      'Symbol: 600000; range 2025-03-03 to 2025-03-03; models: model-a',
      `Trader actions at ${ALPHA_MINUTE}: buy 1000 @ 9.8`,
      '',
      'Minute window:',
      '2025-03-03T09:30:00+08:00 price=10 model-a=100000 user=100000',
      `${ALPHA_MINUTE} price=9.8 model-a=99900 user=100000 <==`,
      '2025-03-03T09:32:00+08:00 price=10.4 model-a=100500 user=100600'
    ]);
    expect(() => buildAlphaExtractionRequest(result, '2025-03-03T10:00:00+08:00')).toThrow(/not part of the backtest/);
  });
});
