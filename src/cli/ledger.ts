import 'dotenv/config';
import { Command } from 'commander';
import { Position, TradeSide } from '../core/types';
import { parseTimestamp } from '../core/time';
import { loadDesk } from '../desk';
import { displayCost } from '../ledger/costBasis';

const SIDES: TradeSide[] = ['buy', 'sell', 'override'];

const isSide = (value: string): value is TradeSide => SIDES.some((side) => side === value);

const toNumber = (label: string, raw: string): number => {
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${label} must be a number, got ${raw}`);
  }
  return value;
};

const formatPosition = (p: Position) =>
  `${p.symbol}  shares=${p.shares}  base=${p.baseShares}  tradable=${p.shares - p.baseShares}  cost=${displayCost(p.costBasis)}  ` +
  `avg=${displayCost(p.averageCost)}  realised=${p.realizedPnl.toFixed(2)}  allocation=${p.capitalAllocation}`;

const program = new Command().name('ledger').description('Record trades and inspect positions');

program
  .command('trade')
  .requiredOption('--symbol <code>', 'instrument code')
  .requiredOption('--side <side>', 'buy | sell | override')
  .requiredOption('--qty <shares>', 'share count')
  .requiredOption('--price <price>', 'execution price')
  .option('--at <dateTime>', 'execution time (ISO 8601); defaults to now')
  .option('--note <text>', 'free-text note')
  .action(async (opts) => {
    if (!isSide(opts.side)) {
      throw new Error(`--side must be one of ${SIDES.join(', ')}`);
    }
    const desk = loadDesk();
    const position = await desk.ledger.applyTrade({
      symbol: opts.symbol,
      side: opts.side,
      quantity: toNumber('--qty', opts.qty),
      price: toNumber('--price', opts.price),
      timestamp: opts.at ? new Date(parseTimestamp(opts.at)).toISOString() : undefined,
      note: opts.note
    });
    console.log(formatPosition(position));
  });

program
  .command('base')
  .requiredOption('--symbol <code>', 'instrument code')
  .requiredOption('--shares <shares>', 'locked base tranche')
  .action(async (opts) => {
    const position = await loadDesk().ledger.setBaseShares(opts.symbol, toNumber('--shares', opts.shares));
    console.log(formatPosition(position));
  });

program
  .command('allocation')
  .requiredOption('--symbol <code>', 'instrument code')
  .requiredOption('--amount <cny>', 'capital ceiling for this symbol')
  .action(async (opts) => {
    const position = await loadDesk().ledger.setCapitalAllocation(opts.symbol, toNumber('--amount', opts.amount));
    console.log(formatPosition(position));
  });

program
  .command('show')
  .option('--symbol <code>', 'one instrument; all when omitted')
  .action((opts) => {
    const { ledger } = loadDesk();
    const positions = opts.symbol ? [ledger.getPosition(opts.symbol)] : ledger.listPositions();
    if (!positions.length) {
      console.log('No positions on file.');
      return;
    }
    positions.forEach((p) => {
      console.log(`${formatPosition(p)}  limit=${ledger.effectiveLimit(p.symbol).toFixed(2)}`);
    });
  });

program
  .command('history')
  .requiredOption('--symbol <code>', 'instrument code')
  .action((opts) => {
    const events = loadDesk().ledger.history(opts.symbol);
    if (!events.length) {
      console.log('No trades on file.');
      return;
    }
    events.forEach((e) => {
      console.log(`${e.timestamp}  ${e.side.padEnd(8)} ${String(e.quantity).padStart(8)} @ ${e.price}${e.note ? `  # ${e.note}` : ''}`);
    });
  });

const run = async () => {
  await program.parseAsync(process.argv);
};

if (require.main === module) {
  run().catch((err) => {
    console.error('ledger failed', err);
    process.exitCode = 1;
  });
}
