import 'dotenv/config';
import { Command } from 'commander';
import { loadDesk } from '../desk';
import { buildAlphaExtractionRequest, runBacktest, scoresFor } from '../backtest/backtestEngine';

const program = new Command();

program
  .requiredOption('--symbol <code>', 'instrument code')
  .requiredOption('--from <date>', 'first session (YYYY-MM-DD)')
  .requiredOption('--to <date>', 'last session (YYYY-MM-DD)')
  .option('--capital <cny>', 'starting cash per participant')
  .option('--participants <tags>', 'comma-separated model tags; defaults to every tag on file')
  .option('--score', 'attach the result to the decisions it covers', false)
  .option('--alpha', 'print the explanation request for each alpha minute', false);

const run = async () => {
  const opts = program.parse(process.argv).opts();
  const desk = loadDesk();
  const capital = opts.capital ? Number(opts.capital) : desk.config.backtestInitialCapital;
  if (!Number.isFinite(capital) || capital <= 0) {
    throw new Error(`--capital must be a positive number, got ${opts.capital}`);
  }
  const participants = opts.participants
    ? String(opts.participants)
        .split(',')
        .map((p) => p.trim())
        .filter(Boolean)
    : undefined;

  const result = await runBacktest(
    { symbol: opts.symbol, from: opts.from, to: opts.to, initialCapital: capital, participants },
    desk
  );

  console.log(`Backtest ${result.symbol} ${result.from}..${result.to}: ${result.points.length} minutes, start shares ${result.startShares}`);
  for (const summary of Object.values(result.summaries)) {
    console.log(
      `  ${summary.participant.padEnd(16)} equity ${summary.finalEquity.toFixed(2)}  return ${summary.returnPct.toFixed(2)}%  ` +
        `max drawdown ${summary.maxDrawdownPct.toFixed(2)}%  fills ${summary.fills}`
    );
  }
  console.log(`Alpha minutes: ${result.alphaMinutes.length ? result.alphaMinutes.join(', ') : 'none'}`);

  if (opts.score) {
    const scores = scoresFor(result, desk.strategyLog.list(result.symbol), new Date());
    scores.forEach(({ id, score }) => desk.strategyLog.attachScore(id, score));
    console.log(`Scored ${scores.length} decisions.`);
  }
  if (opts.alpha) {
    for (const minute of result.alphaMinutes) {
      const request = buildAlphaExtractionRequest(result, minute);
      console.log(`\n--- ${minute} ---\n${request.systemPrompt}\n\n${request.userPrompt}`);
    }
  }
};

if (require.main === module) {
  run().catch((err) => {
    console.error('backtest failed', err);
    process.exitCode = 1;
  });
}
