import 'dotenv/config';
import { Command } from 'commander';
import fs from 'fs';
import path from 'path';
import readline from 'readline/promises';
import { parseTimestamp } from '../core/time';
import { readJSONFile } from '../core/utils';
import { loadDesk } from '../desk';
import { DeliberationRun, RunSnapshot, startDeliberation } from '../deliberation/pipeline';

const program = new Command();

program
  .requiredOption('--symbol <code>', 'six-digit instrument code, e.g. 600519 or 510300.SH')
  .option('--mode <mode>', 'manual | auto', 'auto')
  .option('--asof <dateTime>', 'instant to classify the session at (ISO 8601); defaults to now')
  .option('--name <name>', 'display name, used to spot ST listings')
  .option('--intel <file>', 'JSON file with intelligence for this symbol')
  .option('--json', 'print the decision record as JSON', false);

const printStage = (snap: RunSnapshot) => {
  const last = snap.stageOutputs[snap.stageOutputs.length - 1];
  console.log(`\n== ${snap.state.toUpperCase()} ==`);
  if (last) {
    console.log(`[${last.stageName} / ${last.modelTag}]`);
    console.log(last.rawOutput);
  }
  const proposal = snap.state === 'draft' ? snap.draft : snap.state === 'refine' ? snap.refinement : undefined;
  if (proposal?.adjustments.length) {
    console.log(`Desk adjustments: ${proposal.adjustments.join('; ')}`);
  }
  if (snap.failure) {
    console.log(`Failed at ${snap.failure.stage}: ${snap.failure.reason}`);
  }
};

const driveManually = async (run: DeliberationRun): Promise<void> => {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    while (!run.isTerminal()) {
      const next = run.snapshot().nextStage;
      const answer = await rl.question(`Run ${next}? [y/N] `);
      if (answer.trim().toLowerCase() !== 'y') {
        run.abandon();
        console.log(`Stopped before ${next}; the partial run is logged as abandoned.`);
        return;
      }
      printStage(await run.advance());
    }
  } finally {
    rl.close();
  }
};

const run = async () => {
  const opts = program.parse(process.argv).opts();
  if (opts.mode !== 'manual' && opts.mode !== 'auto') {
    throw new Error(`--mode must be manual or auto, got ${opts.mode}`);
  }
  const now = opts.asof ? new Date(parseTimestamp(opts.asof)) : new Date();
  const intelPath = opts.intel ? path.resolve(process.cwd(), opts.intel) : undefined;
  if (intelPath && !fs.existsSync(intelPath)) {
    throw new Error(`Intel file not found: ${intelPath}`);
  }
  const intel = intelPath ? readJSONFile<unknown>(intelPath) : undefined;

  const desk = loadDesk();
  // a backdated run is stamped at its as-of instant so the backtest sees it when it was decided
  const clock = opts.asof ? () => now : undefined;
  const deliberation = await startDeliberation({ ...desk, clock }, { symbol: opts.symbol, now, name: opts.name, intel });
  const { context } = deliberation;
  console.log(
    `Deliberating ${context.symbol} (${context.promptVariant}) for ${context.session.targetDate}` +
      (context.observationOnly ? ' [observation-only: no price band]' : '')
  );

  if (opts.mode === 'manual') {
    await driveManually(deliberation);
  } else {
    await deliberation.runToEnd();
  }

  const record = deliberation.decisionRecord();
  if (!record) return;
  if (opts.json) {
    console.log(JSON.stringify(record, null, 2));
  } else {
    console.log(`\nRun ${record.id}: ${record.status}`);
    if (record.finalDecision) {
      const d = record.finalDecision;
      console.log(`Order: ${d.direction} ${d.size} @ ${d.limitPrice ?? 'n/a'} (stop ${d.stopLoss ?? 'n/a'})`);
      console.log(d.commentary);
    }
    if (record.failure) {
      const label = record.status === 'abandoned' ? 'Abandoned before' : 'Failed at';
      console.log(`${label} ${record.failure.stage}: ${record.failure.reason}`);
    }
  }
  if (record.status === 'failed') {
    process.exitCode = 1;
  }
};

if (require.main === module) {
  run().catch((err) => {
    console.error('deliberate failed', err);
    process.exitCode = 1;
  });
}
