import { DeliberationRun } from './pipeline';

/**
 * Runs of this process that are still in progress, so an operator can drive one stage at a time.
 * A run leaves the registry once it is terminal; its record lives on in the strategy log.
 */
export class RunRegistry {
  private runs = new Map<string, DeliberationRun>();

  add(run: DeliberationRun): DeliberationRun {
    this.runs.set(run.id, run);
    return run;
  }

  get(id: string): DeliberationRun | undefined {
    return this.runs.get(id);
  }

  get size(): number {
    return this.runs.size;
  }

  /** Drops the run if it has finished; returns whether it was dropped. */
  release(run: DeliberationRun): boolean {
    if (!run.isTerminal()) return false;
    return this.runs.delete(run.id);
  }
}
