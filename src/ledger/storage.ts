import fs from 'fs';
import path from 'path';
import { BacktestScore, DecisionRecord, LedgerCheckpoint, Position, TradeEvent } from '../core/types';
import { appendJSONLine, readJSONFile, readJSONLines, writeJSONFile } from '../core/utils';

export interface DecisionScoreEntry {
  id: string;
  score: BacktestScore;
}

/** Persistence boundary. Each call is atomic for the single record it touches. */
export interface PersistenceStore {
  loadPosition(symbol: string): Position | undefined;
  savePosition(position: Position): void;
  listPositions(): Position[];
  appendTrade(event: TradeEvent): void;
  /** Trades of one symbol in append order. */
  readTrades(symbol: string): TradeEvent[];
  loadCheckpoints(symbol: string): LedgerCheckpoint[];
  saveCheckpoints(symbol: string, checkpoints: LedgerCheckpoint[]): void;
  appendDecision(record: DecisionRecord): void;
  readDecisions(): DecisionRecord[];
  appendDecisionScore(entry: DecisionScoreEntry): void;
  readDecisionScores(): DecisionScoreEntry[];
}

type PositionFile = Record<string, Position>;
type CheckpointFile = Record<string, LedgerCheckpoint[]>;

/**
 * JSON files under one data directory: positions.json and checkpoints.json are rewritten whole
 * (write-then-rename); trades.jsonl, decisions.jsonl and decision_scores.jsonl are append-only.
 */
export class FileStore implements PersistenceStore {
  readonly dataDir: string;

  constructor(dataDir: string) {
    this.dataDir = path.resolve(dataDir);
  }

  private file(name: string) {
    return path.join(this.dataDir, name);
  }

  private readMap<T>(name: string): Record<string, T> {
    const file = this.file(name);
    if (!fs.existsSync(file)) return {};
    return readJSONFile<Record<string, T>>(file);
  }

  loadPosition(symbol: string): Position | undefined {
    return this.readMap<Position>('positions.json')[symbol];
  }

  savePosition(position: Position): void {
    const all: PositionFile = this.readMap<Position>('positions.json');
    all[position.symbol] = position;
    writeJSONFile(this.file('positions.json'), all);
  }

  listPositions(): Position[] {
    return Object.values(this.readMap<Position>('positions.json'));
  }

  appendTrade(event: TradeEvent): void {
    appendJSONLine(this.file('trades.jsonl'), event);
  }

  readTrades(symbol: string): TradeEvent[] {
    return readJSONLines<TradeEvent>(this.file('trades.jsonl')).filter((e) => e.symbol === symbol);
  }

  loadCheckpoints(symbol: string): LedgerCheckpoint[] {
    return this.readMap<LedgerCheckpoint[]>('checkpoints.json')[symbol] ?? [];
  }

  saveCheckpoints(symbol: string, checkpoints: LedgerCheckpoint[]): void {
    const all: CheckpointFile = this.readMap<LedgerCheckpoint[]>('checkpoints.json');
    all[symbol] = checkpoints;
    writeJSONFile(this.file('checkpoints.json'), all);
  }

  appendDecision(record: DecisionRecord): void {
    appendJSONLine(this.file('decisions.jsonl'), record);
  }

  readDecisions(): DecisionRecord[] {
    return readJSONLines<DecisionRecord>(this.file('decisions.jsonl'));
  }

  appendDecisionScore(entry: DecisionScoreEntry): void {
    appendJSONLine(this.file('decision_scores.jsonl'), entry);
  }

  readDecisionScores(): DecisionScoreEntry[] {
    return readJSONLines<DecisionScoreEntry>(this.file('decision_scores.jsonl'));
  }
}

const clone = <T>(value: T): T => structuredClone(value);

/** Same contract, kept in memory; used by tests and dry runs. */
export class MemoryStore implements PersistenceStore {
  private positions = new Map<string, Position>();
  private trades: TradeEvent[] = [];
  private checkpoints = new Map<string, LedgerCheckpoint[]>();
  private decisions: DecisionRecord[] = [];
  private scores: DecisionScoreEntry[] = [];

  loadPosition(symbol: string): Position | undefined {
    const found = this.positions.get(symbol);
    return found ? clone(found) : undefined;
  }

  savePosition(position: Position): void {
    this.positions.set(position.symbol, clone(position));
  }

  listPositions(): Position[] {
    return Array.from(this.positions.values()).map(clone);
  }

  appendTrade(event: TradeEvent): void {
    this.trades.push(clone(event));
  }

  readTrades(symbol: string): TradeEvent[] {
    return this.trades.filter((e) => e.symbol === symbol).map(clone);
  }

  loadCheckpoints(symbol: string): LedgerCheckpoint[] {
    return clone(this.checkpoints.get(symbol) ?? []);
  }

  saveCheckpoints(symbol: string, checkpoints: LedgerCheckpoint[]): void {
    this.checkpoints.set(symbol, clone(checkpoints));
  }

  appendDecision(record: DecisionRecord): void {
    this.decisions.push(clone(record));
  }

  readDecisions(): DecisionRecord[] {
    return this.decisions.map(clone);
  }

  appendDecisionScore(entry: DecisionScoreEntry): void {
    this.scores.push(clone(entry));
  }

  readDecisionScores(): DecisionScoreEntry[] {
    return this.scores.map(clone);
  }
}
