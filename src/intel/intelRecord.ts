import { z } from 'zod';
import { IntelRecord, IntelStatus } from '../core/types';
import { createLogger } from '../core/logger';
import { parseTimestamp } from '../core/time';
import { hashString } from '../core/utils';

const log = createLogger('intel');

export const MANUAL_SOURCE = 'UserManual';

const statusSchema = z.enum(['verified', 'false_info', 'pending']);

const rawEntrySchema = z.object({
  kind: z.enum(['claim', 'news', 'note']).optional(),
  id: z.string().optional(),
  title: z.string().optional(),
  content: z.string().default(''),
  timestamp: z.string().optional(),
  date: z.string().optional(),
  status: statusSchema.optional(),
  source: z.string().optional()
});

type RawEntry = z.infer<typeof rawEntrySchema>;

export interface NormalizeOptions {
  now?: Date;
  /** Offset applied to naive `YYYY-MM-DD HH:mm` stamps, which are exchange-local. */
  utcOffset?: string;
}

const NAIVE_STAMP = /(\d{4}-\d{2}-\d{2})\)?[ T]*(\d{2}:\d{2})?/;

const normalizeStamp = (value: string | undefined, options: Required<NormalizeOptions>): string | null => {
  if (!value) return options.now.toISOString();
  if (/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})$/.test(value)) {
    return value;
  }
  const match = NAIVE_STAMP.exec(value);
  if (!match) return null;
  return `${match[1]}T${match[2] ?? '00:00'}:00${options.utcOffset}`;
};

const stableId = (prefix: string, ...parts: string[]) => `${prefix}-${hashString(parts.join('|')).toString(16)}`;

const toRecord = (entry: RawEntry, options: Required<NormalizeOptions>): IntelRecord | null => {
  const stamped = entry.timestamp ?? entry.date;
  const timestamp = normalizeStamp(stamped, options);
  if (!timestamp) return null;
  // an undated entry is stamped with the ingest time, which stays out of its id
  const idStamp = stamped ? timestamp : '';
  const content = entry.content.trim();
  const kind = entry.kind ?? (entry.title ? 'news' : 'claim');

  if (kind === 'news') {
    const title = (entry.title ?? '').trim();
    if (!title) return null;
    const source = entry.source ?? 'unknown';
    return { kind, id: entry.id ?? stableId('news', title, idStamp), timestamp, title, content, source };
  }
  if (!content) return null;
  if (kind === 'note') {
    return { kind, id: entry.id ?? stableId('note', content, idStamp), timestamp, content };
  }
  const source = entry.source ?? 'unknown';
  // operator input is trusted as entered
  const status: IntelStatus = entry.status ?? (source === MANUAL_SOURCE ? 'verified' : 'pending');
  return { kind, id: entry.id ?? stableId('claim', content, idStamp), timestamp, content, status, source };
};

const collectEntries = (raw: unknown): unknown[] => {
  if (raw === null || raw === undefined) return [];
  if (Array.isArray(raw)) return raw;
  if (typeof raw === 'object') {
    const listKeys = ['claims', 'news', 'notes', 'items'];
    const lists = listKeys.flatMap((key) => {
      const value: unknown = Reflect.get(raw, key);
      return Array.isArray(value) ? value : [];
    });
    const hasListKey = listKeys.some((key) => key in raw);
    return hasListKey ? lists : [raw];
  }
  return [raw];
};

/**
 * Accepts a single entry, a list, or a `{ claims, news, notes }` map and returns canonical records.
 * Bare strings become operator notes. Entries that cannot be read are dropped and counted in the log.
 */
export const normalizeIntel = (raw: unknown, options: NormalizeOptions = {}): IntelRecord[] => {
  const resolved: Required<NormalizeOptions> = {
    now: options.now ?? new Date(),
    utcOffset: options.utcOffset ?? '+08:00'
  };
  const records: IntelRecord[] = [];
  let dropped = 0;
  for (const entry of collectEntries(raw)) {
    const parsed = rawEntrySchema.safeParse(typeof entry === 'string' ? { kind: 'note', content: entry } : entry);
    const record = parsed.success ? toRecord(parsed.data, resolved) : null;
    if (record) {
      records.push(record);
    } else {
      dropped += 1;
    }
  }
  if (dropped > 0) {
    log.warn('Dropped unreadable intel entries', { dropped, kept: records.length });
  }
  return records;
};

export interface FormatIntelOptions {
  now?: Date;
  maxAgeHours?: number;
}

const displayStamp = (timestamp: string) => timestamp.slice(0, 16).replace('T', ' ');

const lineFor = (record: IntelRecord) => {
  const body = record.kind === 'news' ? `${record.title}${record.content ? `: ${record.content}` : ''}` : record.content;
  return `- [${displayStamp(record.timestamp)}] ${body}`;
};

export const INTEL_SECTION_HEADINGS = {
  manual: '[Critical: operator input, highest priority]',
  verified: '[Verified by the operator: treat as fact]',
  falseInfo: '[Marked false by the operator: ignore]',
  pending: '[Unverified leads: weigh against other evidence]'
} as const;

/** Newest first within each section; sections in trust order. Empty string when nothing qualifies. */
export const formatIntelForPrompt = (records: IntelRecord[], options: FormatIntelOptions = {}): string => {
  const now = (options.now ?? new Date()).getTime();
  const cutoff = options.maxAgeHours ? now - options.maxAgeHours * 3600 * 1000 : Number.NEGATIVE_INFINITY;
  const recent = records
    .map((record) => ({ record, ts: parseTimestamp(record.timestamp) }))
    .filter((entry) => entry.ts >= cutoff)
    .sort((a, b) => b.ts - a.ts)
    .map((entry) => entry.record);

  const manual: string[] = [];
  const verified: string[] = [];
  const falseInfo: string[] = [];
  const pending: string[] = [];
  for (const record of recent) {
    const line = lineFor(record);
    if (record.kind === 'note' || (record.kind === 'claim' && record.source === MANUAL_SOURCE)) {
      manual.push(line);
    } else if (record.kind === 'claim' && record.status === 'verified') {
      verified.push(line);
    } else if (record.kind === 'claim' && record.status === 'false_info') {
      falseInfo.push(line);
    } else {
      pending.push(line);
    }
  }

  const sections: string[] = [];
  if (manual.length) sections.push(`${INTEL_SECTION_HEADINGS.manual}\n${manual.join('\n')}`);
  if (verified.length) sections.push(`${INTEL_SECTION_HEADINGS.verified}\n${verified.join('\n')}`);
  if (falseInfo.length) sections.push(`${INTEL_SECTION_HEADINGS.falseInfo}\n${falseInfo.join('\n')}`);
  if (pending.length) sections.push(`${INTEL_SECTION_HEADINGS.pending}\n${pending.join('\n')}`);
  return sections.join('\n\n');
};
