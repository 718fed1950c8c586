import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import type { Logger } from '../utils/logger.js';
import { isMissing } from './writer.js';

export const HISTORY_FILE = 'prediction_history.json';

const EntrySchema = z.object({
  timestamp: z.string(),
  currentPrice: z.number(),
  predictions: z.record(z.number()),
  volume: z.number(),
});

export type PredictionLogEntry = z.infer<typeof EntrySchema>;

const HistorySchema = z.array(EntrySchema);

/**
 * Append-only prediction log kept as a JSON array. Appends truncate to the
 * most recent `limit` entries.
 */
export class PredictionHistoryStore {
  constructor(
    readonly file: string,
    readonly limit: number,
    private readonly logger: Logger,
  ) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`history limit must be a positive integer, got ${limit}`);
    }
  }

  static inDir(dir: string, limit: number, logger: Logger) {
    return new PredictionHistoryStore(path.join(dir, HISTORY_FILE), limit, logger);
  }

  /** Missing or unreadable files count as an empty history. */
  async readAll(): Promise<PredictionLogEntry[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.file, 'utf8');
    } catch (err) {
      if (isMissing(err)) return [];
      throw err;
    }
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      this.logger.warn({ file: this.file, err }, 'history_unparseable');
      return [];
    }
    const parsed = HistorySchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn({ file: this.file, issues: parsed.error.issues.length }, 'history_invalid');
      return [];
    }
    return parsed.data;
  }

  async append(entry: PredictionLogEntry): Promise<PredictionLogEntry[]> {
    const next = [...(await this.readAll()), entry].slice(-this.limit);
    await fs.mkdir(path.dirname(this.file), { recursive: true });
    await fs.writeFile(this.file, JSON.stringify(next, null, 2), 'utf8');
    this.logger.debug({ entries: next.length }, 'history_appended');
    return next;
  }

  /** Newest last; `limit` keeps the tail. */
  async list(limit?: number): Promise<PredictionLogEntry[]> {
    const all = await this.readAll();
    return limit === undefined ? all : all.slice(-limit);
  }
}
