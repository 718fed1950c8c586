import fs from 'fs/promises';
import path from 'path';
import type { Logger } from '../utils/logger.js';
import type { DashboardSnapshot } from './snapshot.js';

export const INDEX_FILE = 'index.html';
export const DATA_FILE = 'data.json';

/** Owns the published artifacts in the output directory. */
export class DashboardWriter {
  constructor(readonly outputDir: string, private readonly logger: Logger) {}

  get indexPath() {
    return path.join(this.outputDir, INDEX_FILE);
  }

  get dataPath() {
    return path.join(this.outputDir, DATA_FILE);
  }

  async write(snapshot: DashboardSnapshot, html: string): Promise<void> {
    await fs.mkdir(this.outputDir, { recursive: true });
    await fs.writeFile(this.indexPath, html, 'utf8');
    await fs.writeFile(this.dataPath, JSON.stringify(snapshot, null, 2), 'utf8');
    this.logger.info({ dir: this.outputDir, bytes: html.length }, 'dashboard_written');
  }

  /** Replaces index.html only; the last data.json stays in place. */
  async writeErrorPage(html: string): Promise<void> {
    await fs.mkdir(this.outputDir, { recursive: true });
    await fs.writeFile(this.indexPath, html, 'utf8');
    this.logger.warn({ dir: this.outputDir }, 'error_page_written');
  }

  /** Parsed data.json, or null when nothing has been published yet. */
  async readSnapshot(): Promise<unknown> {
    let raw: string;
    try {
      raw = await fs.readFile(this.dataPath, 'utf8');
    } catch (err) {
      if (isMissing(err)) return null;
      throw err;
    }
    return JSON.parse(raw);
  }
}

export function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
