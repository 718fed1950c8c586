import { describe, it } from 'node:test';
import assert from 'node:assert';
import fs from 'fs/promises';
import path from 'path';
import { createLogger, isLogLevel, type LogLevel } from '../src/utils/logger.js';
import { tempDir } from './fixtures.js';

function capture(level: LogLevel = 'debug', file?: string) {
  const lines: Array<{ level: LogLevel; record: Record<string, unknown> }> = [];
  const log = createLogger({ level, file, sink: (l, line) => lines.push({ level: l, record: JSON.parse(line) }) });
  return { log, lines };
}

describe('logger', () => {
  it('writes one JSON object per call with fields and message', () => {
    const { log, lines } = capture();
    log.info({ symbol: '^NSEI', rows: 3 }, 'price_history_fetched');
    assert.strictEqual(lines.length, 1);
    const { record } = lines[0];
    assert.strictEqual(record.level, 'info');
    assert.strictEqual(record.msg, 'price_history_fetched');
    assert.strictEqual(record.symbol, '^NSEI');
    assert.strictEqual(record.rows, 3);
    assert.strictEqual(typeof record.time, 'string');
  });

  it('accepts a bare event name', () => {
    const { log, lines } = capture();
    log.warn('scheduler_disabled_env');
    assert.strictEqual(lines[0].level, 'warn');
    assert.strictEqual(lines[0].record.msg, 'scheduler_disabled_env');
  });

  it('drops records below the threshold', () => {
    const { log, lines } = capture('warn');
    log.debug('a');
    log.info('b');
    log.warn('c');
    log.error('d');
    assert.deepStrictEqual(lines.map(l => l.record.msg), ['c', 'd']);
  });

  it('normalises errors passed under err', () => {
    const { log, lines } = capture();
    log.error({ err: new TypeError('boom') }, 'run_failed');
    const err = lines[0].record.err;
    assert.ok(err && typeof err === 'object');
    assert.strictEqual(Reflect.get(err, 'name'), 'TypeError');
    assert.strictEqual(Reflect.get(err, 'message'), 'boom');
  });

  it('appends to a log file, creating its directory', async () => {
    const dir = await tempDir();
    const file = path.join(dir, 'logs', 'prediction.log');
    const { log } = capture('info', file);
    log.info({ n: 1 }, 'first');
    log.info({ n: 2 }, 'second');
    const written = (await fs.readFile(file, 'utf8')).trim().split('\n').map(l => JSON.parse(l).msg);
    assert.deepStrictEqual(written, ['first', 'second']);
  });

  it('recognises level names', () => {
    assert.ok(isLogLevel('warn'));
    assert.ok(!isLogLevel('trace'));
  });
});
