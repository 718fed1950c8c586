import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  classifyChange,
  DEFAULT_LADDER,
  formatSignedPercent,
  recommend,
  RecommendationAction,
  RecommendationEngine,
  RecommendationOutlook,
} from '../src/intelligence/recommendationEngine.js';
import { InvalidPriceError, NoDataError } from '../src/shared/errors.js';

describe('RecommendationEngine', () => {
  it('holds on a small upward move', () => {
    const rec = recommend({ RNN: 21520, LSTM: 21580, CNN: 21490 }, 21450.75);
    assert.strictEqual(rec.action, RecommendationAction.HOLD);
    assert.strictEqual(rec.outlook, RecommendationOutlook.STABLE);
    assert.strictEqual(rec.confidence, 'Medium');
    assert.strictEqual(rec.color, '#6c757d');
    assert.strictEqual(rec.reason, 'Stable trend predicted (+0.37%)');
    assert.ok(Math.abs(rec.changePct - 0.36945095) < 1e-6);
  });

  it('buys on a strong rise and sells on a strong fall', () => {
    const up = recommend({ RNN: 103, LSTM: 103, CNN: 103 }, 100);
    assert.deepStrictEqual([up.action, up.confidence, up.reason], ['BUY', 'High', 'Strong upward trend predicted (+3.00%)']);
    const down = recommend({ RNN: 100, LSTM: 100, CNN: 100 }, 110);
    assert.deepStrictEqual([down.action, down.confidence, down.reason], ['SELL', 'High', 'Strong downward trend predicted (-9.09%)']);
    assert.strictEqual(down.color, '#dc3545');
  });

  it('uses strict thresholds at every rung', () => {
    const cases: Array<[number, RecommendationAction, RecommendationOutlook]> = [
      [2.0001, RecommendationAction.BUY, RecommendationOutlook.STRONG_UP],
      [2.0, RecommendationAction.HOLD, RecommendationOutlook.MODERATE_UP],
      [0.5001, RecommendationAction.HOLD, RecommendationOutlook.MODERATE_UP],
      [0.5, RecommendationAction.HOLD, RecommendationOutlook.STABLE],
      [-0.4999, RecommendationAction.HOLD, RecommendationOutlook.STABLE],
      [-0.5, RecommendationAction.CAUTION, RecommendationOutlook.MODERATE_DOWN],
      [-2.0, RecommendationAction.CAUTION, RecommendationOutlook.MODERATE_DOWN],
      [-2.0001, RecommendationAction.SELL, RecommendationOutlook.STRONG_DOWN],
    ];
    for (const [pct, action, outlook] of cases) {
      const rung = classifyChange(pct);
      assert.deepStrictEqual([rung.action, rung.outlook], [action, outlook], `changePct ${pct}`);
    }
  });

  it('assigns exactly one rung to every change', () => {
    for (let pct = -6; pct <= 6; pct += 0.125) {
      const matching = DEFAULT_LADDER.filter((rung, i) => {
        const upper = i === 0 ? Number.POSITIVE_INFINITY : DEFAULT_LADDER[i - 1].above;
        const lower = rung.above ?? Number.NEGATIVE_INFINITY;
        return upper !== null && pct > lower && pct <= upper;
      });
      assert.strictEqual(matching.length, 1, `changePct ${pct}`);
      assert.strictEqual(classifyChange(pct), matching[0]);
    }
  });

  it('rejects invalid inputs', () => {
    assert.throws(() => recommend({ RNN: 100 }, 0), InvalidPriceError);
    assert.throws(() => recommend({}, 100), NoDataError);
    assert.throws(() => recommend({ RNN: 100, CNN: -1 }, 100), (err: unknown) =>
      err instanceof InvalidPriceError && err.message === 'CNN forecast must be a positive finite number, got -1');
  });

  it('requires a catch-all final rung', () => {
    assert.throws(() => new RecommendationEngine(DEFAULT_LADDER.slice(0, 2)), /catch-all/);
  });

  it('formats signed percentages', () => {
    assert.strictEqual(formatSignedPercent(0), '+0.00%');
    assert.strictEqual(formatSignedPercent(1.005), '+1.00%');
    assert.strictEqual(formatSignedPercent(-1.234), '-1.23%');
  });
});
