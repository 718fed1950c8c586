import { describe, it } from 'node:test';
import assert from 'node:assert';
import { formatMarketTimestamp, getMarketStatus, NSE_HOURS } from '../src/services/marketStatus.js';

const at = (iso: string) => getMarketStatus(new Date(iso)).status;

describe('getMarketStatus', () => {
  it('is open during weekday session hours', () => {
    assert.deepStrictEqual(getMarketStatus(new Date('2026-10-19T05:00:00Z')), { status: 'OPEN', color: '#28a745' });
  });

  it('includes both ends of the session', () => {
    assert.strictEqual(at('2026-10-19T03:45:00Z'), 'OPEN');   // 09:15:00 IST
    assert.strictEqual(at('2026-10-19T10:00:00Z'), 'OPEN');   // 15:30:00 IST
  });

  it('is closed outside the session', () => {
    assert.strictEqual(at('2026-10-19T03:44:59Z'), 'CLOSED');
    assert.strictEqual(at('2026-10-19T10:00:01Z'), 'CLOSED');
    assert.deepStrictEqual(getMarketStatus(new Date('2026-10-19T18:00:00Z')), { status: 'CLOSED', color: '#dc3545' });
  });

  it('is closed at weekends', () => {
    assert.strictEqual(at('2026-10-18T05:00:00Z'), 'CLOSED');  // Sunday
    assert.strictEqual(at('2026-10-24T05:00:00Z'), 'CLOSED');  // Saturday
  });

  it('uses the configured zone and hours', () => {
    const hours = { timeZone: 'UTC', zoneLabel: 'UTC', openMinutes: 14 * 60, closeMinutes: 21 * 60 };
    assert.strictEqual(getMarketStatus(new Date('2026-10-19T05:00:00Z'), hours).status, 'CLOSED');
    assert.strictEqual(getMarketStatus(new Date('2026-10-19T15:00:00Z'), hours).status, 'OPEN');
  });
});

describe('formatMarketTimestamp', () => {
  it('prints market-local time with the zone label', () => {
    assert.strictEqual(formatMarketTimestamp(new Date('2026-10-19T05:00:00Z')), '2026-10-19 10:30:00 IST');
    assert.strictEqual(formatMarketTimestamp(new Date('2026-10-19T20:15:09Z')), '2026-10-20 01:45:09 IST');
  });

  it('omits an empty label', () => {
    assert.strictEqual(formatMarketTimestamp(new Date('2026-10-19T05:00:00Z'), { ...NSE_HOURS, zoneLabel: '' }), '2026-10-19 10:30:00');
  });
});
