import type { MarketHours } from '../config/settings.js';

export type MarketState = 'OPEN' | 'CLOSED';

export interface MarketStatus {
  status: MarketState;
  color: string;
}

export const NSE_HOURS: MarketHours = {
  timeZone: 'Asia/Kolkata',
  zoneLabel: 'IST',
  openMinutes: 9 * 60 + 15,
  closeMinutes: 15 * 60 + 30,
};

const WEEKDAYS = new Set(['Mon', 'Tue', 'Wed', 'Thu', 'Fri']);

interface LocalTime {
  year: string;
  month: string;
  day: string;
  weekday: string;
  hour: number;
  minute: number;
  second: number;
}

export function localTime(now: Date, timeZone: string): LocalTime {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    weekday: 'short',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(now);
  const get = (type: Intl.DateTimeFormatPartTypes) => parts.find(p => p.type === type)?.value ?? '';
  return {
    year: get('year'),
    month: get('month'),
    day: get('day'),
    weekday: get('weekday'),
    hour: Number(get('hour')),
    minute: Number(get('minute')),
    second: Number(get('second')),
  };
}

/** Open on weekdays between the session bounds, both ends inclusive. */
export function getMarketStatus(now: Date, hours: MarketHours = NSE_HOURS): MarketStatus {
  const t = localTime(now, hours.timeZone);
  const seconds = t.hour * 3600 + t.minute * 60 + t.second;
  const open = WEEKDAYS.has(t.weekday)
    && seconds >= hours.openMinutes * 60
    && seconds <= hours.closeMinutes * 60;
  return open ? { status: 'OPEN', color: '#28a745' } : { status: 'CLOSED', color: '#dc3545' };
}

/** "2026-10-19 10:30:00 IST" */
export function formatMarketTimestamp(now: Date, hours: MarketHours = NSE_HOURS): string {
  const t = localTime(now, hours.timeZone);
  const pad = (n: number) => String(n).padStart(2, '0');
  const stamp = `${t.year}-${t.month}-${t.day} ${pad(t.hour)}:${pad(t.minute)}:${pad(t.second)}`;
  return hours.zoneLabel ? `${stamp} ${hours.zoneLabel}` : stamp;
}
