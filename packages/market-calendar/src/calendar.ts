/**
 * Trading-day calendar per market code.
 *
 * Built over pre-packaged holiday data: a day trades unless it
 * falls on one of the market's weekend days or is listed as a holiday.
 */

import { addDays, dayOfWeek, isIsoDate } from '@quotebook/contracts';
import type { IsoDate } from '@quotebook/contracts';
import holidayData from './data/market-holidays.json' with { type: 'json' };
import { CalendarDataSchema } from './types.js';
import type { CalendarData } from './types.js';

/**
 * Upper bound on days scanned when looking for the next trading day.
 * No market in the data closes for this long.
 */
const MAX_SCAN_DAYS = 31;

interface MarketIndex {
  weekendDays: ReadonlySet<number>;
  holidays: ReadonlySet<IsoDate>;
}

/**
 * Holiday-aware calendar over a set of markets.
 *
 * @example
 * ```typescript
 * const calendar = new MarketCalendar(data);
 * calendar.nextTradingDate('KRX', '2024-02-08'); // '2024-02-13' (Seollal)
 * ```
 */
export class MarketCalendar {
  private readonly markets = new Map<string, MarketIndex>();

  constructor(data: CalendarData) {
    for (const [code, def] of Object.entries(data.markets)) {
      this.markets.set(code, {
        weekendDays: new Set(def.weekendDays),
        holidays: new Set(def.holidays.map((holiday) => holiday.date)),
      });
    }
  }

  /**
   * Market codes in the calendar data
   */
  marketCodes(): string[] {
    return [...this.markets.keys()];
  }

  hasMarket(market: string): boolean {
    return this.markets.has(market);
  }

  isTradingDay(market: string, date: IsoDate): boolean {
    const index = this.market(market);
    return !index.weekendDays.has(dayOfWeek(date)) && !index.holidays.has(date);
  }

  /**
   * First trading day strictly after `date`.
   */
  nextTradingDate(market: string, date: IsoDate): IsoDate {
    if (!isIsoDate(date)) {
      throw new Error(`Invalid ISO date: ${date}`);
    }

    let candidate = date;
    for (let i = 0; i < MAX_SCAN_DAYS; i++) {
      candidate = addDays(candidate, 1);
      if (this.isTradingDay(market, candidate)) {
        return candidate;
      }
    }
    throw new Error(`No trading day for ${market} within ${MAX_SCAN_DAYS} days of ${date}`);
  }

  private market(market: string): MarketIndex {
    const index = this.markets.get(market);
    if (!index) {
      throw new Error(`Unknown market: ${market}. Available markets: ${this.marketCodes().join(', ')}`);
    }
    return index;
  }
}

let defaultCalendar: MarketCalendar | null = null;

/**
 * Calendar over the packaged holiday data, validated on first use.
 */
export function getDefaultCalendar(): MarketCalendar {
  if (!defaultCalendar) {
    defaultCalendar = new MarketCalendar(CalendarDataSchema.parse(holidayData));
  }
  return defaultCalendar;
}
