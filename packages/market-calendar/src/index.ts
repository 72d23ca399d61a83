/**
 * @quotebook/market-calendar
 *
 * Holiday-aware trading-day calendar for the KRX, US and COIN markets.
 *
 * @example
 * ```typescript
 * import { getDefaultCalendar } from '@quotebook/market-calendar';
 *
 * getDefaultCalendar().nextTradingDate('US', '2024-12-24'); // '2024-12-26'
 * ```
 */

export { MarketCalendar, getDefaultCalendar } from './calendar.js';

export { CalendarDataSchema } from './types.js';
export type { CalendarData, Holiday, MarketDef } from './types.js';
