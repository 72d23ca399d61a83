/**
 * Type definitions for market-calendar package
 */

import { z } from 'zod';

/**
 * Market closure record from calendar data
 */
export const HolidaySchema = z.object({
  /** Holiday date in YYYY-MM-DD format */
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  name: z.string(),
});

export const MarketDefSchema = z.object({
  description: z.string(),
  /** IANA timezone of the venue, informational */
  timezone: z.string(),
  /** Days of week (0 = Sunday) the market never trades */
  weekendDays: z.array(z.number().int().min(0).max(6)),
  holidays: z.array(HolidaySchema),
});

/**
 * Complete calendar data file
 */
export const CalendarDataSchema = z.object({
  markets: z.record(z.string(), MarketDefSchema),
});

export type Holiday = z.infer<typeof HolidaySchema>;
export type MarketDef = z.infer<typeof MarketDefSchema>;
export type CalendarData = z.infer<typeof CalendarDataSchema>;
