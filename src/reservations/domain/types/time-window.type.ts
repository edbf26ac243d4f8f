/**
 * Half-open interval [startMinutes, endMinutes) on a calendar date, in minutes
 * since midnight. endMinutes may exceed 1440 when a booking runs past midnight.
 */
export interface TimeWindow {
  date: string; // YYYY-MM-DD
  startMinutes: number;
  endMinutes: number;
}
