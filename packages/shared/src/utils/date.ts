import { fromUnixTime, getUnixTime, subHours } from 'date-fns';

export interface AnalysisWindow {
  /** Epoch seconds, inclusive */
  readonly fromTime: number;
  /** Epoch seconds, exclusive */
  readonly toTime: number;
}

export function analysisWindow(hours: number, now: Date = new Date()): AnalysisWindow {
  return {
    fromTime: getUnixTime(subHours(now, hours)),
    toTime: getUnixTime(now),
  };
}

/**
 * Epoch seconds of the moment `hours` before `now`
 */
export function hoursBefore(hours: number, now: Date = new Date()): number {
  return getUnixTime(subHours(now, hours));
}

export function formatRunTime(epochSeconds: number): string {
  return fromUnixTime(epochSeconds).toUTCString();
}
