/**
 * Wall-clock helpers for result rows and console output
 */

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Split a timestamp into the local date (YYYY/MM/DD) and time of day (HH:MM:SS)
 */
export function dateAndTimeOfDay(now: Date): { date: string; time: string } {
  return {
    date: `${now.getFullYear()}/${pad(now.getMonth() + 1)}/${pad(now.getDate())}`,
    time: `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}`
  };
}
