const DISPLAY_TIME_REGEX = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

export function formatDisplayTime(epochSeconds: number): string {
  const iso = new Date(Math.floor(epochSeconds) * 1000).toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 19)}`;
}

export function parseDisplayTime(text: string): number {
  const match = text.trim().match(DISPLAY_TIME_REGEX);
  if (!match) {
    throw new Error(`Invalid display time: "${text}"`);
  }

  const [, year, month, day, hour, minute, second] = match.map(Number);
  const millis = Date.UTC(year, month - 1, day, hour, minute, second);
  const roundTrip = new Date(millis);
  if (roundTrip.getUTCMonth() !== month - 1 || roundTrip.getUTCDate() !== day || hour > 23 || minute > 59 || second > 59) {
    throw new Error(`Invalid display time: "${text}"`);
  }
  return millis / 1000;
}

export function nowDisplayTime(now: () => Date = () => new Date()): string {
  return formatDisplayTime(now().getTime() / 1000);
}
