export const formatISODate = (date: Date): string => date.toISOString().slice(0, 10);

export const parseAsOfDateTime = (asOf?: string): { asOf: string; runId: string } => {
  let parsed: Date;
  if (!asOf) {
    parsed = new Date();
  } else if (asOf.includes('T')) {
    parsed = new Date(asOf);
  } else {
    parsed = new Date(`${asOf}T23:59:00Z`);
  }
  if (Number.isNaN(parsed.getTime())) {
    throw new Error(`Invalid asOf datetime: ${asOf}`);
  }
  // ISO up to minutes; runId uses dash in place of colon for path safety.
  const isoMinute = parsed.toISOString().slice(0, 16);
  const runId = isoMinute.replace(/:/g, '-');
  return { asOf: isoMinute, runId };
};

const tzDate = (date: Date, tz: string): Date => {
  const iso = date.toLocaleString('sv-SE', { timeZone: tz }).replace(' ', 'T');
  return new Date(`${iso}Z`);
};

const weekdayToIndex = (day: string): number => {
  const map: Record<string, number> = {
    SUNDAY: 0,
    MONDAY: 1,
    TUESDAY: 2,
    WEDNESDAY: 3,
    THURSDAY: 4,
    FRIDAY: 5,
    SATURDAY: 6
  };
  return map[day.toUpperCase()] ?? 0;
};

export const isRebalanceDay = (now: Date, rebalanceDay: string, tz = 'America/New_York'): boolean => {
  const local = tzDate(now, tz);
  return local.getUTCDay() === weekdayToIndex(rebalanceDay);
};

/** True within `toleranceMinutes` of 09:30 local time on the rebalance day. */
export const isMarketOpenWindow = (
  now: Date,
  rebalanceDay: string,
  tz = 'America/New_York',
  toleranceMinutes = 5
): boolean => {
  if (!isRebalanceDay(now, rebalanceDay, tz)) return false;
  const local = tzDate(now, tz);
  const minuteOfDay = local.getUTCHours() * 60 + local.getUTCMinutes();
  return Math.abs(minuteOfDay - (9 * 60 + 30)) <= toleranceMinutes;
};

// Leaderboards are published per week, keyed by the Sunday that closes it.
export const previousSunday = (now: Date): string => {
  const d = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()));
  const back = d.getUTCDay() === 0 ? 7 : d.getUTCDay();
  d.setUTCDate(d.getUTCDate() - back);
  return formatISODate(d);
};

export const minutesBetween = (a: string, b: string): number =>
  Math.abs(new Date(a).getTime() - new Date(b).getTime()) / 60000;
