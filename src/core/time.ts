export const formatISODate = (date: Date): string => date.toISOString().slice(0, 10);

export interface ZonedParts {
  date: string; // YYYY-MM-DD in the zone
  time: string; // HH:mm in the zone
  minuteOfDay: number;
}

// sv-SE renders as "YYYY-MM-DD HH:mm:ss", which is easy to slice.
export const zonedParts = (instant: Date, tz: string): ZonedParts => {
  const local = instant.toLocaleString('sv-SE', { timeZone: tz, hourCycle: 'h23' });
  const [date, clock] = local.split(' ');
  const [hh, mm] = clock.split(':').map((v) => Number(v));
  return {
    date,
    time: `${String(hh).padStart(2, '0')}:${String(mm).padStart(2, '0')}`,
    minuteOfDay: hh * 60 + mm
  };
};

export const parseISODate = (isoDate: string): Date => {
  const parsed = new Date(`${isoDate}T00:00:00Z`);
  if (Number.isNaN(parsed.getTime())) {
    throw new Error(`Invalid date: ${isoDate}`);
  }
  return parsed;
};

export const addDays = (isoDate: string, days: number): string => {
  const d = parseISODate(isoDate);
  d.setUTCDate(d.getUTCDate() + days);
  return formatISODate(d);
};

export const isWeekend = (isoDate: string): boolean => {
  const day = parseISODate(isoDate).getUTCDay();
  return day === 0 || day === 6;
};

export const clockToMinutes = (clock: string): number => {
  const [hh, mm] = clock.split(':').map((v) => Number(v));
  return hh * 60 + mm;
};

export const parseTimestamp = (value: string): number => {
  const ts = new Date(value).getTime();
  if (Number.isNaN(ts)) {
    throw new Error(`Invalid timestamp: ${value}`);
  }
  return ts;
};
