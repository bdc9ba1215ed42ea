import { ValidationError } from '../lib/errors.js';

export const WEEKDAYS = [
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
  'sunday',
] as const;

export type Weekday = (typeof WEEKDAYS)[number];

const ABBREVIATIONS: Record<string, Weekday> = {
  mon: 'monday',
  tue: 'tuesday',
  wed: 'wednesday',
  thu: 'thursday',
  thur: 'thursday',
  fri: 'friday',
  sat: 'saturday',
  sun: 'sunday',
};

function isWeekday(value: string): value is Weekday {
  return (WEEKDAYS as readonly string[]).includes(value);
}

export function canonicalDay(name: string): Weekday {
  const key = name.trim().toLowerCase();
  const canonical = ABBREVIATIONS[key] ?? key;
  if (!isWeekday(canonical)) {
    throw new ValidationError(`Unknown day name: ${name}`, { day: name });
  }
  return canonical;
}

/** Monday onwards; inputs longer than a week continue as `day-8`, `day-9`, ... */
export function defaultDayLabels(count: number): string[] {
  return Array.from({ length: count }, (_, index) => WEEKDAYS[index] ?? `day-${index + 1}`);
}

/** Labels for `count` daily totals, canonicalizing explicit names when given. */
export function resolveDayLabels(count: number, names?: readonly string[]): string[] {
  if (!names || names.length === 0) {
    return defaultDayLabels(count);
  }

  if (names.length !== count) {
    throw new ValidationError(
      `Number of days (${names.length}) must match number of hours (${count})`,
      { days: names.length, hours: count }
    );
  }

  const seen = new Set<Weekday>();
  return names.map((name) => {
    const day = canonicalDay(name);
    if (seen.has(day)) {
      throw new ValidationError(`Duplicate day: ${day}`, { day });
    }
    seen.add(day);
    return day;
  });
}
