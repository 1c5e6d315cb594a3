import { format, isBefore, isValid, parse, parseISO } from 'date-fns';
import { formatInTimeZone } from 'date-fns-tz';

export type ParsedSurgeryDate =
  | { kind: 'date'; date: string } // yyyy-MM-dd
  | { kind: 'unparsed' };

const UNPARSED: ParsedSurgeryDate = { kind: 'unparsed' };

// Full and abbreviated month names, compared without accents.
const MONTHS: Record<string, number> = {
  janeiro: 1, jan: 1,
  fevereiro: 2, fev: 2,
  marco: 3, mar: 3,
  abril: 4, abr: 4,
  maio: 5, mai: 5,
  junho: 6, jun: 6,
  julho: 7, jul: 7,
  agosto: 8, ago: 8,
  setembro: 9, set: 9,
  outubro: 10, out: 10,
  novembro: 11, nov: 11,
  dezembro: 12, dez: 12,
};

const YEAR_MONTH_DAY = /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})$/;
const DAY_MONTH_YEAR = /^(\d{1,2})[/.-](\d{1,2})[/.-](\d{4}|\d{2})$/;
const MONTH_YEAR = /^(\d{1,2})[/.-](\d{4})$/;
const MONTH_NAME_YEAR = /^([a-z]+)\.?(?:\s+de\s+|\s*[/-]\s*|\s+)(\d{4}|\d{2})$/;

function expandYear(year: string): number {
  return year.length === 2 ? 2000 + Number(year) : Number(year);
}

function stripAccents(text: string): string {
  return text.normalize('NFD').replace(/[\u0300-\u036f]/g, '');
}

// date-fns rejects impossible days such as 31/02.
function toCalendarDate(year: number, month: number, day: number): ParsedSurgeryDate {
  const candidate = `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
  const parsed = parse(candidate, 'yyyy-MM-dd', new Date(2000, 0, 1));
  if (!isValid(parsed)) return UNPARSED;
  return { kind: 'date', date: format(parsed, 'yyyy-MM-dd') };
}

/**
 * Reads a surgery date typed by the user. Never throws: anything that is not
 * a recognisable date is reported as `unparsed` and kept as a free-form estimate.
 */
export function parseSurgeryDate(input: string): ParsedSurgeryDate {
  const text = stripAccents(input.trim().toLowerCase());
  if (!text) return UNPARSED;

  let match = YEAR_MONTH_DAY.exec(text);
  if (match) {
    return toCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]));
  }

  match = DAY_MONTH_YEAR.exec(text);
  if (match) {
    return toCalendarDate(expandYear(match[3]), Number(match[2]), Number(match[1]));
  }

  match = MONTH_YEAR.exec(text);
  if (match) {
    return toCalendarDate(Number(match[2]), Number(match[1]), 1);
  }

  match = MONTH_NAME_YEAR.exec(text);
  if (match) {
    const month = MONTHS[match[1]];
    if (month === undefined) return UNPARSED;
    return toCalendarDate(expandYear(match[2]), month, 1);
  }

  return UNPARSED;
}

/** Local calendar date of `now` in the given IANA time zone, as yyyy-MM-dd. */
export function localDate(now: Date, timeZone: string): string {
  return formatInTimeZone(now, timeZone, 'yyyy-MM-dd');
}

export function isBeforeToday(date: string, now: Date, timeZone: string): boolean {
  return isBefore(parseISO(date), parseISO(localDate(now, timeZone)));
}
