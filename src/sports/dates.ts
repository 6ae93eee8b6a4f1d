// Spanish date expressions → YYYY-MM-DD, relative to a reference day.

const MONTHS = [
  'enero', 'febrero', 'marzo', 'abril', 'mayo', 'junio',
  'julio', 'agosto', 'septiembre', 'octubre', 'noviembre', 'diciembre',
];

const WEEKDAYS: Record<string, number> = {
  domingo: 0,
  lunes: 1,
  martes: 2,
  miercoles: 3,
  'miércoles': 3,
  jueves: 4,
  viernes: 5,
  sabado: 6,
  'sábado': 6,
};

const NUMERIC_DATE = /(?<!\d)(\d{1,2})[/-](\d{1,2})[/-](\d{4}|\d{2})(?!\d)/g;
const MONTH_DATE = new RegExp(
  `(?<!\\d)(\\d{1,2})\\s+(?:de\\s+)?(${MONTHS.join('|')})(?:\\s+(?:de\\s+)?(\\d{4}))?(?!\\p{L})`,
  'gu',
);
const WEEKDAY_DATE = /(?<!\p{L})(este|pr[oó]ximo)\s+(lunes|martes|mi[eé]rcoles|jueves|viernes|s[aá]bado|domingo)(?!\p{L})/gu;
const TODAY = /(?<!\p{L})hoy(?!\p{L})/u;
const DAY_AFTER_TOMORROW = /(?<!\p{L})pasado\s+mañana(?!\p{L})/u;
const TOMORROW = /(?<!\p{L})(?<!pasado\s)mañana(?!\p{L})/u;
const WEEKEND = /(?<!\p{L})fin\s+de\s+semana(?!\p{L})/u;

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

export function formatDay(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

function addDays(from: Date, days: number): Date {
  return new Date(from.getFullYear(), from.getMonth(), from.getDate() + days);
}

function calendarDay(year: number, month: number, day: number): Date | null {
  const date = new Date(year, month - 1, day);
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return null;
  }
  return date;
}

/** Days until the next `weekday`; 0 if today qualifies and `allowToday` is set. */
function daysUntil(from: Date, weekday: number, allowToday: boolean): number {
  const diff = (weekday - from.getDay() + 7) % 7;
  return diff === 0 && !allowToday ? 7 : diff;
}

/**
 * Pull every date a message refers to. Numeric dates are day-first
 * (15/10/2024). Duplicates are dropped, first occurrence wins.
 */
export function extractDates(text: string, now: Date): string[] {
  const query = text.toLowerCase();
  const found: string[] = [];
  const push = (date: Date | null) => {
    if (!date) return;
    const day = formatDay(date);
    if (!found.includes(day)) found.push(day);
  };

  for (const match of query.matchAll(NUMERIC_DATE)) {
    const rawYear = Number(match[3]);
    const year = match[3].length === 2 ? 2000 + rawYear : rawYear;
    push(calendarDay(year, Number(match[2]), Number(match[1])));
  }

  for (const match of query.matchAll(MONTH_DATE)) {
    const year = match[3] ? Number(match[3]) : now.getFullYear();
    push(calendarDay(year, MONTHS.indexOf(match[2]) + 1, Number(match[1])));
  }

  for (const match of query.matchAll(WEEKDAY_DATE)) {
    const weekday = WEEKDAYS[match[2]];
    if (weekday === undefined) continue;
    push(addDays(now, daysUntil(now, weekday, match[1] === 'este')));
  }

  if (TODAY.test(query)) push(addDays(now, 0));
  if (TOMORROW.test(query)) push(addDays(now, 1));
  if (DAY_AFTER_TOMORROW.test(query)) push(addDays(now, 2));
  if (WEEKEND.test(query)) push(addDays(now, daysUntil(now, 6, true)));

  return found;
}
