/**
 * strftime-style date formats, as written in template files, mapped onto date-fns.
 */

import { format as formatDate, isValid, parse } from 'date-fns';

type Mode = 'parse' | 'format';

// Parsing accepts unpadded day/month/hour values, as strptime does.
const TOKENS: Record<string, Record<Mode, string>> = {
  d: { parse: 'd', format: 'dd' },
  m: { parse: 'M', format: 'MM' },
  Y: { parse: 'yyyy', format: 'yyyy' },
  y: { parse: 'yy', format: 'yy' },
  b: { parse: 'MMM', format: 'MMM' },
  B: { parse: 'MMMM', format: 'MMMM' },
  H: { parse: 'H', format: 'HH' },
  M: { parse: 'm', format: 'mm' },
  S: { parse: 's', format: 'ss' },
};

/**
 * Translate a strftime format into a date-fns pattern.
 * Returns null when the format uses a directive with no equivalent.
 */
export function translateDateFormat(strftime: string, mode: Mode): string | null {
  let out = '';
  for (let i = 0; i < strftime.length; i++) {
    const ch = strftime[i];
    if (ch === '%') {
      const directive = strftime[i + 1];
      i++;
      if (directive === '%') {
        out += '%';
        continue;
      }
      const token = directive === undefined ? undefined : TOKENS[directive];
      if (!token) return null;
      out += token[mode];
    } else if (ch === "'") {
      out += "''";
    } else if (/[A-Za-z]/.test(ch)) {
      out += `'${ch}'`;
    } else {
      out += ch;
    }
  }
  return out;
}

/** Reference date for formats that omit the year */
const REFERENCE_DATE = new Date(2000, 0, 1);

/**
 * Parse `value` with a strftime format. Returns null if it does not match.
 */
export function parseDateWithFormat(value: string, strftime: string): Date | null {
  const pattern = translateDateFormat(strftime, 'parse');
  if (pattern === null) return null;
  const parsed = parse(value.trim(), pattern, REFERENCE_DATE);
  return isValid(parsed) ? parsed : null;
}

export function formatDateWithFormat(date: Date, strftime: string): string {
  const pattern = translateDateFormat(strftime, 'format');
  return formatDate(date, pattern ?? 'yyyy-MM-dd');
}

export function toIsoDate(date: Date): string {
  return formatDate(date, 'yyyy-MM-dd');
}
