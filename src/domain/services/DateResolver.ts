import dayjs, { type Dayjs } from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat.js';
import utc from 'dayjs/plugin/utc.js';

dayjs.extend(customParseFormat);
dayjs.extend(utc);

export const ISO_DATE = 'YYYY-MM-DD';

// Order matters for ambiguous values such as 03/04/2024: day-first wins.
const MESSAGE_DATE_FORMATS = [
  'DD/MM/YYYY',
  'D/M/YYYY',
  'YYYY-MM-DD',
  'MM/DD/YYYY',
  'DD-MM-YYYY',
  'D-M-YYYY',
  'YYYY/MM/DD',
  'DD.MM.YYYY',
  'DD/MM/YY',
  'DD MMM YYYY',
  'D MMM YYYY',
  'DD-MMM-YYYY',
];

// Day/month without a year; components are zero-padded before strict parsing.
const DAY_MONTH_FORMATS: Array<{ pattern: RegExp; format: string; separator: string }> = [
  { pattern: /^\d{1,2}\/\d{1,2}$/, format: 'DD/MM/YYYY', separator: '/' },
  { pattern: /^\d{1,2}-\d{1,2}$/, format: 'DD-MM-YYYY', separator: '-' },
  { pattern: /^\d{1,2}\.\d{1,2}$/, format: 'DD.MM.YYYY', separator: '.' },
  { pattern: /^\d{1,2} [A-Za-z]{3}$/, format: 'DD MMM YYYY', separator: ' ' },
];

const TIMESTAMP_FORMATS = [
  'YYYY-MM-DD HH:mm:ss',
  'YYYY-MM-DD HH:mm',
  'YYYY-MM-DD',
  'YYYY/MM/DD',
  'DD/MM/YYYY HH:mm',
  'DD/MM/YYYY',
  'MM/DD/YYYY',
];

const isoTimestamp = /^\d{4}-\d{2}-\d{2}T/;

const parseStrict = (value: string, formats: readonly string[]): Dayjs | null => {
  for (const format of formats) {
    const parsed = dayjs.utc(value, format, true);
    if (parsed.isValid()) {
      return parsed;
    }
  }

  return null;
};

export const parseTimestamp = (value: string | Date | null | undefined): Dayjs | null => {
  if (value === null || value === undefined) {
    return null;
  }

  if (value instanceof Date) {
    const parsed = dayjs.utc(value);
    return parsed.isValid() ? parsed : null;
  }

  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }

  if (isoTimestamp.test(trimmed)) {
    const parsed = dayjs.utc(trimmed);
    return parsed.isValid() ? parsed : null;
  }

  return parseStrict(trimmed, TIMESTAMP_FORMATS);
};

export interface DateResolutionContext {
  sourceTimestamp?: string | Date | null;
  fileCreatedAt?: string | Date | null;
}

export interface DateResolution {
  resolvedDate: string | null;
  occurredAt: string | null;
  warning: string | null;
}

export const parseMessageDate = (raw: string, context: DateResolutionContext = {}): Dayjs | null => {
  const value = raw.trim();

  const full = parseStrict(value, MESSAGE_DATE_FORMATS);
  if (full) {
    return full;
  }

  const dayMonth = DAY_MONTH_FORMATS.find((candidate) => candidate.pattern.test(value));
  if (!dayMonth) {
    return null;
  }

  const reference = parseTimestamp(context.fileCreatedAt) ?? parseTimestamp(context.sourceTimestamp);
  if (!reference) {
    return null;
  }

  const parts = value.split(dayMonth.separator).map((part) => (/^\d+$/.test(part) ? part.padStart(2, '0') : part));

  return parseStrict([...parts, String(reference.year())].join(dayMonth.separator), [dayMonth.format]);
};

/**
 * Picks the calendar date of a transaction: the date printed in the message,
 * else the message's own timestamp, else the export file's creation time.
 */
export const resolveTransactionDate = (dateRaw: string | null, context: DateResolutionContext): DateResolution => {
  const sourceTimestamp = parseTimestamp(context.sourceTimestamp);

  if (dateRaw) {
    const parsed = parseMessageDate(dateRaw, context);

    if (parsed) {
      const resolvedDate = parsed.format(ISO_DATE);
      const occurredAt =
        sourceTimestamp && sourceTimestamp.format(ISO_DATE) === resolvedDate ? sourceTimestamp.toISOString() : resolvedDate;
      return { resolvedDate, occurredAt, warning: null };
    }
  }

  const warning = dateRaw ? `Unrecognized date format: ${dateRaw}` : null;

  if (sourceTimestamp) {
    return { resolvedDate: sourceTimestamp.format(ISO_DATE), occurredAt: sourceTimestamp.toISOString(), warning };
  }

  const fileCreatedAt = parseTimestamp(context.fileCreatedAt);
  if (fileCreatedAt) {
    const resolvedDate = fileCreatedAt.format(ISO_DATE);
    return { resolvedDate, occurredAt: resolvedDate, warning };
  }

  return { resolvedDate: null, occurredAt: null, warning };
};
