import { format, isValid, parse } from 'date-fns';

// Broker exports use day/month/year; ISO is accepted for JSON clients.
const INPUT_FORMATS = ['dd/MM/yyyy', 'dd-MM-yyyy', 'yyyy-MM-dd'];

const REFERENCE_DATE = new Date(2000, 0, 1);

/**
 * Parses a calendar trade date. Returns null for empty, impossible or unrecognised values
 * (e.g. 31/02/2023).
 */
export function parseTradeDate(value: string): Date | null {
  const text = value.trim();
  if (!text) {
    return null;
  }
  for (const pattern of INPUT_FORMATS) {
    const parsed = parse(text, pattern, REFERENCE_DATE);
    if (isValid(parsed)) {
      return parsed;
    }
  }
  return null;
}

/** dd/MM/yyyy, the format of the input files and the CSV reports. */
export function formatTradeDate(date: Date): string {
  return format(date, 'dd/MM/yyyy');
}

/** yyyy-MM-dd, used as the same-day grouping key. */
export function toDateKey(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}
