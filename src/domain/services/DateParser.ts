import dayjs from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat.js';

dayjs.extend(customParseFormat);

// Tried in order, first strict match wins.
export const SUPPORTED_DATE_FORMATS = [
  'YYYY-MM-DD HH:mm:ss', // 2025-09-27 22:17:26
  'DD/MM/YYYY HH:mm', // 28/09/2025 22:17
  'YYYY-MM-DD HH:mm', // 2025-09-27 22:17
  'DD.MM.YYYY HH:mm:ss', // 28.09.2025 22:17:26
  'DD-MM-YYYY HH:mm:ss', // 28-09-2025 22:17:26
] as const;

// Lone digits become two-digit fields, so `5/1/2025 9:05` reads as `05/01/2025 09:05`.
const padSingleDigitFields = (text: string): string =>
  text.replace(/(^|\D)(\d)(?=\D|$)/g, (_match, lead: string, digit: string) => `${lead}0${digit}`);

export const parseDate = (value: unknown): Date | null => {
  if (typeof value !== 'string') {
    return null;
  }

  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }

  const padded = padSingleDigitFields(trimmed);
  for (const format of SUPPORTED_DATE_FORMATS) {
    const parsed = dayjs(padded, format, true);
    if (parsed.isValid()) {
      return parsed.toDate();
    }
  }

  return null;
};
