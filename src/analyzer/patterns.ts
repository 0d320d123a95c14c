import { Pattern } from './types';

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const EMAIL = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;
const URL_PATTERN = /^https?:\/\/[^\s/$.?#][^\s]*$/i;
const ISO_DATETIME =
  /^\d{4}-(0[1-9]|1[0-2])-(0[1-9]|[12]\d|3[01])([T ]([01]\d|2[0-3]):[0-5]\d(:[0-5]\d(\.\d+)?)?(Z|[+-]([01]\d|2[0-3]):?[0-5]\d)?)?$/;
const INTEGER_STRING = /^[+-]?\d+$/;

/** Checked in order; the first match wins. */
const DETECTORS: ReadonlyArray<[Pattern, RegExp]> = [
  ['uuid', UUID],
  ['email', EMAIL],
  ['url', URL_PATTERN],
  ['datetime', ISO_DATETIME],
  ['integer_string', INTEGER_STRING],
];

export const detect = (value: unknown): Pattern | null => {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  if (!trimmed) return null;
  for (const [pattern, regex] of DETECTORS) {
    if (regex.test(trimmed)) return pattern;
  }
  return null;
};
