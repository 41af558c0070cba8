import { parseIsoDate } from './calendar-date.js';

import type { DatasetType, TemporalFields } from './types.js';

const INTEGER_RE = /^[+-]?\d+$/;
const LEADING_DIGITS_RE = /^\d*/;

/**
 * Trims any of `chars` from both ends of `value`.
 */
const stripChars = (value: string, chars: string): string => {
  let start = 0;
  let end = value.length;

  while (start < end && chars.includes(value.charAt(start))) start++;
  while (end > start && chars.includes(value.charAt(end - 1))) end--;

  return value.slice(start, end);
};

/**
 * ICEWS-style: column 4 is the event date.
 */
const extractEventCalendar = (columns: readonly string[]): TemporalFields | null => {
  const dateToken = columns[3];
  if (dateToken === undefined) {
    return null;
  }

  const date = parseIsoDate(dateToken);
  if (date === null) {
    return null;
  }

  return { year: date.year, date };
};

/**
 * Wikidata-style: column 4 is a marker such as `occursSince`, column 5 a
 * bare year that may be blank.
 */
const extractLinkedData = (columns: readonly string[]): TemporalFields | null => {
  const marker = columns[3];
  const yearToken = columns[4]?.trim();
  if (marker === undefined || yearToken === undefined) {
    return null;
  }

  if (!INTEGER_RE.test(yearToken)) {
    return { marker };
  }

  return { marker, year: Number.parseInt(yearToken, 10) };
};

/**
 * YAGO-style: column 4 is `<marker>`, column 5 a quoted date literal.
 * The year is the first four digits of the date's leading digit run.
 */
const extractFactExtraction = (columns: readonly string[]): TemporalFields | null => {
  const rawMarker = columns[3];
  const rawDate = columns[4];
  if (rawMarker === undefined || rawDate === undefined) {
    return null;
  }

  const marker = stripChars(rawMarker, '<>"');
  const digits = LEADING_DIGITS_RE.exec(stripChars(rawDate, '"'))?.[0] ?? '';

  if (digits.length < 4) {
    return { marker };
  }

  return { marker, year: Number.parseInt(digits.slice(0, 4), 10) };
};

/**
 * Reads the temporal columns of an accepted line according to the dataset's
 * convention. Returns null when the line contributes nothing temporal,
 * which is always the case for 'generic' datasets.
 */
export const extractTemporal = (
  columns: readonly string[],
  datasetType: DatasetType
): TemporalFields | null => {
  switch (datasetType) {
    case 'event-calendar':
      return extractEventCalendar(columns);
    case 'linked-data':
      return extractLinkedData(columns);
    case 'fact-extraction':
      return extractFactExtraction(columns);
    case 'generic':
      return null;
  }
};
