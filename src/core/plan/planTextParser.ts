import type { DayRecord, ReadingReference, SecondReading } from '../reading/types.js';
import { NO_SECOND_READING } from '../reading/types.js';
import { PlanParseError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

/**
 * Parse a plain-text Bible-in-a-year plan into day records.
 *
 * Lines starting with "Day" become records ("Day 12 Genesis 40 Matthew 9:1-17 Psalm 7");
 * any other non-blank line is a period header applied to the records below it.
 * Bad day lines are logged and skipped; the rest of the plan is still parsed.
 */

const logger = createLogger({ component: 'planTextParser' });

const POEM_BOOKS = new Set(['psalm', 'psalms', 'proverb', 'proverbs']);
const DAY_NUMBER = /^[+-]?\d+$/;
const MIN_DAY_TOKENS = 4;

export function parseReference(token: string): Omit<ReadingReference, 'book'> {
  if (!token.includes(':')) {
    return { chapters: token, verses: 'all' };
  }
  const parts = token.split(':');
  if (parts.length !== 2) {
    throw new PlanParseError(`Malformed reference: ${token}`);
  }
  const [chapters = '', verses = ''] = parts;
  return { chapters, verses };
}

function readingAt(tokens: string[], index: number): ReadingReference {
  const book = tokens[index];
  const reference = tokens[index + 1];
  if (book === undefined || reference === undefined) {
    throw new PlanParseError(`Missing reference after book at token ${index}`);
  }
  return { book, ...parseReference(reference) };
}

function parseDayNumber(token: string): number {
  if (!DAY_NUMBER.test(token)) {
    throw new PlanParseError(`Invalid day number: ${token}`);
  }
  return parseInt(token, 10);
}

function parseDayLine(tokens: string[], period: string): DayRecord {
  const day = parseDayNumber(tokens[1] ?? '');
  const firstReading = readingAt(tokens, 2);

  let secondReading: SecondReading = NO_SECOND_READING;
  let poem: ReadingReference | null = null;

  const next = tokens[4];
  if (next !== undefined) {
    if (POEM_BOOKS.has(next.toLowerCase())) {
      poem = readingAt(tokens, 4);
    } else {
      secondReading = readingAt(tokens, 4);
      if (tokens.length > 6) {
        poem = readingAt(tokens, 6);
      }
    }
  }

  return {
    day,
    period,
    first_reading: firstReading,
    second_reading: secondReading,
    poem,
  };
}

export function parsePlanText(text: string): DayRecord[] {
  const lines = text.split(/\r\n|\r|\n/);
  logger.info({ lineCount: lines.length }, 'Parsing reading plan');

  const records: DayRecord[] = [];
  let currentPeriod = '';

  for (const rawLine of lines) {
    const line = rawLine.trim();
    if (!line) {
      continue;
    }

    const tokens = line.split(/\s+/);
    if (tokens[0]?.toLowerCase() !== 'day') {
      currentPeriod = line;
      logger.info({ period: currentPeriod }, 'New period detected');
      continue;
    }

    if (tokens.length < MIN_DAY_TOKENS) {
      logger.warn({ line }, 'Skipping malformed line');
      continue;
    }

    try {
      const record = parseDayLine(tokens, currentPeriod);
      records.push(record);
      logger.debug({ record }, `Processed Day ${record.day}`);
    } catch (error) {
      logger.error({ err: error, line }, 'Error processing line');
    }
  }

  return records;
}

export function serializePlan(records: readonly DayRecord[]): string {
  return JSON.stringify(records, null, 4);
}
