/** Marks a day without a second reading. Compared literally, never by absence. */
export const NO_SECOND_READING = 'none';

export interface ReadingReference {
  book: string;
  chapters: string;
  /** "all" when the plan gives a whole chapter range */
  verses: string;
}

export type SecondReading = ReadingReference | typeof NO_SECOND_READING;

/**
 * One day of a yearly plan, in the persisted JSON shape.
 * Key order here is the key order written to disk.
 */
export interface DayRecord {
  day: number;
  period: string;
  first_reading: ReadingReference;
  second_reading: SecondReading;
  poem: ReadingReference | null;
}
