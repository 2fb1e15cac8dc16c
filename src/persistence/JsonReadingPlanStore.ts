import { readFile, writeFile } from 'node:fs/promises';
import { z } from 'zod';
import type { DayRecord } from '../core/reading/types.js';
import { NO_SECOND_READING } from '../core/reading/types.js';
import { serializePlan } from '../core/plan/planTextParser.js';
import { ReadingPlanError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const readingReferenceSchema = z.object({
  book: z.string(),
  chapters: z.string(),
  verses: z.string(),
});

const dayRecordSchema = z.object({
  day: z.number().int(),
  period: z.string(),
  first_reading: readingReferenceSchema,
  second_reading: z.union([z.literal(NO_SECOND_READING), readingReferenceSchema]),
  poem: readingReferenceSchema.nullable(),
});

const bibleDataSchema = z.array(dayRecordSchema);

export interface ReadingPlanSource {
  load(): Promise<DayRecord[]>;
}

/**
 * Reading plan persisted as a JSON array. Every load goes back to disk so an
 * edited file is picked up on the next firing.
 */
export class JsonReadingPlanStore implements ReadingPlanSource {
  private readonly logger = createLogger({ repository: 'JsonReadingPlanStore' });

  constructor(private readonly filePath: string) {}

  async load(): Promise<DayRecord[]> {
    const logger = this.logger.child({ method: 'load', filePath: this.filePath });

    let contents: string;
    try {
      contents = await readFile(this.filePath, 'utf8');
    } catch (error) {
      logger.error({ err: error }, 'Could not read Bible readings file');
      throw new ReadingPlanError(`Could not read Bible readings file at ${this.filePath}`, { cause: error });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(contents);
    } catch (error) {
      logger.error({ err: error }, 'Invalid JSON in Bible readings file');
      throw new ReadingPlanError(`Invalid JSON format in ${this.filePath}`, { cause: error });
    }

    const result = bibleDataSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      logger.error({ issues }, 'Bible readings file does not match the day record shape');
      throw new ReadingPlanError(`Invalid reading plan in ${this.filePath}:\n${issues.join('\n')}`, {
        cause: result.error,
      });
    }

    logger.info({ records: result.data.length }, 'Successfully loaded Bible data');
    return result.data;
  }

  async save(records: readonly DayRecord[]): Promise<void> {
    await writeFile(this.filePath, serializePlan(records), 'utf8');
    this.logger.info({ filePath: this.filePath, records: records.length }, 'Saved reading plan');
  }
}
