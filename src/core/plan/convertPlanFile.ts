import { readFile } from 'node:fs/promises';
import type { DayRecord } from '../reading/types.js';
import { JsonReadingPlanStore } from '../../persistence/JsonReadingPlanStore.js';
import { ReadingPlanError, isMissingFileError } from '../../utils/errors.js';
import { parsePlanText } from './planTextParser.js';

/** Parse the plain-text plan at `inputFile` and write it as BibleData to `outputFile`. */
export async function convertPlanFile(inputFile: string, outputFile: string): Promise<DayRecord[]> {
  let text: string;
  try {
    text = await readFile(inputFile, 'utf8');
  } catch (error) {
    if (isMissingFileError(error)) {
      throw new ReadingPlanError(`Could not find input file: ${inputFile}`, { cause: error });
    }
    throw new ReadingPlanError(`Failed to read input file: ${inputFile}`, { cause: error });
  }

  const records = parsePlanText(text);
  await new JsonReadingPlanStore(outputFile).save(records);
  return records;
}
