/**
 * Convert a plain-text reading plan into the JSON file the bot reads.
 * Run with: npx tsx scripts/generate-plan.ts [plan.txt] [reading_plan.json]
 */
import 'dotenv/config';
import { convertPlanFile } from '../src/core/plan/convertPlanFile.js';
import { BotError } from '../src/utils/errors.js';
import { createLogger } from '../src/utils/logger.js';

const DEFAULT_INPUT = 'plan.txt';
const DEFAULT_OUTPUT = 'reading_plan.json';

const logger = createLogger({ script: 'generate-plan' });

async function main(): Promise<void> {
  const inputFile = process.argv[2] ?? DEFAULT_INPUT;
  const outputFile = process.argv[3] ?? DEFAULT_OUTPUT;

  const records = await convertPlanFile(inputFile, outputFile);
  logger.info({ inputFile, outputFile, records: records.length }, 'Reading plan generated');
}

main().catch((error: unknown) => {
  logger.error({ err: error }, error instanceof BotError ? error.message : 'An error occurred');
  process.exit(1);
});
