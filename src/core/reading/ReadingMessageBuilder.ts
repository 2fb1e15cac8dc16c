import type { DayRecord } from './types.js';
import { NO_SECOND_READING } from './types.js';
import { ReadingFormatError } from '../../utils/errors.js';
import { formatMonthDay } from '../../utils/dates.js';

export function findReadingForDay(records: readonly DayRecord[], day: number): DayRecord | null {
  return records.find((record) => record.day === day) ?? null;
}

export function formatDailyMessage(record: DayRecord, date: Date, timezone: string): string {
  if (!record.poem) {
    throw new ReadingFormatError(`Day ${record.day} has no poem reading`);
  }

  const message = [
    `# Bible in a Year Day ${record.day} (${formatMonthDay(date, timezone)}) ${record.period}`,
    '',
    '## Readings',
    '',
    '### First Reading',
    `${record.first_reading.book} Chapter(s) ${record.first_reading.chapters}`,
  ];

  if (record.second_reading !== NO_SECOND_READING) {
    // Appended as the stored value, not as "Book Chapter(s) n"
    message.push('', '### Second Reading', JSON.stringify(record.second_reading));
  }

  message.push('', '### Poem', `${record.poem.book} ${record.poem.chapters}`);

  return message.join('\n');
}
