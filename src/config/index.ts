import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError, isMissingFileError } from '../utils/errors.js';

export const DEFAULT_CONFIG_PATH = 'config.json';

function isValidTimezone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

const configFileSchema = z
  .object({
    // Telegram
    token: z.string().min(1),
    channel_id: z.number().int(),

    // Schedule
    timezone: z.string().min(1).refine(isValidTimezone, { message: 'Unknown IANA timezone' }),

    // Reading plan
    json_file_path: z.string().min(1),
  })
  .transform((file) => ({
    token: file.token,
    channelId: file.channel_id,
    timezone: file.timezone,
    jsonFilePath: file.json_file_path,
  }));

export type BotConfig = Readonly<z.output<typeof configFileSchema>>;

/**
 * Parse an already-decoded config object. Missing keys are reported together,
 * before any other validation issue.
 */
export function parseBotConfig(raw: unknown): BotConfig {
  const result = configFileSchema.safeParse(raw);
  if (result.success) {
    return Object.freeze(result.data);
  }

  const missing = result.error.issues
    .filter(
      (issue) => issue.code === z.ZodIssueCode.invalid_type && issue.received === z.ZodParsedType.undefined
    )
    .map((issue) => issue.path.join('.'));
  if (missing.length > 0) {
    throw new ConfigError(`Missing required field in config: ${missing.join(', ')}`, { cause: result.error });
  }

  const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
  throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`, { cause: result.error });
}

export async function loadBotConfig(configPath: string = DEFAULT_CONFIG_PATH): Promise<BotConfig> {
  let contents: string;
  try {
    contents = await readFile(configPath, 'utf8');
  } catch (error) {
    if (isMissingFileError(error)) {
      throw new ConfigError(`Config file not found at ${configPath}`, { cause: error });
    }
    throw new ConfigError(`Failed to read config file: ${configPath}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (error) {
    throw new ConfigError(`Invalid JSON format in config file: ${configPath}`, { cause: error });
  }

  return parseBotConfig(raw);
}
