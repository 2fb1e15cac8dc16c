export class BotError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'BotError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class AdapterError extends BotError {
  constructor(adapter: string, message: string, options?: ErrorOptions) {
    super(message, `ADAPTER_${adapter.toUpperCase()}`, options);
    this.name = 'AdapterError';
  }
}

export class TelegramError extends AdapterError {
  constructor(message: string, options?: ErrorOptions) {
    super('TELEGRAM', message, options);
    this.name = 'TelegramError';
  }
}

export class ConfigError extends BotError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}

export class ReadingPlanError extends BotError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'READING_PLAN_ERROR', options);
    this.name = 'ReadingPlanError';
  }
}

/** A single plan line that could not be turned into a day record. */
export class PlanParseError extends BotError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'PLAN_PARSE_ERROR', options);
    this.name = 'PlanParseError';
  }
}

export class ReadingFormatError extends BotError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'READING_FORMAT_ERROR', options);
    this.name = 'ReadingFormatError';
  }
}

export function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
