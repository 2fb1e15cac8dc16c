import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadBotConfig, parseBotConfig } from '../../config/index.js';
import { ConfigError } from '../../utils/errors.js';

const validFile = {
  token: 'test-token',
  channel_id: -1001234567890,
  timezone: 'America/Chicago',
  json_file_path: 'reading_plan.json',
};

describe('config', () => {
  describe('parseBotConfig', () => {
    it('maps file keys to camelCase fields', () => {
      expect(parseBotConfig(validFile)).toEqual({
        token: 'test-token',
        channelId: -1001234567890,
        timezone: 'America/Chicago',
        jsonFilePath: 'reading_plan.json',
      });
    });

    it('returns a frozen object', () => {
      expect(Object.isFrozen(parseBotConfig(validFile))).toBe(true);
    });

    it('names a single missing field', () => {
      const { timezone: _timezone, ...rest } = validFile;
      expect(() => parseBotConfig(rest)).toThrow('Missing required field in config: timezone');
    });

    it('names every missing field', () => {
      expect(() => parseBotConfig({ token: 'test-token' })).toThrow(
        'Missing required field in config: channel_id, timezone, json_file_path'
      );
    });

    it('rejects a non-integer channel id', () => {
      expect(() => parseBotConfig({ ...validFile, channel_id: '123' })).toThrow(
        'Configuration validation failed:\nchannel_id: Expected number, received string'
      );
    });

    it('rejects an unknown timezone', () => {
      expect(() => parseBotConfig({ ...validFile, timezone: 'Mars/Olympus' })).toThrow(
        'Configuration validation failed:\ntimezone: Unknown IANA timezone'
      );
    });
  });

  describe('loadBotConfig', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'bot-config-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('loads a valid file', async () => {
      const configPath = join(dir, 'config.json');
      await writeFile(configPath, JSON.stringify(validFile), 'utf8');
      const config = await loadBotConfig(configPath);
      expect(config.channelId).toBe(-1001234567890);
    });

    it('reports a missing file', async () => {
      const configPath = join(dir, 'config.json');
      await expect(loadBotConfig(configPath)).rejects.toThrow(`Config file not found at ${configPath}`);
    });

    it('reports invalid JSON with its own message', async () => {
      const configPath = join(dir, 'config.json');
      await writeFile(configPath, '{ "token": ', 'utf8');
      const error = await loadBotConfig(configPath).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toHaveProperty('message', `Invalid JSON format in config file: ${configPath}`);
    });
  });
});
