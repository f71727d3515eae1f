import * as fs from 'fs';
import * as yaml from 'yaml';
import { ZodError } from 'zod';
import { GameConfigError } from './errors.js';
import { logger } from './logger.js';
import { GameConfigSchema, type GameConfig } from './types.js';

function formatIssues(error: ZodError): string[] {
  return error.issues.map(issue => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message));
}

/** Validates a raw config object; every problem is reported at once. */
export function parseGameConfig(raw: unknown): GameConfig {
  const parsed = GameConfigSchema.safeParse(raw);
  if (!parsed.success) throw new GameConfigError(formatIssues(parsed.error));
  return parsed.data;
}

/** Applies CLI overrides on top of a file config and re-validates the result. */
export function withOverrides(config: GameConfig, overrides: Partial<GameConfig>): GameConfig {
  return parseGameConfig({ ...config, ...overrides });
}

export function loadConfig(configPath: string): GameConfig {
  logger.log({ type: 'SYSTEM', content: `Loading configuration from ${configPath}` });

  let raw: unknown;
  try {
    raw = yaml.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.log({ type: 'ERROR', content: `Failed to read config: ${message}` });
    throw new GameConfigError([`${configPath}: ${message}`]);
  }

  try {
    const config = parseGameConfig(raw);
    logger.log({ type: 'SYSTEM', content: 'Configuration loaded and validated successfully.' });
    return config;
  } catch (error) {
    if (error instanceof GameConfigError) {
      logger.log({ type: 'ERROR', content: error.message, metadata: { issues: error.issues } });
    }
    throw error;
  }
}
