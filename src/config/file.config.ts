// File overview:
// - Purpose: Optional user config file (`item-api.json`) with settings that do not belong in env vars.
// - Lookup: current working directory first, then `~/.config/`.
// - Failure policy: missing, unreadable or invalid files fall back to defaults with a warning.
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Logger } from '@nestjs/common';
import { registerAs } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import { IsBoolean, IsInt, Min, validateSync } from 'class-validator';

export const FILE_CONFIG_NAME = 'item-api.json';

export class FileConfig {
  /** Log store statistics periodically */
  @IsBoolean()
  periodic_store_log_enabled = false;

  /** Logging interval in seconds */
  @IsInt()
  @Min(1)
  periodic_store_log_interval = 60;
}

const logger = new Logger('FileConfig');

export function fileConfigPaths(cwd: string = process.cwd(), home: string = os.homedir()): string[] {
  return [path.join(cwd, FILE_CONFIG_NAME), path.join(home, '.config', FILE_CONFIG_NAME)];
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function loadFileConfig(candidates: string[] = fileConfigPaths()): FileConfig {
  const file = candidates.find((candidate) => fs.existsSync(candidate));
  if (!file) {
    return new FileConfig();
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (error) {
    logger.warn(`Ignoring unreadable config file ${file}: ${error instanceof Error ? error.message : String(error)}`);
    return new FileConfig();
  }

  if (!isPlainObject(parsed)) {
    logger.warn(`Ignoring config file ${file}: expected a JSON object`);
    return new FileConfig();
  }

  const config = plainToInstance(FileConfig, parsed);
  const errors = validateSync(config);
  if (errors.length > 0) {
    logger.warn(`Ignoring invalid config file ${file}: ${errors.map((e) => e.property).join(', ')}`);
    return new FileConfig();
  }

  logger.log(`Found config file: ${file}`);
  return config;
}

export const fileConfig = registerAs('file', () => loadFileConfig());
