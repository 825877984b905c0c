import { readFileSync, writeFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import type { OutputKind } from '../types.ts';
import { ConversionError, errorMessage } from '../errors.ts';
import { isOutputKind, OUTPUT_KINDS } from '../formats.ts';
import { MAX_TAB_SIZE } from '../convert.ts';

export interface ProjectConfig {
  tabSize?: number;
  aliases?: Record<string, OutputKind>;
}

export const CONFIG_FILENAME = 'bin2const.json';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(filePath: string, message: string): ConversionError {
  return new ConversionError('INVALID_CONFIG', `${filePath}: ${message}`);
}

export function loadProjectConfig(projectDir: string): ProjectConfig {
  const filePath = join(projectDir, CONFIG_FILENAME);
  if (!existsSync(filePath)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConversionError('INVALID_CONFIG', `Failed to parse ${filePath}: ${errorMessage(err)}`, { cause: err });
  }

  return validateConfig(raw, filePath);
}

export function validateConfig(raw: unknown, filePath: string): ProjectConfig {
  if (!isPlainObject(raw)) {
    throw invalid(filePath, 'config must be a JSON object');
  }

  const config: ProjectConfig = {};

  const knownKeys = new Set(['tabSize', 'aliases']);
  for (const key of Object.keys(raw)) {
    if (!knownKeys.has(key)) {
      console.warn(`Warning: unknown key "${key}" in ${filePath}`);
    }
  }

  const tabSize = raw['tabSize'];
  if (tabSize !== undefined) {
    if (typeof tabSize !== 'number' || !Number.isInteger(tabSize) || tabSize < 0 || tabSize > MAX_TAB_SIZE) {
      throw invalid(filePath, `"tabSize" must be an integer from 0 to ${MAX_TAB_SIZE}`);
    }
    config.tabSize = tabSize;
  }

  const aliases = raw['aliases'];
  if (aliases !== undefined) {
    if (!isPlainObject(aliases)) {
      throw invalid(filePath, '"aliases" must be an object');
    }
    config.aliases = {};
    for (const [alias, kind] of Object.entries(aliases)) {
      if (!isOutputKind(kind)) {
        throw invalid(filePath, `"aliases.${alias}" must be one of ${OUTPUT_KINDS.join(', ')}`);
      }
      config.aliases[alias] = kind;
    }
  }

  return config;
}

export function writeProjectConfig(projectDir: string, config: ProjectConfig): void {
  const filePath = join(projectDir, CONFIG_FILENAME);
  writeFileSync(filePath, JSON.stringify(config, null, 2) + '\n');
}
