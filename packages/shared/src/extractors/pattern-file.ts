/**
 * Custom Pattern Files
 *
 * Loads a registry from a JSON file of { fields: [{ name, pattern, flags? }] },
 * for schedules whose layout the built-in rules do not cover.
 */

import fs from 'fs';
import type { Config } from '../config';
import type { FieldDefinition, PatternFile } from '../types';
import { InvalidRegistryError } from '../errors';
import { isPatternFile, validatePatternFile } from '../schemas';
import { logger } from '../logger';
import { PatternRegistry, getBuiltInRegistry } from './registry';

/**
 * Compile the entries of a validated pattern file.
 *
 * @throws InvalidRegistryError when a pattern is not a valid regular expression
 */
export function compilePatternFile(file: PatternFile): FieldDefinition[] {
  return file.fields.map((entry) => {
    try {
      return { name: entry.name, pattern: new RegExp(entry.pattern, entry.flags ?? '') };
    } catch (error) {
      throw new InvalidRegistryError(
        `Invalid pattern for ${entry.name}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  });
}

/**
 * Parse and validate pattern file contents into a registry.
 */
export function parsePatternFile(contents: string): PatternRegistry {
  let data: unknown;
  try {
    data = JSON.parse(contents);
  } catch (error) {
    throw new InvalidRegistryError(
      `Pattern file is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  if (!isPatternFile(data)) {
    const { errors } = validatePatternFile(data);
    throw new InvalidRegistryError(`Pattern file rejected: ${(errors ?? []).join('; ')}`);
  }

  return PatternRegistry.fromDefinitions(compilePatternFile(data), 'custom');
}

export function loadRegistryFromFile(filePath: string): PatternRegistry {
  const registry = parsePatternFile(fs.readFileSync(filePath, 'utf-8'));

  logger.info('Loaded custom pattern registry', {
    file: filePath,
    fields: registry.fields(),
  });

  return registry;
}

/**
 * Select the registry for this process: the PATTERNS_FILE when set,
 * otherwise the built-in FIELD_SET.
 */
export function resolveRegistry(cfg: Pick<Config, 'fieldSet' | 'patternsFile'>): PatternRegistry {
  if (cfg.patternsFile) {
    return loadRegistryFromFile(cfg.patternsFile);
  }
  return getBuiltInRegistry(cfg.fieldSet);
}
