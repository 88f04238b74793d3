/**
 * Pattern Registry
 *
 * Ordered, immutable mapping from field name to its matching rule.
 * A registry is built once at startup and passed explicitly to the engine.
 */

import { FILENAME_COLUMN, type FieldDefinition } from '../types';
import type { FieldSetName } from '../config';
import { InvalidRegistryError, UnknownFieldError } from '../errors';
import { logger } from '../logger';
import {
  POLICY_SCHEDULE_FIELDS,
  POLICY_SCHEDULE_BASIC_FIELDS,
} from './policy-schedule/patterns';

/**
 * Count the capture groups of a pattern.
 * An alternation with the empty pattern always matches, and the match array
 * holds one slot per group.
 */
export function countCaptureGroups(pattern: RegExp): number {
  const probe = new RegExp(`${pattern.source}|`, pattern.flags.replace(/[gy]/g, ''));
  const match = probe.exec('');
  return match ? match.length - 1 : 0;
}

/**
 * Drop the global and sticky flags, whose lastIndex state would make
 * repeated searches depend on earlier ones.
 */
function statelessCopy(pattern: RegExp): RegExp {
  if (!pattern.global && !pattern.sticky) return pattern;
  return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
}

export class PatternRegistry {
  readonly name: FieldSetName | 'custom';

  private readonly fieldNames: readonly string[];
  private readonly rules: ReadonlyMap<string, RegExp>;

  private constructor(name: FieldSetName | 'custom', definitions: readonly FieldDefinition[]) {
    this.name = name;
    this.fieldNames = Object.freeze(definitions.map((definition) => definition.name));
    this.rules = new Map(
      definitions.map((definition) => [definition.name, statelessCopy(definition.pattern)])
    );
    Object.freeze(this);
  }

  /**
   * Build a registry, validating that the definitions are non-empty, have
   * unique names other than the filename column and exactly one capture
   * group each.
   *
   * @throws InvalidRegistryError when any definition is rejected
   */
  static fromDefinitions(
    definitions: readonly FieldDefinition[],
    name: FieldSetName | 'custom' = 'custom'
  ): PatternRegistry {
    if (definitions.length === 0) {
      throw new InvalidRegistryError('A pattern registry needs at least one field');
    }

    const seen = new Set<string>();
    for (const definition of definitions) {
      if (!definition.name.trim()) {
        throw new InvalidRegistryError('Field names must not be blank');
      }
      if (definition.name === FILENAME_COLUMN) {
        throw new InvalidRegistryError(
          `${FILENAME_COLUMN} is reserved for the document filename column`
        );
      }
      if (seen.has(definition.name)) {
        throw new InvalidRegistryError(`Duplicate field name: ${definition.name}`);
      }
      seen.add(definition.name);

      const groups = countCaptureGroups(definition.pattern);
      if (groups !== 1) {
        throw new InvalidRegistryError(
          `Pattern for ${definition.name} must have exactly one capture group (found ${groups})`
        );
      }
    }

    return new PatternRegistry(name, definitions);
  }

  /**
   * Field names in extraction (and column) order.
   */
  fields(): readonly string[] {
    return this.fieldNames;
  }

  /**
   * @throws UnknownFieldError if the field is not registered
   */
  ruleFor(fieldName: string): RegExp {
    const rule = this.rules.get(fieldName);
    if (!rule) {
      throw new UnknownFieldError(fieldName);
    }
    return rule;
  }

  has(fieldName: string): boolean {
    return this.rules.has(fieldName);
  }

  get size(): number {
    return this.fieldNames.length;
  }
}

const BUILT_IN_FIELD_SETS: Record<FieldSetName, readonly FieldDefinition[]> = {
  full: POLICY_SCHEDULE_FIELDS,
  basic: POLICY_SCHEDULE_BASIC_FIELDS,
};

/**
 * Get one of the built-in policy schedule registries.
 */
export function getBuiltInRegistry(fieldSet: FieldSetName): PatternRegistry {
  const registry = PatternRegistry.fromDefinitions(BUILT_IN_FIELD_SETS[fieldSet], fieldSet);

  logger.debug('Built pattern registry', {
    field_set: fieldSet,
    field_count: registry.size,
  });

  return registry;
}
