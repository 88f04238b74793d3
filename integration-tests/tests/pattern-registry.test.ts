/**
 * Pattern Registry Tests
 *
 * Tests registry validation, lookups and loading custom pattern files.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  PatternRegistry,
  getBuiltInRegistry,
  countCaptureGroups,
  parsePatternFile,
  loadRegistryFromFile,
  resolveRegistry,
  validatePatternFile,
  UnknownFieldError,
  InvalidRegistryError,
} from '@policy-extractor/shared';
import { SCHEDULE_FIELD_NAMES } from './helpers';

describe('Pattern registry', () => {
  describe('built-in registries', () => {
    it('should list the fourteen schedule fields in order', () => {
      expect(getBuiltInRegistry('full').fields()).toEqual(SCHEDULE_FIELD_NAMES);
    });

    it('should report its field set name and size', () => {
      const registry = getBuiltInRegistry('basic');

      expect(registry.name).toBe('basic');
      expect(registry.size).toBe(4);
    });

    it('should return the rule for a registered field', () => {
      const rule = getBuiltInRegistry('full').ruleFor('TASA_VENTA');

      expect(rule.exec('TASA DE VENTA DE LA PÓLIZA 2.75%')?.[1]).toBe('2.75');
    });

    it('should throw UnknownFieldError for an unregistered field', () => {
      const registry = getBuiltInRegistry('basic');

      expect(() => registry.ruleFor('K_SEPELIO')).toThrow(UnknownFieldError);
      expect(() => registry.ruleFor('K_SEPELIO')).toThrow(
        'No matching rule registered for field: K_SEPELIO'
      );
      expect(registry.has('K_SEPELIO')).toBe(false);
    });

    it('should be frozen', () => {
      expect(Object.isFrozen(getBuiltInRegistry('full'))).toBe(true);
      expect(Object.isFrozen(getBuiltInRegistry('full').fields())).toBe(true);
    });
  });

  describe('validation', () => {
    it('should count capture groups', () => {
      expect(countCaptureGroups(/A(B)(?:C)/)).toBe(1);
      expect(countCaptureGroups(/A(B)(C)/)).toBe(2);
      expect(countCaptureGroups(/\(A\)/)).toBe(0);
    });

    it('should reject an empty registry', () => {
      expect(() => PatternRegistry.fromDefinitions([])).toThrow(InvalidRegistryError);
    });

    it('should reject duplicate field names', () => {
      expect(() =>
        PatternRegistry.fromDefinitions([
          { name: 'NUM_POL', pattern: /A(B)/ },
          { name: 'NUM_POL', pattern: /C(D)/ },
        ])
      ).toThrow('Duplicate field name: NUM_POL');
    });

    it('should reject a pattern without a capture group', () => {
      expect(() => PatternRegistry.fromDefinitions([{ name: 'MON', pattern: /MONTO/ }])).toThrow(
        'Pattern for MON must have exactly one capture group (found 0)'
      );
    });

    it('should reject a pattern with two capture groups', () => {
      expect(() =>
        PatternRegistry.fromDefinitions([{ name: 'MON', pattern: /(MONTO) (\d+)/ }])
      ).toThrow('Pattern for MON must have exactly one capture group (found 2)');
    });

    it('should reserve the filename column name', () => {
      expect(() =>
        PatternRegistry.fromDefinitions([{ name: 'ARCHIVO', pattern: /REF (\w+)/ }])
      ).toThrow('ARCHIVO is reserved for the document filename column');
    });

    it('should name a registry built from definitions custom', () => {
      expect(PatternRegistry.fromDefinitions([{ name: 'A', pattern: /A(B)/ }]).name).toBe('custom');
    });
  });

  describe('pattern files', () => {
    const validFile = JSON.stringify({
      description: 'Policy number only',
      fields: [{ name: 'NUM_POL', pattern: 'POLICY NO\\.?\\s*(\\S+)', flags: 'i' }],
    });

    it('should build a custom registry from a pattern file', () => {
      const registry = parsePatternFile(validFile);

      expect(registry.name).toBe('custom');
      expect(registry.fields()).toEqual(['NUM_POL']);
      expect(registry.ruleFor('NUM_POL').exec('policy no. X-1')?.[1]).toBe('X-1');
    });

    it('should reject invalid JSON', () => {
      expect(() => parsePatternFile('{ fields: ')).toThrow(InvalidRegistryError);
    });

    it('should reject a file that does not match the schema', () => {
      const lowercaseName = JSON.stringify({ fields: [{ name: 'num_pol', pattern: 'A(B)' }] });

      expect(validatePatternFile(JSON.parse(lowercaseName)).valid).toBe(false);
      expect(() => parsePatternFile(lowercaseName)).toThrow(/^Pattern file rejected/);
    });

    it('should reject a field named after the filename column', () => {
      const reserved = { fields: [{ name: 'ARCHIVO', pattern: 'REF (\\w+)' }] };

      expect(validatePatternFile(reserved).valid).toBe(false);
      expect(() => parsePatternFile(JSON.stringify(reserved))).toThrow(/^Pattern file rejected/);
    });

    it('should reject a global flag', () => {
      const globalFlag = JSON.stringify({ fields: [{ name: 'A', pattern: 'A(B)', flags: 'g' }] });

      expect(() => parsePatternFile(globalFlag)).toThrow(InvalidRegistryError);
    });

    it('should reject a pattern that does not compile', () => {
      const broken = JSON.stringify({ fields: [{ name: 'A', pattern: 'A(B' }] });

      expect(() => parsePatternFile(broken)).toThrow(/^Invalid pattern for A:/);
    });

    it('should load the registry named by PATTERNS_FILE', () => {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'patterns-'));
      const file = path.join(dir, 'patterns.json');
      fs.writeFileSync(file, validFile);

      try {
        expect(loadRegistryFromFile(file).fields()).toEqual(['NUM_POL']);
        expect(resolveRegistry({ fieldSet: 'full', patternsFile: file }).name).toBe('custom');
      } finally {
        fs.rmSync(dir, { recursive: true, force: true });
      }
    });

    it('should fall back to the built-in field set without a pattern file', () => {
      expect(resolveRegistry({ fieldSet: 'basic', patternsFile: null }).name).toBe('basic');
    });
  });
});
