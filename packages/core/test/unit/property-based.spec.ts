import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { Document } from 'yaml';

import { ValidationError, toBase, validate } from '../../src/index.js';
import {
  configTreeArbitrary,
  partialServiceArbitrary,
  serviceSchema,
  settingNameArbitrary,
} from '../fixtures/property-based.js';

const numRuns = Number(process.env.FC_NUM_RUNS ?? 100);

function isBare(value: unknown): boolean {
  if (Array.isArray(value)) {
    return Object.getPrototypeOf(value) === Array.prototype && value.every(isBare);
  }
  if (value !== null && typeof value === 'object') {
    return (
      Object.getPrototypeOf(value) === Object.prototype &&
      Object.values(value).every(isBare)
    );
  }
  return true;
}

describe('default injection properties', () => {
  it('injecting twice gives the same tree as injecting once', () => {
    const property = fc.property(partialServiceArbitrary, (input) => {
      const once = structuredClone(input);
      validate(once, serviceSchema, { injectDefaults: true });

      const twice = structuredClone(once);
      validate(twice, serviceSchema, { injectDefaults: true });

      expect(twice).toEqual(once);
      expect(Object.keys(once).sort()).toEqual(
        [...new Set([...Object.keys(input), 'host', 'port', 'tls'])].sort()
      );
    });

    fc.assert(property, { seed: 20_241_019, numRuns });
  });

  it('a required property with a default always ends up holding a copy of it', () => {
    const property = fc.property(configTreeArbitrary, (fallback) => {
      const schema = {
        type: 'object',
        required: ['setting'],
        properties: { setting: { default: fallback } },
      };
      const config: Record<string, unknown> = {};

      validate(config, schema, { injectDefaults: true });

      expect(JSON.stringify(config.setting)).toBe(JSON.stringify(fallback));
      if (fallback !== null && typeof fallback === 'object') {
        expect(config.setting).not.toBe(fallback);
      }
    });

    fc.assert(property, { seed: 20_241_020, numRuns: Math.min(numRuns, 50) });
  });

  it('a required property without a default always fails validation', () => {
    const property = fc.property(settingNameArbitrary, (name) => {
      const schema = {
        type: 'object',
        required: [name],
        properties: { [name]: { type: 'string' } },
      };

      try {
        validate({}, schema, { injectDefaults: true });
        return false;
      } catch (err) {
        if (!(err instanceof ValidationError)) throw err;
        expect(err.failures).toHaveLength(1);
        expect(err.failures[0]?.params?.missingProperty).toBe(name);
        return true;
      }
    });

    fc.assert(property, { seed: 20_241_021, numRuns: Math.min(numRuns, 50) });
  });
});

describe('base coercion properties', () => {
  it('turns any YAML node tree into bare containers with the same content', () => {
    const property = fc.property(configTreeArbitrary, (value) => {
      const node = new Document(value).contents;
      const base = toBase(node);

      expect(isBare(base)).toBe(true);
      expect(JSON.stringify(base)).toBe(JSON.stringify(value));
    });

    fc.assert(property, { seed: 20_241_022, numRuns });
  });
});
