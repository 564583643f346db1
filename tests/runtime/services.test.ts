/**
 * FHIRPath Runtime Tests: Services
 * Unit conversion, the FHIR type table, the JSON adapter and terminology
 */

import { describe, expect, it } from 'vitest';

import {
  Decimal,
  EMPTY,
  InMemoryTerminologyService,
  JsonResourceAdapter,
  TableUnitService,
  TypeHierarchy,
  parseTypeTable,
  parseUnitTable,
  toJson,
} from '../../src/index.js';
import { PATIENT } from '../helpers/runtime.js';

describe('FHIRPath Runtime: Unit Service', () => {
  const units = new TableUnitService();

  function convert(value: string, from: string, to: string): string | undefined {
    return units.convert(new Decimal(value), from, to)?.toFixed();
  }

  describe('convert', () => {
    it('applies prefixes', () => {
      expect(convert('1', 'kg', 'g')).toBe('1000');
      expect(convert('250', 'mg', 'g')).toBe('0.25');
    });

    it('converts customary units', () => {
      expect(convert('1', '[in_i]', 'cm')).toBe('2.54');
      expect(convert('2', 'h', 'min')).toBe('120');
    });

    it('converts compound units', () => {
      expect(convert('1', 'mg/dL', 'g/L')).toBe('0.01');
      expect(convert('1', 'm2', 'cm2')).toBe('10000');
    });

    it('reads calendar words as their codes', () => {
      expect(convert('1', 'week', 'd')).toBe('7');
    });

    it('applies offsets', () => {
      expect(convert('37', 'Cel', 'K')).toBe('310.15');
      expect(convert('273.15', 'K', 'Cel')).toBe('0');
    });

    it('is undefined across dimensions', () => {
      expect(convert('1', 'kg', 'm')).toBeUndefined();
      expect(convert('1', 'foo', 'm')).toBeUndefined();
    });
  });

  describe('compatible', () => {
    it('compares dimensions', () => {
      expect(units.compatible('mL', 'L')).toBe(true);
      expect(units.compatible('g', 'm')).toBe(false);
    });

    it('ignores annotations', () => {
      expect(units.compatible('{beats}/min', '/min')).toBe(true);
    });

    it('treats identical unknown units as compatible', () => {
      expect(units.compatible('foo', 'foo')).toBe(true);
      expect(units.compatible('foo', 'bar')).toBe(false);
    });
  });

  describe('unit algebra', () => {
    it('normalize maps calendar words', () => {
      expect(units.normalize('days')).toBe('d');
      expect(units.normalize('mg')).toBe('mg');
    });

    it('multiply joins with a dot', () => {
      expect(units.multiply('m', 'm')).toBe('m.m');
      expect(units.multiply('1', 'kg')).toBe('kg');
    });

    it('divide cancels and parenthesizes', () => {
      expect(units.divide('g', 'g')).toBe('1');
      expect(units.divide('mg', 'kg.d')).toBe('mg/(kg.d)');
      expect(units.divide('1', 's')).toBe('/s');
      expect(units.divide('m', '1')).toBe('m');
    });
  });

  describe('custom tables', () => {
    it('builds a service from a table', () => {
      const table = parseUnitTable({
        prefixes: {},
        units: {
          x: { dim: { L: 1 }, factor: '2' },
          y: { dim: { L: 1 }, factor: '4' },
        },
        calendar: {},
      });
      const custom = new TableUnitService(table);
      expect(custom.convert(new Decimal(1), 'y', 'x')?.toFixed()).toBe('2');
    });

    it('rejects malformed tables', () => {
      expect(() => parseUnitTable({})).toThrow(
        'units table: expected an object with units'
      );
      expect(() => parseUnitTable({ units: {}, prefixes: {} })).toThrow(
        'units table: calendar missing'
      );
      expect(() =>
        parseUnitTable({ units: { x: { dim: {} } }, prefixes: {}, calendar: {} })
      ).toThrow("units table: invalid entry for 'x'");
    });
  });
});

describe('FHIRPath Runtime: Type Hierarchy', () => {
  const types = new TypeHierarchy();

  it('walks a resource up to Base', () => {
    expect(types.lineage('Patient')).toEqual([
      'Patient',
      'DomainResource',
      'Resource',
      'Base',
    ]);
  });

  it('walks a primitive through its parent type', () => {
    expect(types.lineage('code')).toEqual(['code', 'string', 'Element', 'Base']);
  });

  it('answers subtype questions', () => {
    expect(types.isSubtypeOf('Age', 'Quantity')).toBe(true);
    expect(types.isSubtypeOf('Quantity', 'Age')).toBe(false);
  });

  it('knows primitives and their system types', () => {
    expect(types.isPrimitive('code')).toBe(true);
    expect(types.isPrimitive('Quantity')).toBe(false);
    expect(types.systemTypeOf('dateTime')).toBe('DateTime');
    expect(types.isKnown('Patient')).toBe(true);
    expect(types.isKnown('Spaceship')).toBe(false);
  });

  it('reads choice suffixes', () => {
    expect(types.choiceTypeForSuffix('DateTime')).toBe('dateTime');
    expect(types.choiceTypeForSuffix('Quantity')).toBe('Quantity');
    expect(types.choiceTypeForSuffix('Spaceship')).toBeUndefined();
    expect(types.choiceTypeForSuffix('')).toBeUndefined();
  });

  it('lists choice elements per type', () => {
    expect(types.choiceElements('Observation')).toEqual(['value', 'effective']);
    expect(types.choiceElements('Spaceship')).toBeUndefined();
  });

  it('finds declared elements through the lineage', () => {
    expect(types.declaresElement('Patient', 'birthDate')).toBe(true);
    expect(types.declaresElement('Patient', 'meta')).toBe(true);
    expect(types.declaresElement('Patient', 'deceased')).toBe(true);
    expect(types.declaresElement('Patient', 'foo')).toBe(false);
    expect(types.declaresElement('HumanName', 'extension')).toBe(true);
    expect(types.declaresElement('Encounter', 'status')).toBeUndefined();
  });

  it('stops at a cycle in a custom table', () => {
    const custom = new TypeHierarchy(
      parseTypeTable({ primitives: {}, parents: { A: 'B', B: 'A' } })
    );
    expect(custom.lineage('A')).toEqual(['A', 'B']);
  });

  it('rejects malformed tables', () => {
    expect(() => parseTypeTable(null)).toThrow('type table: expected an object');
    expect(() => parseTypeTable({ parents: {} })).toThrow(
      'type table: primitives missing'
    );
  });
});

describe('FHIRPath Runtime: JSON Resource Adapter', () => {
  const adapter = new JsonResourceAdapter();

  it('tags resources with their type', () => {
    const value = adapter.toValue(PATIENT);
    expect(value.kind).toBe('object');
    expect(value.kind === 'object' && value.type).toEqual({
      namespace: 'FHIR',
      name: 'Patient',
    });
  });

  it('leaves primitives untagged', () => {
    const value = adapter.toValue(PATIENT);
    const active = value.kind === 'object' ? value.fields.get('active') : EMPTY;
    expect(active).toEqual({ kind: 'boolean', value: true });
  });

  it('attaches the underscore sibling to its primitive', () => {
    const value = adapter.toValue(PATIENT);
    const birthDate =
      value.kind === 'object' ? value.fields.get('birthDate') : undefined;
    expect(birthDate?.kind).toBe('string');
    const element =
      birthDate?.kind === 'string' ? birthDate.element : undefined;
    expect(element && toJson(element)).toEqual({
      extension: {
        url: 'http://example.org/birth-time',
        valueDateTime: '1974-12-25T14:35:45-05:00',
      },
    });
  });

  it('reads numbers as integers or decimals', () => {
    const value = adapter.toValue({ a: 3, b: 72.5 });
    const a = value.kind === 'object' ? value.fields.get('a') : undefined;
    const b = value.kind === 'object' ? value.fields.get('b') : undefined;
    expect(a).toEqual({ kind: 'integer', value: 3n });
    expect(b?.kind === 'decimal' && b.scale).toBe(1);
  });

  it('drops nulls and reads arrays as collections', () => {
    expect(adapter.toValue(null)).toBe(EMPTY);
    expect(toJson(adapter.toValue(['a', null, 'b']))).toEqual(['a', 'b']);
  });

  it('exposes choice elements from the type table', () => {
    expect(adapter.choiceElements('Observation')).toEqual(['value', 'effective']);
  });
});

describe('FHIRPath Runtime: In-Memory Terminology', () => {
  const ANIMALS = 'http://example.org/animals';
  const terminology = new InMemoryTerminologyService({
    valueSets: {
      'http://example.org/vs/pets': [
        { system: ANIMALS, code: 'dog' },
        { system: ANIMALS, code: 'cat' },
      ],
    },
    codeSystems: {
      [ANIMALS]: [
        { code: 'dog', display: 'Dog' },
        { code: 'cat', display: 'Cat' },
      ],
    },
    hierarchy: {
      [ANIMALS]: [
        ['animal', 'dog'],
        ['dog', 'puppy'],
      ],
    },
    conceptMaps: {
      'http://example.org/cm/animals-fr': [
        {
          source: { system: ANIMALS, code: 'dog' },
          target: { system: 'http://example.org/fr', code: 'chien' },
        },
      ],
    },
  });

  it('expands a known value set', () => {
    expect(terminology.expand('http://example.org/vs/pets')).toHaveLength(2);
    expect(terminology.expand('http://example.org/vs/none')).toBeUndefined();
  });

  it('checks membership, matching a coding without a system', () => {
    expect(terminology.memberOf({ code: 'cat' }, 'http://example.org/vs/pets')).toBe(
      true
    );
    expect(
      terminology.memberOf(
        { system: 'http://example.org/other', code: 'cat' },
        'http://example.org/vs/pets'
      )
    ).toBe(false);
  });

  it('looks concepts up', () => {
    expect(terminology.lookup({ system: ANIMALS, code: 'dog' })).toEqual({
      name: ANIMALS,
      display: 'Dog',
    });
    expect(terminology.lookup({ code: 'dog' })).toBeUndefined();
  });

  it('validates against a code system', () => {
    expect(terminology.validateCS(ANIMALS, { code: 'cat' })).toBe(true);
    expect(terminology.validateCS(ANIMALS, { code: 'cow' })).toBe(false);
  });

  it('walks the hierarchy for subsumption', () => {
    expect(terminology.subsumes(ANIMALS, 'dog', 'dog')).toBe('equivalent');
    expect(terminology.subsumes(ANIMALS, 'animal', 'puppy')).toBe('subsumes');
    expect(terminology.subsumes(ANIMALS, 'puppy', 'animal')).toBe('subsumed-by');
    expect(terminology.subsumes(ANIMALS, 'dog', 'cat')).toBe('not-subsumed');
    expect(terminology.subsumes('http://example.org/none', 'a', 'b')).toBeUndefined();
  });

  it('translates through a concept map', () => {
    expect(
      terminology.translate('http://example.org/cm/animals-fr', {
        system: ANIMALS,
        code: 'dog',
      })
    ).toEqual([{ system: 'http://example.org/fr', code: 'chien' }]);
    expect(
      terminology.translate('http://example.org/cm/animals-fr', { code: 'cat' })
    ).toEqual([]);
  });
});
