import { describe, expect, it, test } from 'vitest';

import type { RuntimeValue, StructField } from '../../types';
import {
  array,
  bool,
  complex128,
  float64,
  int,
  int16,
  int64,
  int8,
  map,
  uint64,
  of,
  slice
} from '../../runtime';
import { FieldAccessDeniedError, TypeMismatchError } from '../../errors';
import { reflectValue } from '..';
import {
  Expression,
  File,
  Identifier,
  Position,
  SourceLocation
} from '../../tests/fixtures/lang-ast';

function fieldOf(value: RuntimeValue, name: string): StructField {
  if (value.kind !== 'struct') throw new Error('Expected a struct value.');
  const found = value.fields.find(candidate => candidate.name === name);
  if (!found) throw new Error(`No field ${name}.`);
  return found;
}

/**
 * Test suite: host data -> runtime values.
 *
 * Coverage:
 * - Type mismatches and their messages.
 * - Lazy, memoized field reads.
 * - Identity of shared host objects.
 * - Dynamic types of interface slots.
 */
describe('reflectValue', () => {
  describe('Type Mismatches', () => {
    test.for([
      {
        name: 'scalar of the wrong type',
        host: 'x',
        type: int8,
        message: '[freeze] Expected a value of type int8, got string'
      },
      {
        name: 'number for a bool',
        host: 1,
        type: bool,
        message: '[freeze] Expected a value of type bool, got number'
      },
      {
        name: 'string for an int64',
        host: '1',
        type: int64,
        message: '[freeze] Expected a value of type int64, got string'
      },
      {
        name: 'bigint for a float64',
        host: 1n,
        type: float64,
        message: '[freeze] Expected a value of type float64, got bigint'
      },
      {
        name: 'number for a complex128',
        host: 1,
        type: complex128,
        message: '[freeze] Expected a value of type complex128, got number'
      },
      {
        name: 'array of the wrong length',
        host: [1],
        type: array(int16, 3),
        message: '[freeze] Expected 3 elements for [3]int16, got 1'
      },
      {
        name: 'slice given as a record',
        host: { 0: 1 },
        type: slice(int),
        message: '[freeze] Expected an array for []int, got object'
      },
      {
        name: 'record for a non-string keyed map',
        host: { 1: 1 },
        type: map(int, int),
        message: '[freeze] Expected a Map for map[int]int, got object'
      },
      {
        name: 'record of another struct type',
        host: of(Position, {}),
        type: SourceLocation,
        message: '[freeze] Expected a SourceLocation record, got a Position record'
      },
      {
        name: 'number for a struct',
        host: 5,
        type: Position,
        message: '[freeze] Expected a Position record, got number'
      },
      {
        name: 'array held by an interface slot',
        host: [1],
        type: Expression,
        message:
          '[freeze] Cannot determine the dynamic type of array held by Expression'
      }
    ])('rejects $name', ({ host, type, message }) => {
      expect(() => reflectValue(host, type)).toThrow(TypeMismatchError);
      expect(() => reflectValue(host, type)).toThrow(message);
    });

    test.for([
      { host: 5, type: int64 },
      { host: 5n, type: uint64 },
      { host: 300, type: int8 },
      { host: { real: 1, imag: 2 }, type: complex128 }
    ])('accepts $host as $type.name', ({ host, type }) => {
      expect(reflectValue(host, type)).toEqual({ kind: 'scalar', type, value: host });
    });

    it('reports mismatches below a field with their path', () => {
      const file = of(File, {
        Body: [of(Identifier, { Name: 'x' }), [1]]
      });
      const body = fieldOf(reflectValue(file, File), 'Body');

      expect(() => body.read()).toThrow(
        '[freeze] Cannot determine the dynamic type of array held by Expression (at Body.1)'
      );
    });
  });

  describe('Struct Fields', () => {
    it('reads fields lazily and once', () => {
      let reads = 0;
      const host = {
        get Line() {
          reads++;
          return 3;
        },
        Column: 4
      };

      const line = fieldOf(reflectValue(host, Position), 'Line');
      expect(reads).toBe(0);

      const first = line.read();
      const second = line.read();

      expect(reads).toBe(1);
      expect(second).toBe(first);
      expect(first).toEqual({ kind: 'scalar', type: int, value: 3 });
    });

    it('reads missing fields as their zero value', () => {
      const column = fieldOf(reflectValue({ Line: 1 }, Position), 'Column');

      expect(column.read()).toEqual({ kind: 'scalar', type: int, value: 0 });
    });

    it('turns throwing accessors into access errors', () => {
      const cause = new Error('access denied');
      const host = {
        get Line(): number {
          throw cause;
        },
        Column: 4
      };

      const line = fieldOf(reflectValue(host, Position), 'Line');

      expect(() => line.read()).toThrow(FieldAccessDeniedError);
      expect(() => line.read()).toThrow(
        '[freeze] Field Position.Line cannot be read (at Line)'
      );

      let caught: unknown;
      try {
        line.read();
      } catch (error) {
        caught = error;
      }
      expect(caught instanceof Error && caught.cause).toBe(cause);
    });

    it('reports access errors with the full path', () => {
      const start = {
        get Line(): number {
          throw new Error('access denied');
        }
      };
      const location = reflectValue({ Start: start }, SourceLocation);
      const line = fieldOf(fieldOf(location, 'Start').read(), 'Line');

      let caught: unknown;
      try {
        line.read();
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(FieldAccessDeniedError);
      expect(caught instanceof FieldAccessDeniedError && caught.path).toEqual([
        'Start',
        'Line'
      ]);
      expect(caught instanceof Error && caught.message).toBe(
        '[freeze] Field Position.Line cannot be read (at Start.Line)'
      );
    });

    it('keeps the declared field order and visibility', () => {
      const value = reflectValue(of(File, {}), File);
      if (value.kind !== 'struct') throw new Error('Expected a struct value.');

      expect(
        value.fields.map(candidate => [candidate.name, candidate.visible])
      ).toEqual([
        ['Name', true],
        ['Body', true],
        ['Metadata', true],
        ['resolved', false]
      ]);
    });
  });

  describe('Identity', () => {
    it('reuses the value of a host object seen twice', () => {
      const position = of(Position, { Line: 1, Column: 1 });
      const value = reflectValue([position, position], slice(Position));
      if (value.kind !== 'slice' || value.elements === null) {
        throw new Error('Expected a slice value.');
      }

      expect(value.elements[0]).toBe(value.elements[1]);
    });
  });

  describe('Interface Slots', () => {
    test.for([
      { host: 1.5, kind: 'float64' },
      { host: 7n, kind: 'int64' },
      { host: true, kind: 'bool' },
      { host: 'x', kind: 'string' }
    ])('reads a held $kind', ({ host, kind }) => {
      const value = reflectValue(host, Expression);

      expect(value.kind === 'interface' && value.held?.type.kind).toBe(kind);
    });

    it('reads a held record as its struct type', () => {
      const value = reflectValue(of(Identifier, { Name: 'x' }), Expression);

      expect(value.kind === 'interface' && value.held?.type).toBe(Identifier);
    });

    it('reads a held number as float64', () => {
      expect(reflectValue(2, Expression)).toEqual({
        kind: 'interface',
        type: Expression,
        held: { kind: 'scalar', type: float64, value: 2 }
      });
    });

    it('reads absent slots as null', () => {
      expect(reflectValue(null, Expression)).toEqual({
        kind: 'interface',
        type: Expression,
        held: null
      });
    });
  });
});
