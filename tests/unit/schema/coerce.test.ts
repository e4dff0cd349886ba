import { describe, it, expect } from 'vitest';
import { coerceRows, coerceValue, resolveColumnMapping } from '../../../src/lib/schema/coerce.js';
import { DEFAULT_LISTING_SCHEMA } from '../../../src/lib/schema/default-schema.js';
import type { RecordSchema, SchemaField } from '../../../src/types/data-model.js';
import { SchemaError } from '../../../src/utils/errors.js';

const field = (overrides: Partial<SchemaField> & Pick<SchemaField, 'type'>): SchemaField => ({
  name: 'value',
  nullable: true,
  ...overrides,
});

const smallSchema: RecordSchema = {
  name: 'small',
  fields: [
    { name: 'id', type: 'string', nullable: false, aliases: ['id_propiedad'] },
    { name: 'price', type: 'number', nullable: false, aliases: ['precio'] },
    { name: 'note', type: 'string', nullable: true },
  ],
};

describe('coerceValue()', () => {
  it('treats blank and placeholder tokens as null', () => {
    for (const token of ['', '  ', 'NA', 'n/a', 'NaN', 'null', 'None']) {
      expect(coerceValue(token, field({ type: 'number' }))).toBeNull();
    }
    expect(coerceValue(undefined, field({ type: 'string' }))).toBeNull();
  });

  it('strips currency symbols and separators from numbers', () => {
    expect(coerceValue('$ 150000', field({ type: 'number' }))).toBe(150000);
    expect(coerceValue('1,250.5', field({ type: 'number' }))).toBe(1250.5);
    expect(coerceValue('-5', field({ type: 'number' }))).toBe(-5);
    expect(coerceValue('abc', field({ type: 'number' }))).toBeNull();
    expect(coerceValue(42, field({ type: 'number' }))).toBe(42);
  });

  it('reads numbers written in exponent form', () => {
    expect(coerceValue('1.5e6', field({ type: 'number' }))).toBe(1500000);
    expect(coerceValue(' 2.5E+05 ', field({ type: 'number' }))).toBe(250000);
    expect(coerceValue('8e-1', field({ type: 'number' }))).toBe(0.8);
    expect(coerceValue('3e2', field({ type: 'integer' }))).toBe(300);
  });

  it('keeps integers only for integer fields', () => {
    expect(coerceValue('3', field({ type: 'integer' }))).toBe(3);
    expect(coerceValue('2.5', field({ type: 'integer' }))).toBeNull();
  });

  it('normalizes dates to their canonical string', () => {
    expect(coerceValue('2024-03-15', field({ type: 'date' }))).toBe('2024-03-15');
    expect(coerceValue(new Date('2024-03-15T00:00:00Z'), field({ type: 'date' }))).toBe('2024-03-15');
    expect(coerceValue('2024-03-15T10:00:00Z', field({ type: 'date' }))).toBe(
      '2024-03-15T10:00:00.000Z',
    );
    expect(coerceValue('yesterday', field({ type: 'date' }))).toBeNull();
  });

  it('applies the field text normalization', () => {
    expect(coerceValue('  casa ', field({ type: 'string' }))).toBe('casa');
    expect(coerceValue('  LOCAL comercial ', field({ type: 'string', normalize: 'title' }))).toBe(
      'Local Comercial',
    );
    expect(coerceValue(' as is ', field({ type: 'string', normalize: 'none' }))).toBe(' as is ');
    expect(coerceValue(17, field({ type: 'string' }))).toBe('17');
  });

  it('reads boolean tokens', () => {
    expect(coerceValue('Si', field({ type: 'boolean' }))).toBe(true);
    expect(coerceValue('no', field({ type: 'boolean' }))).toBe(false);
    expect(coerceValue(1, field({ type: 'boolean' }))).toBe(true);
    expect(coerceValue('maybe', field({ type: 'boolean' }))).toBeNull();
  });
});

describe('resolveColumnMapping()', () => {
  it('matches names, aliases and case-insensitive headers', () => {
    const mapping = resolveColumnMapping(['ID', 'precio'], smallSchema);

    expect(mapping.get('id')).toBe('ID');
    expect(mapping.get('price')).toBe('precio');
    expect(mapping.get('note')).toBeNull();
  });

  it('prefers an exact header over a case-insensitive one', () => {
    const mapping = resolveColumnMapping(['PRICE', 'price', 'id'], smallSchema);

    expect(mapping.get('price')).toBe('price');
  });

  it('rejects sources missing a required column', () => {
    expect(() => resolveColumnMapping(['id'], smallSchema)).toThrow(SchemaError);
    expect(() => resolveColumnMapping(['id'], smallSchema)).toThrow(
      'Missing required columns for schema "small": price',
    );
  });
});

describe('coerceRows()', () => {
  it('builds a batch in schema column order', () => {
    const batch = coerceRows(
      [
        { precio: '100', id_propiedad: 'A', extra: 'x' },
        { precio: 'n/a', id_propiedad: 'B', extra: 'y' },
      ],
      ['precio', 'id_propiedad', 'extra'],
      smallSchema,
    );

    expect(batch.columns).toEqual(['id', 'price', 'note']);
    expect(batch.records).toEqual([
      { id: 'A', price: 100, note: null },
      { id: 'B', price: null, note: null },
    ]);
  });

  it('maps the Spanish source headers of the default schema', () => {
    const batch = coerceRows(
      [
        {
          id_propiedad: 'PROP-0001',
          tipo_propiedad: 'departamento',
          comuna: 'las condes',
          precio: '150000',
          superficie_m2: '50',
          habitaciones: '2',
          banos: '1',
          estado: 'disponible',
          fecha_publicacion: '2024-03-15',
          descripcion: ' Vista despejada ',
        },
      ],
      [
        'id_propiedad',
        'tipo_propiedad',
        'comuna',
        'precio',
        'superficie_m2',
        'habitaciones',
        'banos',
        'estado',
        'fecha_publicacion',
        'descripcion',
      ],
      DEFAULT_LISTING_SCHEMA,
    );

    expect(batch.records[0]).toEqual({
      id: 'PROP-0001',
      property_type: 'Departamento',
      district: 'Las Condes',
      price: 150000,
      area_m2: 50,
      bedrooms: 2,
      bathrooms: 1,
      status: 'Disponible',
      publication_date: '2024-03-15',
      description: 'Vista despejada',
    });
  });
});
