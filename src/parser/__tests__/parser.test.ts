import { describe, it, expect, vi, beforeEach } from 'vitest';
import { field, record, t } from '../../schema/builders.js';
import { ToolParsingError, ValueError } from '../../schema/errors.js';
import type { RecordSchema } from '../../schema/types.js';
import { StructuredParser, parseArguments } from '../parser.js';
import { directValidation, fieldRepair, minimalInstance, safeSubset } from '../recovery.js';
import type { RecoveryStrategy } from '../recovery.js';

const Expense = record('Expense', [
  field('description', t.string()),
  field('value', t.number()),
  field('category', t.string()),
]);

describe('parseArguments', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('should repair a comma-decimal number', () => {
    const raw = '{"description":"mercado","value":"200,50","category":"Supermercado"}';

    expect(parseArguments(raw, Expense)).toEqual({
      description: 'mercado',
      value: 200.5,
      category: 'Supermercado',
    });
  });

  it('should default missing required fields in non-strict mode', () => {
    expect(parseArguments('{"description":"x"}', Expense)).toEqual({
      description: 'x',
      value: 0,
      category: '',
    });
  });

  it('should name every missing field in strict mode', () => {
    expect(() => parseArguments('{"description":"x"}', Expense, { strict: true })).toThrow(
      "validation failed for Expense: field 'value': required field is missing; field 'category': required field is missing"
    );
  });

  it('should expose the field issues on the error', () => {
    try {
      parseArguments({ description: 'x', value: 'lots', category: 'c' }, Expense, { strict: true });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ToolParsingError);
      if (error instanceof ToolParsingError) {
        expect(error.issues).toEqual([
          { path: 'value', code: 'invalid_type', message: 'expected number, received string' },
        ]);
      }
    }
  });

  it('should reproduce a serialized instance in strict mode', () => {
    const instance = { description: 'rent', value: 1500.75, category: 'housing' };

    expect(parseArguments(JSON.stringify(instance), Expense, { strict: true })).toEqual(instance);
  });

  it('should reproduce a nested instance in strict mode', () => {
    const Invoice = record('Invoice', [
      field('number', t.integer()),
      field('paid', t.boolean()),
      field('status', t.enumOf(['draft', 'sent', 'settled'])),
      field('customer', t.object([field('name', t.string()), field('vatId', t.nullable(t.string()))])),
      field('lines', t.array(t.object([field('item', t.string()), field('amount', t.number())]))),
      field('note', t.nullable(t.string())),
      field('tags', t.array(t.string()), { required: false }),
    ]);
    const instance = {
      number: 42,
      paid: false,
      status: 'sent',
      customer: { name: 'Ana Costa', vatId: null },
      lines: [
        { item: 'Consulting', amount: 1200.5 },
        { item: 'Travel', amount: 80 },
      ],
      note: null,
      tags: ['q3', 'priority'],
    };

    expect(parseArguments(JSON.stringify(instance), Invoice, { strict: true })).toEqual(instance);
  });

  it('should never raise in non-strict mode when every field has a default', () => {
    const raws: unknown[] = ['{}', 'not json at all', 42, null, '[]', { value: { nested: true } }, { value: true }];

    for (const raw of raws) {
      expect(parseArguments(raw, Expense)).toEqual({ description: '', value: 0, category: '' });
    }
  });

  it('should reject undecodable text in strict mode', () => {
    expect(() => parseArguments('not json', Expense, { strict: true })).toThrow(
      /^invalid arguments for Expense: arguments are not valid JSON/
    );
  });

  it('should reject a non-object payload in strict mode', () => {
    expect(() => parseArguments('[1,2]', Expense, { strict: true })).toThrow(
      'invalid arguments for Expense: arguments must be a JSON object, received array'
    );
  });

  it('should accept JSON inside a markdown fence or surrounded by prose', () => {
    const fenced = '```json\n{"description":"a","value":1,"category":"b"}\n```';
    const prose = 'Here you go: {"description":"a","value":2,"category":"c"} thanks';

    expect(parseArguments(fenced, Expense, { strict: true })).toEqual({ description: 'a', value: 1, category: 'b' });
    expect(parseArguments(prose, Expense, { strict: true })).toEqual({ description: 'a', value: 2, category: 'c' });
  });

  it('should drop undeclared fields', () => {
    expect(
      parseArguments({ description: 'a', value: 1, category: 'b', merchant: 'corner shop' }, Expense, { strict: true })
    ).toEqual({ description: 'a', value: 1, category: 'b' });
  });

  it('should coerce values by declared kind', () => {
    const Flags = record('Flags', [
      field('active', t.boolean()),
      field('count', t.integer()),
      field('tags', t.array(t.string())),
      field('level', t.enumOf(['low', 'high'])),
      field('ratio', t.number()),
    ]);

    expect(
      parseArguments({ active: 'sim', count: '42', tags: 'a, b,c', level: 'HIGH', ratio: '1.234,5' }, Flags)
    ).toEqual({ active: true, count: 42, tags: ['a', 'b', 'c'], level: 'high', ratio: 1234.5 });
  });

  it('should repair nested objects and drop array items that cannot be fixed', () => {
    const Order = record('Order', [
      field('customer', t.object([field('name', t.string()), field('age', t.integer())])),
      field('items', t.array(t.object([field('sku', t.string()), field('qty', t.integer())]))),
    ]);

    expect(
      parseArguments({ customer: { name: 'Ana', age: '30' }, items: [{ sku: 'A1', qty: '2' }, 'junk'] }, Order)
    ).toEqual({ customer: { name: 'Ana', age: 30 }, items: [{ sku: 'A1', qty: 2 }] });
  });

  it('should treat null on an optional field as absent', () => {
    const Note = record('Note', [field('text', t.string()), field('note', t.string(), { required: false })]);

    expect(parseArguments({ text: 'a', note: null }, Note, { strict: true })).toEqual({ text: 'a' });
  });

  it('should keep null on a nullable field', () => {
    const Note = record('Note', [field('text', t.string()), field('note', t.nullable(t.string()))]);

    expect(parseArguments({ text: 'a', note: null }, Note, { strict: true })).toEqual({ text: 'a', note: null });
    expect(parseArguments({ text: 'a', note: 'null' }, Note)).toEqual({ text: 'a', note: 'null' });
  });

  it('should fill declared defaults for absent optional fields', () => {
    const Income = record('Income', [field('value', t.number()), field('currency', t.string(), { default: 'BRL' })]);

    expect(parseArguments({ value: 10 }, Income, { strict: true })).toEqual({ value: 10, currency: 'BRL' });
  });

  it('should raise with the collected diagnostics when every strategy fails', () => {
    const Bad = record('Bad', [field('level', t.enumOf([]))]);

    expect(() => parseArguments({}, Bad)).toThrow(
      "all recovery strategies failed for Bad: field 'level': required field is missing; field 'level': enum has no choices"
    );
  });
});

describe('recovery strategies', () => {
  const Note = record('Note', [field('text', t.string()), field('note', t.string(), { required: false })]);

  it('should leave optional fields out when repairing', () => {
    expect(fieldRepair.attempt({}, Note, [])).toEqual({ text: '' });
    expect(minimalInstance.attempt({}, Note, [])).toEqual({ text: '' });
  });

  it('should fill every field in the safe subset', () => {
    expect(safeSubset.attempt({ note: 7 }, Note, [])).toEqual({ text: '', note: '7' });
    expect(safeSubset.attempt({ note: () => 'x' }, Note, [])).toEqual({ text: '', note: '' });
  });

  it('should record issues from a failed direct validation', () => {
    const diagnostics: Parameters<RecoveryStrategy['attempt']>[2] = [];

    expect(directValidation.attempt({ text: 1 }, Note, diagnostics)).toBeUndefined();
    expect(diagnostics).toEqual([{ path: 'text', code: 'invalid_type', message: 'expected string, received number' }]);
  });
});

describe('StructuredParser', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('should reject a target that is not a record', () => {
    const anonymous: RecordSchema = { kind: 'object', name: '', fields: [] };

    expect(() => new StructuredParser(anonymous)).toThrow(ValueError);
  });

  it('should try custom strategies in order', () => {
    const calls: string[] = [];
    const failing: RecoveryStrategy = {
      name: 'never',
      attempt: () => {
        calls.push('never');
        return undefined;
      },
    };
    const constant: RecoveryStrategy = {
      name: 'constant',
      attempt: () => {
        calls.push('constant');
        return { description: 'fixed', value: 1, category: 'x' };
      },
    };

    const parser = new StructuredParser(Expense, [failing, constant, failing]);

    expect(parser.parse('{}')).toEqual({ description: 'fixed', value: 1, category: 'x' });
    expect(calls).toEqual(['never', 'constant']);
    expect(console.warn).toHaveBeenCalledWith('[StructuredParser] Expense recovered via constant (0 issue(s))');
  });

  it('should parse a batch of tool calls and skip the unusable ones', () => {
    const parser = new StructuredParser(Expense);

    const results = parser.parseMany([
      { function: { arguments: '{"description":"a","value":1,"category":"b"}' } },
      { arguments: { description: 'b', value: 2, category: 'c' } },
      42,
      { name: 'no-arguments' },
    ]);

    expect(results).toEqual([
      { description: 'a', value: 1, category: 'b' },
      { description: 'b', value: 2, category: 'c' },
    ]);
    expect(console.warn).toHaveBeenCalledWith('[StructuredParser] Tool call 2 is not an object (number)');
    expect(console.warn).toHaveBeenCalledWith('[StructuredParser] Unrecognized tool call shape at index 3');
  });

  it('should log and skip calls that cannot be parsed', () => {
    const parser = new StructuredParser(record('Bad', [field('level', t.enumOf([]))]));

    expect(parser.parseMany([{ arguments: {} }])).toEqual([]);
    expect(console.error).toHaveBeenCalledTimes(1);
  });
});
