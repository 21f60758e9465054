import { describe, it, expect } from 'vitest';
import { ValueSynthesizer, arrayLiteral } from '../../../src/lib/synthesizer/index.js';
import { SEMANTIC_CATEGORIES, type SemanticType, type SimpleCategory } from '../../../src/lib/classifier/semantic-types.js';
import { RowContext } from '../../../src/lib/context/index.js';
import { ReferencePool } from '../../../src/lib/pool/index.js';
import type { MissingReferenceStrategy } from '../../../src/lib/synthesizer/types.js';
import { createRandom } from '../../../src/utils/seed-manager.js';
import { FIXED_NOW, TEST_SEED, column } from '../../fixtures/schemas.js';

function synthesizer(pools = new ReferencePool(), onMissingReference?: MissingReferenceStrategy): ValueSynthesizer {
  return new ValueSynthesizer({ random: createRandom(TEST_SEED).random, pools, now: FIXED_NOW, onMissingReference });
}

const simple = (category: SimpleCategory): SemanticType => ({ category });
const reference = (referencedTable: string): SemanticType => ({
  category: 'foreign-key',
  referencedTable,
  referencedColumn: 'id',
});

describe('ValueSynthesizer', () => {
  it('produces a literal for every category', () => {
    const values = synthesizer();
    const col = column('value', 'text');

    for (const category of SEMANTIC_CATEGORIES) {
      const semantic: SemanticType =
        category === 'foreign-key' ? reference('parents') : { category };
      expect(() => values.synthesize(semantic, col, new RowContext(), 0)).not.toThrow();
    }
  });

  describe('keys', () => {
    it('numbers integer primary keys from one', () => {
      expect(synthesizer().synthesize(simple('primary-key'), column('id', 'integer'), new RowContext(), 4)).toEqual({
        kind: 'number',
        value: '5',
      });
    });

    it('uses UUIDs for non-numeric primary keys', () => {
      const literal = synthesizer().synthesize(simple('primary-key'), column('id', 'uuid'), new RowContext(), 0);
      expect(literal.kind).toBe('text');
      if (literal.kind === 'text') {
        expect(literal.value).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
      }
    });

    it('numbers text keys too short to hold a UUID', () => {
      const values = synthesizer();
      expect(values.synthesize(simple('primary-key'), column('id', 'varchar(8)'), new RowContext(), 7)).toEqual({
        kind: 'text',
        value: '8',
      });
      expect(values.synthesize(reference('tickets'), column('ticket_id', 'char(4)'), new RowContext(), 0)).toEqual({
        kind: 'text',
        value: '1',
      });
    });

    it('keeps UUIDs for text keys long enough to hold one', () => {
      const literal = synthesizer().synthesize(simple('primary-key'), column('id', 'varchar(36)'), new RowContext(), 0);
      expect(literal.kind === 'text' ? literal.value.length : 0).toBe(36);
    });

    it('draws foreign keys from the referenced pool', () => {
      const pools = new ReferencePool();
      pools.add('companies', '7');

      const values = synthesizer(pools);
      expect(values.synthesize(reference('companies'), column('company_id', 'integer'), new RowContext(), 3)).toEqual({
        kind: 'number',
        value: '7',
      });
      expect(values.synthesize(reference('companies'), column('company_ref', 'text'), new RowContext(), 3)).toEqual({
        kind: 'text',
        value: '7',
      });
    });

    it('substitutes a default identifier when the pool is empty', () => {
      expect(
        synthesizer().synthesize(reference('companies'), column('company_id', 'integer'), new RowContext(), 0),
      ).toEqual({ kind: 'number', value: '1' });
    });

    it('emits NULL for nullable references under the null strategy', () => {
      const values = synthesizer(new ReferencePool(), 'null');

      expect(values.synthesize(reference('companies'), column('company_id', 'integer'), new RowContext(), 0)).toEqual({
        kind: 'null',
      });
      expect(
        values.synthesize(
          reference('companies'),
          column('company_id', 'integer', { nullable: false }),
          new RowContext(),
          0,
        ),
      ).toEqual({ kind: 'number', value: '1' });
    });
  });

  describe('declared types', () => {
    it('truncates text to the declared length', () => {
      const literal = synthesizer().synthesize(simple('description'), column('bio', 'varchar(5)'), new RowContext(), 0);
      expect(literal.kind).toBe('text');
      if (literal.kind === 'text') {
        expect(literal.value.length).toBeLessThanOrEqual(5);
      }
    });

    it('rounds coordinates stored in integer columns', () => {
      const literal = synthesizer().synthesize(simple('latitude'), column('lat', 'integer'), new RowContext(), 0);
      expect(literal.kind).toBe('number');
      if (literal.kind === 'number') {
        expect(literal.value).toMatch(/^-?\d+$/);
      }
    });

    it('quotes ports stored in text columns', () => {
      const literal = synthesizer().synthesize(simple('port'), column('port', 'text'), new RowContext(), 0);
      expect(literal.kind).toBe('text');
    });

    it('keeps years within thirty years of now', () => {
      const literal = synthesizer().synthesize(simple('year'), column('year', 'integer'), new RowContext(), 0);
      expect(literal.kind).toBe('number');
      if (literal.kind === 'number') {
        expect(Number(literal.value)).toBeGreaterThanOrEqual(1994);
        expect(Number(literal.value)).toBeLessThanOrEqual(2024);
      }
    });

    it('renders tags as an array literal for array columns', () => {
      const literal = synthesizer().synthesize(simple('tags'), column('tags', 'text[]'), new RowContext(), 0);
      expect(literal.kind).toBe('text');
      if (literal.kind === 'text') {
        expect(literal.value).toMatch(/^\{"[^"]+"(,"[^"]+")*\}$/);
      }
    });

    it('emits NULL for unknown types', () => {
      expect(synthesizer().synthesize(simple('unknown'), column('data', 'bytea'), new RowContext(), 0)).toEqual({
        kind: 'null',
      });
    });

    it('emits booleans', () => {
      expect(synthesizer().synthesize(simple('boolean'), column('active', 'boolean'), new RowContext(), 0).kind).toBe(
        'boolean',
      );
    });
  });

  describe('samples and vocabularies', () => {
    it('prefers column samples over the built-in vocabulary', () => {
      const col = column('status', 'text', { samples: ['on-hold'] });
      expect(synthesizer().synthesize(simple('status'), col, new RowContext(), 0)).toEqual({
        kind: 'text',
        value: 'on-hold',
      });
    });

    it('emits numeric samples unquoted in numeric columns', () => {
      const col = column('level', 'integer', { samples: ['42'] });
      expect(synthesizer().synthesize(simple('sampled'), col, new RowContext(), 0)).toEqual({
        kind: 'number',
        value: '42',
      });
    });

    it('keeps sampled text quoted', () => {
      const col = column('tier', 'text', { samples: ["O'Brien"] });
      expect(synthesizer().synthesize(simple('sampled'), col, new RowContext(), 0)).toEqual({
        kind: 'text',
        value: "O'Brien",
      });
    });
  });

  describe('row context', () => {
    it('builds emails from names already in the row', () => {
      const context = new RowContext();
      context.set('first_name', 'Ada');
      context.set('last_name', 'Lovelace');

      const literal = synthesizer().synthesize(simple('email'), column('email'), context, 0);
      expect(literal.kind).toBe('text');
      if (literal.kind === 'text') {
        expect(literal.value).toMatch(/^ada\.lovelace@(gmail|yahoo|outlook|example)\.com$/);
      }
    });

    it('places end dates after the row start date', () => {
      const context = new RowContext();
      context.setDate('created_at', new Date('2020-01-01T00:00:00Z'));

      const literal = synthesizer().synthesize(simple('end-date'), column('ended_on', 'date'), context, 0);
      expect(literal.kind).toBe('text');
      if (literal.kind === 'text') {
        expect(literal.value >= '2020-01-31').toBe(true);
        expect(literal.value <= '2021-12-31').toBe(true);
      }
    });
  });

  it('is deterministic for the same seed', () => {
    const col = column('bio');
    const run = () => {
      const values = synthesizer();
      return Array.from({ length: 5 }, (_, i) => values.synthesize(simple('description'), col, new RowContext(), i));
    };

    expect(run()).toEqual(run());
  });
});

describe('arrayLiteral', () => {
  it('quotes elements and escapes quotes and backslashes', () => {
    expect(arrayLiteral(['a', 'b"c', 'd\\e'])).toBe('{"a","b\\"c","d\\\\e"}');
  });

  it('renders an empty array', () => {
    expect(arrayLiteral([])).toBe('{}');
  });
});
