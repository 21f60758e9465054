import { describe, it, expect } from 'vitest';
import { RowContext, NULL_MARKER, isStartLikeKey } from '../../src/lib/context/index.js';

describe('RowContext', () => {
  it('stores and reads values under normalised keys', () => {
    const context = new RowContext();
    context.set('firstName', 'Ada');

    expect(context.get('first_name')).toBe('Ada');
    expect(context.has('FirstName')).toBe(true);
    expect(context.size()).toBe(1);
  });

  it('drops null markers and empty values', () => {
    const context = new RowContext();
    context.set('a', NULL_MARKER);
    context.set('b', '');
    context.set('c', null);
    context.set('d', undefined);

    expect(context.size()).toBe(0);
    expect(context.get('a')).toBeUndefined();
  });

  it('ignores invalid dates', () => {
    const context = new RowContext();
    context.setDate('created_at', new Date('not a date'));

    expect(context.getDate('created_at')).toBeUndefined();
  });

  it('finds a start-like date among stored dates', () => {
    const context = new RowContext();
    const created = new Date('2020-01-01T00:00:00Z');
    context.setDate('updated_at', new Date('2021-01-01T00:00:00Z'));
    context.setDate('createdAt', created);

    expect(context.getMostRecentStartDate()).toBe(created);
  });

  it('returns undefined when no start-like date is stored', () => {
    const context = new RowContext();
    context.setDate('updated_at', new Date('2021-01-01T00:00:00Z'));

    expect(context.getMostRecentStartDate()).toBeUndefined();
  });

  it('keeps rows independent', () => {
    const first = new RowContext();
    const second = new RowContext();
    first.set('email', 'a@example.com');

    expect(second.get('email')).toBeUndefined();
  });
});

describe('isStartLikeKey', () => {
  it.each([
    ['created_at', true],
    ['signedUpAt', true],
    ['start_date', true],
    ['launched_on', true],
    ['date_established', true],
    ['updated_at', false],
    ['ends_at', false],
  ])('%s -> %s', (key, expected) => {
    expect(isStartLikeKey(key)).toBe(expected);
  });
});
