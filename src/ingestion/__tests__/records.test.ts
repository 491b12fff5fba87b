import { describe, it, expect } from 'vitest';
import { normalizeRecord, recordProfile, type CanonicalRecord } from '../records.js';

describe('normalizeRecord', () => {
  it('coerces CSV-style strings and trims text', () => {
    const result = normalizeRecord({
      text: '  Exports are slow  ',
      nps_score: '7',
      mrr: '120.5',
      user_id: 42,
      email: '',
      created_at: '2026-03-01T00:00:00.000Z',
    });

    expect(result).toEqual({
      kind: 'valid',
      record: {
        text: 'Exports are slow',
        userId: '42',
        email: null,
        subscriptionType: null,
        mrr: 120.5,
        companyName: null,
        industry: null,
        npsScore: 7,
        ticketId: null,
        ticketPriority: null,
        createdAt: new Date('2026-03-01T00:00:00.000Z'),
      },
    });
  });

  it('skips records with blank or missing text', () => {
    expect(normalizeRecord({ text: '   ' })).toEqual({ kind: 'skipped' });
    expect(normalizeRecord({ text: '' })).toEqual({ kind: 'skipped' });
    expect(normalizeRecord({ nps_score: 5 })).toEqual({ kind: 'skipped' });
  });

  it('reports an out-of-range NPS score against its field', () => {
    const result = normalizeRecord({ text: 'ok', nps_score: '11' });

    expect(result.kind).toBe('invalid');
    if (result.kind !== 'invalid') return;
    expect(result.field).toBe('nps_score');
    expect(result.message).toMatch(/^nps_score: /);
  });

  it('rejects a fractional NPS score and an unparseable date', () => {
    expect(normalizeRecord({ text: 'ok', nps_score: 7.5 })).toMatchObject({ kind: 'invalid', field: 'nps_score' });
    expect(normalizeRecord({ text: 'ok', created_at: 'not a date' })).toMatchObject({ kind: 'invalid', field: 'created_at' });
  });

  it('rejects values that are not objects', () => {
    expect(normalizeRecord('just a string')).toMatchObject({ kind: 'invalid', field: null });
  });
});

describe('recordProfile', () => {
  const base: CanonicalRecord = {
    text: 'x',
    userId: null,
    email: 'someone@example.com',
    subscriptionType: 'pro',
    mrr: 99,
    companyName: null,
    industry: 'saas',
    npsScore: null,
    ticketId: null,
    ticketPriority: null,
    createdAt: null,
  };

  it('returns null without a user id', () => {
    expect(recordProfile(base)).toBeNull();
  });

  it('carries the profile columns of a record that names a user', () => {
    expect(recordProfile({ ...base, userId: 'u-9' })).toEqual({
      userId: 'u-9',
      email: 'someone@example.com',
      subscriptionType: 'pro',
      mrr: 99,
      companyName: null,
      industry: 'saas',
      signupDate: null,
      customTraits: {},
    });
  });
});
