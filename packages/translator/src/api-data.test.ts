import { describe, it, expect } from 'vitest';
import {
  DocumentHandle,
  DocumentStatus,
  describeGlossary,
  describeUsage,
  documentStatusResponseSchema,
  glossaryInfoSchema,
  removeRegionalVariant,
  usageResponseSchema,
} from './api-data.js';

describe('DocumentHandle', () => {
  it('survives a JSON round trip', () => {
    const handle = new DocumentHandle('doc-1', 'key-1');
    const restored = DocumentHandle.fromJSON(JSON.parse(JSON.stringify(handle)));

    expect(restored).toEqual(handle);
    expect(restored.toString()).toBe('Document ID: doc-1, key: key-1');
  });

  it('rejects incomplete handles', () => {
    expect(() => DocumentHandle.fromJSON({ documentId: 'doc-1' })).toThrow();
  });

  it('is immutable', () => {
    expect(Object.isFrozen(new DocumentHandle('doc-1', 'key-1'))).toBe(true);
  });
});

describe('DocumentStatus', () => {
  it('derives ok and done from the status', () => {
    const translating = new DocumentStatus({ status: 'translating' });
    const done = new DocumentStatus({ status: 'done' });
    const failed = new DocumentStatus({ status: 'error', errorMessage: 'bad' });

    expect([translating.ok, translating.done]).toEqual([true, false]);
    expect([done.ok, done.done]).toEqual([true, true]);
    expect([failed.ok, failed.done]).toEqual([false, false]);
  });

  it('serializes only the fields that are set', () => {
    expect(new DocumentStatus({ status: 'done', billedCharacters: 42 }).toJSON()).toEqual({
      status: 'done',
      billedCharacters: 42,
    });
  });
});

describe('response schemas', () => {
  it('accepts numeric strings and a null error message in status responses', () => {
    expect(
      documentStatusResponseSchema.parse({ status: 'translating', seconds_remaining: '12', error_message: null }),
    ).toEqual({ status: 'translating', seconds_remaining: 12, billed_characters: undefined, error_message: null });
  });

  it('rejects unknown document statuses', () => {
    expect(documentStatusResponseSchema.safeParse({ status: 'paused' }).success).toBe(false);
  });

  it('upper-cases glossary languages', () => {
    const info = glossaryInfoSchema.parse({
      glossary_id: 'gls-1',
      name: 'Test',
      ready: false,
      source_lang: 'en',
      target_lang: 'de',
      creation_time: '2024-05-01T10:00:00Z',
      entry_count: 3,
    });

    expect(info.sourceLang).toBe('EN');
    expect(info.targetLang).toBe('DE');
    expect(info.creationTime.toISOString()).toBe('2024-05-01T10:00:00.000Z');
    expect(describeGlossary(info)).toBe('Glossary "Test" (gls-1)');
  });

  it('flags reached usage limits', () => {
    const usage = usageResponseSchema.parse({
      character_count: 500,
      character_limit: 500,
      document_count: 1,
      document_limit: 10,
    });

    expect(usage.character.limitReached).toBe(true);
    expect(usage.document.limitReached).toBe(false);
    expect(usage.teamDocument.valid).toBe(false);
    expect(usage.anyLimitReached).toBe(true);
    expect(describeUsage(usage)).toBe('Usage this billing period:\nCharacters: 500 of 500\nDocuments: 1 of 10');
  });
});

describe('removeRegionalVariant', () => {
  it('keeps the base language', () => {
    expect(removeRegionalVariant('en-us')).toBe('EN');
    expect(removeRegionalVariant('DE')).toBe('DE');
  });
});
