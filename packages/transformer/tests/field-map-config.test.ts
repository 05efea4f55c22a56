import { describe, expect, it } from 'vitest';
import { Logger, TransformerError } from '@fieldbridge/core';
import {
  createTransformerFromConfig,
  declarationsFromConfig,
  parseFieldMapConfig,
} from '../src/index.js';

function captureError(fn: () => unknown): TransformerError {
  try {
    fn();
  } catch (error) {
    if (error instanceof TransformerError) return error;
    throw error;
  }
  throw new Error('Expected a TransformerError');
}

const quiet = new Logger({ level: 'error' });

const postMap = {
  fields: [
    { app: 'id', ext: 'postid', type: 'integer', extType: 'string' },
    { app: 'title', ext: 'post_title' },
    { app: 'createdAt', ext: 'created_at', type: 'date' },
    { app: 'tags', ext: 'tags_json', type: 'json' },
    { app: 'flags', ext: 'flag_bits', type: 'mask', mask: { read: 0, write: 1 } },
  ],
  virtual: ['score'],
};

describe('parseFieldMapConfig', () => {
  it('fills in defaults', () => {
    expect(parseFieldMapConfig({ fields: [{ app: 'a', ext: 'b' }] })).toEqual({
      fields: [{ app: 'a', ext: 'b', type: 'none' }],
      virtual: [],
    });
  });

  it('requires a mask for mask fields', () => {
    const error = captureError(() =>
      parseFieldMapConfig({ fields: [{ app: 'flags', ext: 'flag_bits', type: 'mask' }] })
    );

    expect(error.code).toBe('CONFIGURATION_ERROR');
    expect(error.message).toBe('Invalid field map:\n- fields.0.mask: mask is required for mask fields');
  });

  it('rejects options that do not fit the field type', () => {
    const error = captureError(() =>
      parseFieldMapConfig({ fields: [{ app: 'at', ext: 'at_col', type: 'date', extType: 'string' }] })
    );

    expect(error.message).toBe(
      'Invalid field map:\n- fields.0.extType: extType cannot be combined with type "date"'
    );
  });

  it('rejects duplicate names on either side', () => {
    const error = captureError(() =>
      parseFieldMapConfig({
        fields: [
          { app: 'id', ext: 'postid' },
          { app: 'id', ext: 'post_id' },
          { app: 'other', ext: 'postid' },
        ],
      })
    );

    expect(error.message).toBe(
      'Invalid field map:\n- fields.1.app: Duplicate app field: id\n- fields.2.ext: Duplicate ext field: postid'
    );
  });

  it('rejects unknown types and missing names', () => {
    const error = captureError(() => parseFieldMapConfig({ fields: [{ app: '', ext: 'x', type: 'uuid' }] }));

    expect(error.code).toBe('CONFIGURATION_ERROR');
    expect(error.message).toContain('\n- fields.0.app: ');
    expect(error.message).toContain('\n- fields.0.type: ');
  });

  it('rejects input that is not an object', () => {
    expect(captureError(() => parseFieldMapConfig(null)).message).toBe(
      'Invalid field map:\n- (root): Expected object, received null'
    );
  });
});

describe('declarationsFromConfig', () => {
  it('produces one declaration per field, in order', () => {
    const declarations = declarationsFromConfig(parseFieldMapConfig(postMap));

    expect(declarations.map((field) => [field.app, field.ext])).toEqual([
      ['id', 'postid'],
      ['title', 'post_title'],
      ['createdAt', 'created_at'],
      ['tags', 'tags_json'],
      ['flags', 'flag_bits'],
    ]);
    expect(declarations[1]?.toApp).toBeUndefined();
    expect(declarations[1]?.toExt).toBeUndefined();
  });
});

describe('createTransformerFromConfig', () => {
  it('builds a transformer that converts every field type', () => {
    const transformer = createTransformerFromConfig(postMap, { logger: quiet });

    const app = transformer.toApp({
      postid: '7',
      post_title: 'Hello',
      created_at: '2024-01-05 07:08:09',
      tags_json: '["a","b"]',
      flag_bits: 3,
      score: 9,
      junk: true,
    });

    expect(app).toEqual({
      id: 7,
      title: 'Hello',
      createdAt: new Date('2024-01-05T07:08:09.000Z'),
      tags: ['a', 'b'],
      flags: ['read', 'write'],
      score: 9,
    });
    expect(transformer.toExt(app)).toEqual({
      postid: '7',
      post_title: 'Hello',
      created_at: '2024-01-05 07:08:09',
      tags_json: '["a","b"]',
      flag_bits: 3,
      score: 9,
    });
  });

  it('registers keys in map order and keeps virtual fields out of them', () => {
    const transformer = createTransformerFromConfig(postMap, { logger: quiet });

    expect(transformer.getKeysExt('p.')).toEqual([
      'p.postid',
      'p.post_title',
      'p.created_at',
      'p.tags_json',
      'p.flag_bits',
    ]);
    expect(transformer.isVirtual('score')).toBe(true);
  });

  it('passes hooks through', () => {
    const transformer = createTransformerFromConfig(
      { fields: [{ app: 'id', ext: 'postid' }] },
      { logger: quiet, hooks: { ext: { after: (record) => ({ ...record, source: 'config' }) } } }
    );

    expect(transformer.toExt({ id: 1 })).toEqual({ postid: 1, source: 'config' });
  });
});
