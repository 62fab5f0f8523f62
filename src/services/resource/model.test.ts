import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { resetEnv } from '../../lib/env.js';
import { InvalidConfigError } from '../../lib/errors.js';
import { DEFAULT_PAGINATION_ENVELOPE_KEYS, Model, defineModelResource, defineResource } from './model.js';

describe('Model', () => {
  it('merges attributes and reads the primary key', () => {
    const model = new Model('sku', { sku: 'A-1', qty: 2 }).setAttributes({ qty: 3 });

    expect(model.getAttributes()).toEqual({ sku: 'A-1', qty: 3 });
    expect(model.getPrimaryKey()).toBe('A-1');
    expect(model.getId()).toBeUndefined();
  });

  it('returns a copy of its attributes', () => {
    const model = new Model('id', { id: 1 });

    model.getAttributes().id = 2;

    expect(model.getAttribute('id')).toBe(1);
  });

  it('collects errors per field', () => {
    const model = new Model();
    model.addError('email', 'invalid');
    model.addError('email', 'taken');
    model.addError('name', 'required');

    expect(model.hasErrors()).toBe(true);
    expect(model.hasErrors('phone')).toBe(false);
    expect(model.getErrors('email')).toEqual(['invalid', 'taken']);
    expect(model.getErrors()).toEqual({ email: ['invalid', 'taken'], name: ['required'] });

    model.clearErrors();
    expect(model.hasErrors()).toBe(false);
  });
});

describe('defineResource', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    resetEnv();
  });

  afterEach(() => {
    process.env = originalEnv;
    resetEnv();
  });

  it('fills defaults', () => {
    const resource = defineModelResource({ apiUrl: 'https://api.example.test', resourceName: 'users' });

    expect(resource).toMatchObject({
      apiUrl: 'https://api.example.test',
      resourceName: 'users',
      primaryKey: 'id',
      limitKey: 'per-page',
      offsetKey: 'page',
      paginationEnvelopeKeys: DEFAULT_PAGINATION_ENVELOPE_KEYS,
    });
    expect(resource.collectionEnvelope).toBeUndefined();
    expect(resource.paginationEnvelope).toBeUndefined();
  });

  it('is frozen', () => {
    const resource = defineModelResource({ apiUrl: 'https://api.example.test', resourceName: 'users' });

    expect(Object.isFrozen(resource)).toBe(true);
    expect(Object.isFrozen(resource.paginationEnvelopeKeys)).toBe(true);
  });

  it('passes the primary key to the factory', () => {
    const resource = defineResource(
      { apiUrl: 'https://api.example.test', resourceName: 'items', primaryKey: 'code' },
      (primaryKey) => new Model(primaryKey)
    );

    expect(resource.instantiate().setAttributes({ code: 'X' }).getPrimaryKey()).toBe('X');
  });

  it('rejects an empty resource name', () => {
    expect(() => defineModelResource({ apiUrl: 'https://api.example.test', resourceName: '' })).toThrow(
      /resourceName: resourceName cannot be empty/
    );
  });

  it('rejects unknown pagination fields', () => {
    expect(() =>
      defineModelResource({
        apiUrl: 'https://api.example.test',
        resourceName: 'users',
        paginationEnvelopeKeys: JSON.parse('{"total":"total"}'),
      })
    ).toThrow(InvalidConfigError);
  });

  it('falls back to RESOURCE_API_URL', () => {
    process.env.RESOURCE_API_URL = 'https://env.example.test/api';

    expect(defineModelResource({ resourceName: 'users' }).apiUrl).toBe('https://env.example.test/api');
  });

  it('fails without any API URL', () => {
    delete process.env.RESOURCE_API_URL;

    expect(() => defineModelResource({ resourceName: 'users' })).toThrow(
      'Resource "users" has no apiUrl and RESOURCE_API_URL is not set'
    );
  });
});
