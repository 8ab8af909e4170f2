/**
 * Tests for bulk loader errors and engine error helpers.
 */

import { describe, expect, it } from 'vitest';
import {
  BulkLoaderError,
  BulkLoaderErrorCode,
  ConfigurationError,
  MissingIdFieldError,
  DuplicateIdError,
  DatasetError,
  isConfigurationError,
  describeEngineError,
  isResourceAlreadyExistsError,
  isIndexNotFoundError,
} from '../index.js';
import { InMemoryEngineError } from '../../testing/index.js';

describe('BulkLoaderError', () => {
  it('should format toString with the code', () => {
    const error = new ConfigurationError('Node URL cannot be empty');
    expect(error.toString()).toBe('[CONFIGURATION_ERROR] Configuration error: Node URL cannot be empty');
  });

  it('should serialize to JSON', () => {
    const error = new DuplicateIdError('SNo', ['1', '4']);
    expect(error.toJSON()).toEqual({
      name: 'DuplicateIdError',
      code: BulkLoaderErrorCode.DuplicateId,
      message: "Identifier field 'SNo' has duplicate values: 1, 4",
      details: { idField: 'SNo', duplicates: ['1', '4'] },
    });
  });

  it('should keep the cause', () => {
    const cause = new Error('ENOENT');
    const error = new DatasetError('Cannot read rows.csv', cause);
    expect(error.cause).toBe(cause);
    expect(error.message).toBe('Dataset error: Cannot read rows.csv');
  });

  it('should be an instance of Error and BulkLoaderError', () => {
    const error = new MissingIdFieldError('SNo', 2, 'value is null');
    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(BulkLoaderError);
    expect(error.name).toBe('MissingIdFieldError');
    expect(error.code).toBe(BulkLoaderErrorCode.MissingIdField);
    expect(error.message).toBe("Row 2 has no usable identifier in field 'SNo': value is null");
    expect(error.details).toEqual({ idField: 'SNo', rowNumber: 2 });
  });

  it('should narrow with isConfigurationError', () => {
    expect(isConfigurationError(new ConfigurationError('bad'))).toBe(true);
    expect(isConfigurationError(new DatasetError('bad'))).toBe(false);
    expect(isConfigurationError(new Error('bad'))).toBe(false);
  });
});

describe('describeEngineError', () => {
  it('should read status, type and reason from a response error', () => {
    const error = new InMemoryEngineError(
      400,
      'resource_already_exists_exception',
      'index [test] already exists'
    );

    expect(describeEngineError(error)).toEqual({
      name: 'ResponseError',
      message: 'resource_already_exists_exception: index [test] already exists',
      statusCode: 400,
      type: 'resource_already_exists_exception',
      reason: 'index [test] already exists',
    });
  });

  it('should read the status code from meta', () => {
    const error = {
      name: 'ResponseError',
      message: 'index_not_found_exception',
      meta: { statusCode: 404 },
      body: { error: { type: 'index_not_found_exception', reason: 'no such index [test]' } },
    };

    expect(describeEngineError(error)).toEqual({
      name: 'ResponseError',
      message: 'index_not_found_exception',
      statusCode: 404,
      type: 'index_not_found_exception',
      reason: 'no such index [test]',
    });
  });

  it('should describe a connection error without a body', () => {
    expect(describeEngineError(new Error('connect ECONNREFUSED 127.0.0.1:9200'))).toEqual({
      name: 'Error',
      message: 'connect ECONNREFUSED 127.0.0.1:9200',
    });
  });

  it('should describe a non-object value', () => {
    expect(describeEngineError('timeout')).toEqual({ name: 'UnknownError', message: 'timeout' });
  });
});

describe('engine error predicates', () => {
  const exists = new InMemoryEngineError(400, 'resource_already_exists_exception', 'index [a] already exists');
  const missing = new InMemoryEngineError(404, 'index_not_found_exception', 'no such index [a]');

  it('should recognize resource_already_exists_exception', () => {
    expect(isResourceAlreadyExistsError(exists)).toBe(true);
    expect(isResourceAlreadyExistsError(missing)).toBe(false);
    expect(isResourceAlreadyExistsError(new Error('other'))).toBe(false);
  });

  it('should recognize index_not_found_exception', () => {
    expect(isIndexNotFoundError(missing)).toBe(true);
    expect(isIndexNotFoundError(exists)).toBe(false);
    expect(isIndexNotFoundError(undefined)).toBe(false);
  });
});
