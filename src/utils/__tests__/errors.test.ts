import { describe, it, expect } from 'vitest';
import {
  BackendError,
  ConnectionError,
  EmptyDatasetError,
  InvalidBatchError,
  RequestFailedError,
  SyncError,
  ValidationError,
  errorMessage,
  isRequestFailed,
  isSyncError,
} from '../errors';
import { toRequestFailed } from '../../client/syncClient';

describe('error hierarchy', () => {
  it('should keep every request failure a RequestFailedError', () => {
    const errors = [
      new ConnectionError('down'),
      new BackendError('oops', 502),
      toRequestFailed(400, ''),
      toRequestFailed(404, ''),
      toRequestFailed(429, ''),
      toRequestFailed(401, ''),
    ];

    for (const error of errors) {
      expect(error).toBeInstanceOf(RequestFailedError);
      expect(error).toBeInstanceOf(SyncError);
      expect(isRequestFailed(error)).toBe(true);
    }
  });

  it('should keep local validation apart from request failures', () => {
    const error = new ValidationError('comments: Cannot sync an empty batch of comments', {
      field: 'comments',
    });

    expect(isSyncError(error)).toBe(true);
    expect(isRequestFailed(error)).toBe(false);
    expect(error).toMatchObject({ code: 'VALIDATION_ERROR', field: 'comments' });
    expect('status' in error).toBe(false);
  });

  it('should map a remote 400 to InvalidBatchError', () => {
    const error = toRequestFailed(400, '{"message":"Bad comment"}');

    expect(error).toBeInstanceOf(InvalidBatchError);
    expect(error).toMatchObject({ status: 400, message: 'Bad comment', code: 'INVALID_BATCH' });
  });

  it('should keep the status of a body that failed to arrive', () => {
    expect(new ConnectionError('reset', undefined, 200).status).toBe(200);
  });

  it('should not treat an empty dataset as a request failure', () => {
    const error = new EmptyDatasetError('acme/support');

    expect(isSyncError(error)).toBe(true);
    expect(isRequestFailed(error)).toBe(false);
    expect(error.name).toBe('EmptyDatasetError');
  });

  it('should serialise status and body', () => {
    const json = new RequestFailedError('Invalid token', 401, '{"message":"Invalid token"}').toJSON();

    expect(json).toMatchObject({
      name: 'RequestFailedError',
      code: 'REQUEST_FAILED',
      message: 'Invalid token',
      status: 401,
      body: '{"message":"Invalid token"}',
    });
  });

  it('should map statuses without a JSON message', () => {
    expect(toRequestFailed(500, '<html>')).toMatchObject({
      name: 'BackendError',
      status: 500,
      message: '(no description available)',
    });
  });
});

describe('errorMessage', () => {
  it('should read messages from errors and stringify anything else', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage(42)).toBe('42');
  });
});
