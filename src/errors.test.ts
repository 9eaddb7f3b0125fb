import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  NoHandlerError,
  NotFoundError,
  PersistenceError,
  ProviderError,
  ValidationError,
  errorMessage,
  errorType,
} from './errors.js';

describe('error taxonomy', () => {
  it('names every class after itself', () => {
    assert.equal(new ValidationError('bad').name, 'ValidationError');
    assert.equal(new NotFoundError('x').name, 'NotFoundError');
    assert.equal(new NoHandlerError('x').name, 'NoHandlerError');
    assert.equal(new ProviderError('down').name, 'ProviderError');
    assert.equal(new PersistenceError('disk').name, 'PersistenceError');
  });

  it('keeps the skill name on registry misses', () => {
    const notFound = new NotFoundError('weather');
    assert.equal(notFound.skill, 'weather');
    assert.equal(notFound.message, 'skill not found: weather');

    const noHandler = new NoHandlerError('weather');
    assert.equal(noHandler.message, 'no handler for skill: weather');
  });

  it('carries status and cause on provider errors', () => {
    const cause = new Error('socket hang up');
    const err = new ProviderError('request failed', 502, { cause });
    assert.equal(err.status, 502);
    assert.equal(err.cause, cause);
    assert.ok(err instanceof Error);
  });

  it('describes unknown thrown values', () => {
    assert.equal(errorMessage(new Error('boom')), 'boom');
    assert.equal(errorMessage('plain'), 'plain');
    assert.equal(errorType(new ValidationError('x')), 'ValidationError');
    assert.equal(errorType(42), 'Error');
  });
});
