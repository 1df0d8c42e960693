import { describe, it, expect } from 'vitest';

import { SonarErrorCode } from '../../errors/index.js';
import { captureError } from '../../__tests__/fixtures.js';
import { normalizeParams, validateResourceId } from '../params.js';

describe('validateResourceId', () => {
  it('accepts project and component keys', () => {
    expect(validateResourceId(' my-project ')).toBe('my-project');
    expect(validateResourceId('org:module.sub-1')).toBe('org:module.sub-1');
  });

  it.each([
    ['', 'Invalid projectKey: must not be empty'],
    ['has space', 'Invalid projectKey: may only contain letters, digits, and the characters _ - . :'],
    ['x'.repeat(401), 'Invalid projectKey: must be at most 400 characters'],
  ])('rejects %j', (value, message) => {
    expect(captureError(() => validateResourceId(value, 'projectKey'))).toMatchObject({
      code: SonarErrorCode.VALIDATION_FAILED,
      message,
    });
  });
});

describe('normalizeParams', () => {
  it('sorts keys, trims values and drops absent ones', () => {
    expect(normalizeParams({ ' types ': ' BUG ', a: null, resolved: false, b: undefined })).toEqual({
      resolved: 'false',
      types: 'BUG',
    });
    expect(Object.keys(normalizeParams({ z: 1, a: 2, m: 3 }))).toEqual(['a', 'm', 'z']);
  });

  it('joins arrays with commas', () => {
    expect(normalizeParams({ severities: ['BLOCKER', ' CRITICAL', ''] })).toEqual({ severities: 'BLOCKER,CRITICAL' });
  });

  it('clamps page and page size', () => {
    expect(normalizeParams({ p: -3, ps: 0 })).toEqual({ p: '1', ps: '1' });
    expect(normalizeParams({ p: '4', ps: '900' })).toEqual({ p: '4', ps: '500' });
  });

  it('rejects non-integer paging values', () => {
    expect(captureError(() => normalizeParams({ ps: 'lots' }))).toMatchObject({
      code: SonarErrorCode.VALIDATION_FAILED,
      message: "Invalid ps: must be an integer, got 'lots'",
    });
  });
});
