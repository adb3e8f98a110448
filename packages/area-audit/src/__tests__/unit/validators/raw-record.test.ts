/**
 * Raw record parsing tests
 */

import { describe, it, expect } from 'vitest';
import { parseAreaRecord } from '../../../schemas/raw-record.js';

describe('parseAreaRecord', () => {
  it('should accept numeric ids and a top-level type', () => {
    expect(parseAreaRecord({ id: 42, type: 'country', tags: { name: 'Testland' } })).toEqual({
      success: true,
      data: { id: '42', type: 'country', tags: { name: 'Testland' } },
    });
  });

  it('should read the area type from the type tag', () => {
    const result = parseAreaRecord({ id: 'a1', tags: { type: 'community', name: 'A' } });
    expect(result).toMatchObject({ success: true, data: { type: 'community' } });
  });

  it('should accept snake_case timestamps and prefer camelCase', () => {
    const result = parseAreaRecord({
      id: 'a1',
      type: 'community',
      created_at: '2024-01-01T00:00:00Z',
      updated_at: '2024-02-01T00:00:00Z',
      updatedAt: '2024-03-01T00:00:00Z',
      deleted_at: null,
    });

    expect(result).toEqual({
      success: true,
      data: {
        id: 'a1',
        type: 'community',
        tags: {},
        createdAt: '2024-01-01T00:00:00Z',
        updatedAt: '2024-03-01T00:00:00Z',
      },
    });
  });

  it('should reject unknown area types', () => {
    expect(parseAreaRecord({ id: 'a1', type: 'planet' })).toEqual({
      success: false,
      error: [
        {
          field: 'type',
          kind: 'not_allowed',
          message: 'Invalid area type "planet". Expected one of community, country',
        },
      ],
    });
  });

  it('should report a missing type', () => {
    expect(parseAreaRecord({ id: 'a1' })).toMatchObject({
      success: false,
      error: [{ field: 'type', message: 'Invalid area type null. Expected one of community, country' }],
    });
  });

  it('should report a missing id', () => {
    expect(parseAreaRecord({ type: 'community' })).toEqual({
      success: false,
      error: [{ field: 'id', kind: 'missing', message: 'id is required' }],
    });
  });

  it('should report an id of the wrong type', () => {
    expect(parseAreaRecord({ id: true, type: 'community' })).toMatchObject({
      success: false,
      error: [{ field: 'id', kind: 'type_mismatch' }],
    });
  });

  it('should report tags that are not an object', () => {
    expect(parseAreaRecord({ id: 'a1', type: 'community', tags: 'name=A' })).toMatchObject({
      success: false,
      error: [{ field: 'tags', kind: 'type_mismatch' }],
    });
  });

  it('should reject input that is not an object', () => {
    expect(parseAreaRecord('a1')).toMatchObject({
      success: false,
      error: [{ field: 'record', kind: 'type_mismatch' }],
    });
  });
});
