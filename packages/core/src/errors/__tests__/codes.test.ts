import { describe, test, expect } from 'vitest';
import { ErrorCode } from '../codes.js';

describe('Error Code Infrastructure', () => {
  test('all error codes are unique', () => {
    const codes = Object.values(ErrorCode);
    const unique = new Set(codes);
    expect(unique.size).toBe(codes.length);
  });

  test('codes are grouped by domain', () => {
    expect(ErrorCode.UNSUPPORTED_TYPE).toBe('E100');
    expect(ErrorCode.TAG_PARSE_FAILED).toBe('E200');
    expect(ErrorCode.TAG_LITERAL_INVALID).toBe('E201');
    expect(ErrorCode.HOOK_FAILED).toBe('E300');
    expect(ErrorCode.RAW_SCHEMA_INVALID).toBe('E301');
    expect(ErrorCode.CONFIGURATION_ERROR).toBe('E400');
  });
});
