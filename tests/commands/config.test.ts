import { describe, it, expect } from 'vitest';
import { maskSecret, redactConfig } from '../../src/commands/config.js';
import { DEFAULT_CONFIG } from '../../src/services/config.js';

describe('maskSecret', () => {
  it('should keep the first four characters', () => {
    expect(maskSecret('test-secret')).toBe('test****');
  });

  it('should fully mask short values', () => {
    expect(maskSecret('abcd')).toBe('****');
  });

  it('should leave empty values alone', () => {
    expect(maskSecret('')).toBe('');
    expect(maskSecret(null)).toBeNull();
  });
});

describe('redactConfig', () => {
  it('should mask only the key and access token', () => {
    const redacted = redactConfig({
      ...DEFAULT_CONFIG,
      publishers: ['google'],
      model_prefixes: [],
      key: 'test-secret',
      access_token: 'test-token',
      project_id: 'my-project',
    });

    expect(redacted.key).toBe('test****');
    expect(redacted.access_token).toBe('test****');
    expect(redacted.project_id).toBe('my-project');
    expect(redacted.publishers).toEqual(['google']);
  });
});
