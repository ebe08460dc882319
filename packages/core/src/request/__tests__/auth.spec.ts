import { describe, it, expect } from 'vitest';
import { formatAuthorization } from '../auth.js';

describe('formatAuthorization', () => {
  it('formats bearer tokens', () => {
    expect(formatAuthorization({ type: 'bearer', token: 'test-token' })).toBe('Bearer test-token');
  });

  it('base64-encodes basic credentials', () => {
    expect(formatAuthorization({ type: 'basic', username: 'user', password: 'test-secret' })).toBe(
      'Basic dXNlcjp0ZXN0LXNlY3JldA=='
    );
  });
});
