import { maskSecret, maskSensitive } from './mask.util';

describe('maskSensitive', () => {
  it('masks secrets at any depth and leaves other values alone', () => {
    const input = {
      client_id: 'test-client',
      client_secret: 'test-secret',
      headers: { Authorization: 'Bearer test-token', 'Client-ID': 'test-client' },
      tokens: [{ access_token: 'short' }],
    };

    expect(maskSensitive(input)).toEqual({
      client_id: 'test-client',
      client_secret: '****cret',
      headers: { Authorization: '****oken', 'Client-ID': 'test-client' },
      tokens: '[masked]',
    });
  });

  it('masks short secrets completely', () => {
    expect(maskSecret('abc')).toBe('[masked]');
  });
});
