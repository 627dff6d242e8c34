import { parseBasicAuth } from '../../src/api/middleware';

describe('parseBasicAuth', () => {
  test('decodes user and password', () => {
    const header = `Basic ${Buffer.from('operator:test:password').toString('base64')}`;
    expect(parseBasicAuth(header)).toEqual({ username: 'operator', password: 'test:password' });
  });

  test('the scheme is case-insensitive', () => {
    const header = `basic ${Buffer.from('operator:pw').toString('base64')}`;
    expect(parseBasicAuth(header)).toEqual({ username: 'operator', password: 'pw' });
  });

  test('rejects other schemes and malformed values', () => {
    expect(parseBasicAuth(undefined)).toBeNull();
    expect(parseBasicAuth('Bearer test-token')).toBeNull();
    expect(parseBasicAuth(`Basic ${Buffer.from('no-separator').toString('base64')}`)).toBeNull();
  });
});
