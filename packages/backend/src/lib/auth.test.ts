import { describe, it, expect } from 'vitest';
import {
  build_data_check_string,
  constant_time_compare,
  sign_data_check_string,
  verify_init_data,
} from './auth.js';

const BOT_TOKEN = 'test-bot-token';
const AUTH_DATE = 1_700_000_000;

function signed(fields: Record<string, string>, token = BOT_TOKEN): string {
  const params = new URLSearchParams(fields);
  params.set('hash', sign_data_check_string(build_data_check_string(params), token));
  return params.toString();
}

function at(seconds: number): Date {
  return new Date(seconds * 1000);
}

describe('build_data_check_string', () => {
  it('sorts pairs and leaves out the hash', () => {
    const params = new URLSearchParams('b=2&hash=abc&a=1');
    expect(build_data_check_string(params)).toBe('a=1\nb=2');
  });
});

describe('constant_time_compare', () => {
  it('compares equal and unequal strings', () => {
    expect(constant_time_compare('abc', 'abc')).toBe(true);
    expect(constant_time_compare('abc', 'abd')).toBe(false);
    expect(constant_time_compare('abc', 'abcd')).toBe(false);
  });
});

describe('verify_init_data', () => {
  it('accepts correctly signed data and returns the user id', () => {
    const init_data = signed({ auth_date: String(AUTH_DATE), id: '42', first_name: 'Alice' });

    const result = verify_init_data(init_data, BOT_TOKEN, 86_400, at(AUTH_DATE + 100));

    expect(result).toEqual({ valid: true, user_id: 42, auth_date: AUTH_DATE });
  });

  it('reads the user id from a JSON user field', () => {
    const init_data = signed({ auth_date: String(AUTH_DATE), user: JSON.stringify({ id: 7, first_name: 'Bob' }) });

    const result = verify_init_data(init_data, BOT_TOKEN, 86_400, at(AUTH_DATE));

    expect(result).toEqual({ valid: true, user_id: 7, auth_date: AUTH_DATE });
  });

  it('rejects data whose fields changed after signing', () => {
    const params = new URLSearchParams(signed({ auth_date: String(AUTH_DATE), id: '42', first_name: 'Alice' }));
    params.set('first_name', 'Mallory');

    const result = verify_init_data(params.toString(), BOT_TOKEN, 86_400, at(AUTH_DATE));

    expect(result).toEqual({ valid: false, reason: 'hash mismatch' });
  });

  it('rejects data signed with another token', () => {
    const init_data = signed({ auth_date: String(AUTH_DATE), id: '42' }, 'other-token');

    expect(verify_init_data(init_data, BOT_TOKEN, 0)).toEqual({ valid: false, reason: 'hash mismatch' });
  });

  it('rejects data without a hash', () => {
    expect(verify_init_data('auth_date=1&id=42', BOT_TOKEN, 0)).toEqual({
      valid: false,
      reason: 'hash not found',
    });
  });

  it('rejects data older than the allowed age', () => {
    const init_data = signed({ auth_date: String(AUTH_DATE), id: '42' });

    const result = verify_init_data(init_data, BOT_TOKEN, 86_400, at(AUTH_DATE + 86_401));

    expect(result).toEqual({ valid: false, reason: 'init data expired' });
  });

  it('skips the age check when max age is 0', () => {
    const init_data = signed({ auth_date: String(AUTH_DATE), id: '42' });

    const result = verify_init_data(init_data, BOT_TOKEN, 0, at(AUTH_DATE + 10 * 86_400));

    expect(result.valid).toBe(true);
  });

  it('requires auth_date when an age limit is set', () => {
    const init_data = signed({ id: '42' });

    expect(verify_init_data(init_data, BOT_TOKEN, 60)).toEqual({ valid: false, reason: 'auth_date missing' });
  });
});
