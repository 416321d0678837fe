import crypto from 'crypto';

export type InitDataResult =
  | { valid: true; user_id: number | null; auth_date: number | null }
  | { valid: false; reason: string };

export function constant_time_compare(a: string, b: string): boolean {
  if (a.length !== b.length) {
    return false;
  }
  return crypto.timingSafeEqual(Buffer.from(a), Buffer.from(b));
}

export function build_data_check_string(params: URLSearchParams): string {
  const pairs: string[] = [];
  for (const [key, value] of params) {
    if (key !== 'hash') {
      pairs.push(`${key}=${value}`);
    }
  }
  return pairs.sort().join('\n');
}

export function sign_data_check_string(data_check_string: string, bot_token: string): string {
  const secret_key = crypto.createHash('sha256').update(bot_token).digest();
  return crypto.createHmac('sha256', secret_key).update(data_check_string).digest('hex');
}

function parse_user_id(params: URLSearchParams): number | null {
  const direct = params.get('id');
  if (direct !== null && /^\d+$/.test(direct)) {
    return Number(direct);
  }

  const user = params.get('user');
  if (user === null) {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(user);
    if (typeof parsed === 'object' && parsed !== null && 'id' in parsed && typeof parsed.id === 'number') {
      return parsed.id;
    }
  } catch {
    return null;
  }
  return null;
}

/**
 * Checks a URL-encoded init-data string signed with HMAC-SHA256 keyed by
 * SHA256(bot_token). `max_age_seconds` of 0 skips the `auth_date` check.
 */
export function verify_init_data(
  init_data: string,
  bot_token: string,
  max_age_seconds: number,
  now: Date = new Date()
): InitDataResult {
  const params = new URLSearchParams(init_data);
  const hash = params.get('hash');
  if (!hash) {
    return { valid: false, reason: 'hash not found' };
  }

  const expected = sign_data_check_string(build_data_check_string(params), bot_token);
  if (!constant_time_compare(hash.toLowerCase(), expected)) {
    return { valid: false, reason: 'hash mismatch' };
  }

  const auth_date_raw = params.get('auth_date');
  const auth_date = auth_date_raw !== null && /^\d+$/.test(auth_date_raw) ? Number(auth_date_raw) : null;

  if (max_age_seconds > 0) {
    if (auth_date === null) {
      return { valid: false, reason: 'auth_date missing' };
    }
    if (Math.floor(now.getTime() / 1000) - auth_date > max_age_seconds) {
      return { valid: false, reason: 'init data expired' };
    }
  }

  return { valid: true, user_id: parse_user_id(params), auth_date };
}
