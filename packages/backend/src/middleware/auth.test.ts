import { describe, it, expect } from 'vitest';
import express from 'express';
import request from 'supertest';
import { build_data_check_string, sign_data_check_string } from '../lib/auth.js';
import { actor_of, create_auth_middleware, type AuthOptions } from './auth.js';

const BOT_TOKEN = 'test-bot-token';

function signed(fields: Record<string, string>): string {
  const params = new URLSearchParams(fields);
  params.set('hash', sign_data_check_string(build_data_check_string(params), BOT_TOKEN));
  return params.toString();
}

function app_with(options: Partial<AuthOptions> = {}) {
  const app = express();
  app.use(create_auth_middleware({ required: true, bot_token: BOT_TOKEN, max_age_seconds: 0, ...options }));
  app.get('/whoami', (req, res) => {
    res.json({ actor: actor_of(req) });
  });
  return app;
}

describe('create_auth_middleware', () => {
  it('lets every request through when auth is not required', async () => {
    const response = await request(app_with({ required: false })).get('/whoami');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ actor: null });
  });

  it('rejects a request without init data', async () => {
    const response = await request(app_with()).get('/whoami');

    expect(response.status).toBe(401);
    expect(response.body).toEqual({ error: 'Unauthorized' });
  });

  it('rejects another authorization scheme', async () => {
    const response = await request(app_with()).get('/whoami').set('Authorization', 'Bearer test-secret');

    expect(response.status).toBe(401);
    expect(response.body).toEqual({ error: 'Unauthorized' });
  });

  it('rejects init data with a bad signature', async () => {
    const tampered = signed({ id: '42' }).replace('id=42', 'id=43');
    const response = await request(app_with()).get('/whoami').set('Authorization', `tma ${tampered}`);

    expect(response.status).toBe(401);
    expect(response.body).toEqual({ error: 'Invalid init data' });
  });

  it('rejects signed init data that names no user', async () => {
    const response = await request(app_with())
      .get('/whoami')
      .set('Authorization', `tma ${signed({ query_id: 'q1' })}`);

    expect(response.status).toBe(401);
    expect(response.body).toEqual({ error: 'Init data carries no user' });
  });

  it('exposes the user id of valid init data', async () => {
    const response = await request(app_with())
      .get('/whoami')
      .set('Authorization', `tma ${signed({ id: '42', first_name: 'Alice' })}`);

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ actor: 42 });
  });

  it('reads the user from a JSON user field', async () => {
    const response = await request(app_with())
      .get('/whoami')
      .set('Authorization', `tma ${signed({ user: JSON.stringify({ id: 7, first_name: 'Bob' }) })}`);

    expect(response.body).toEqual({ actor: 7 });
  });

  it('rejects init data older than the allowed age', async () => {
    const response = await request(app_with({ max_age_seconds: 60 }))
      .get('/whoami')
      .set('Authorization', `tma ${signed({ id: '42', auth_date: '1000' })}`);

    expect(response.status).toBe(401);
    expect(response.body).toEqual({ error: 'Invalid init data' });
  });
});
