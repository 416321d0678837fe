export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type StorageType = 's3' | 'local';
export type MissingNotePolicy = 'ignore' | 'reject';

export interface S3Settings {
  endpoint: string;
  region: string;
  access_key: string;
  secret_key: string;
  force_path_style: boolean;
}

export interface LocalStorageSettings {
  storage_path: string;
  public_url: string;
  file_url_secret: string;
}

export interface Config {
  port: number;
  database_url: string;
  node_env: string;
  log_level: LogLevel;
  storage_type: StorageType;
  storage_bucket: string;
  s3: S3Settings | null;
  local: LocalStorageSettings | null;
  file_url_ttl_seconds: number;
  max_upload_bytes: number;
  read_timeout_ms: number;
  write_timeout_ms: number;
  idle_timeout_ms: number;
  missing_note_policy: MissingNotePolicy;
  auth_required: boolean;
  bot_token: string;
  auth_max_age_seconds: number;
  static_dir: string | null;
  url_refresh_cron: string;
}

const MAX_URL_TTL_SECONDS = 7 * 24 * 60 * 60;

function get_env(key: string, default_value?: string): string {
  const value = process.env[key];
  if (value === undefined) {
    if (default_value !== undefined) {
      return default_value;
    }
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function get_int_env(key: string, default_value: number): number {
  const raw = get_env(key, String(default_value));
  const value = parseInt(raw, 10);
  if (Number.isNaN(value)) {
    throw new Error(`Environment variable ${key} must be an integer, got "${raw}"`);
  }
  return value;
}

function get_ranged_int_env(key: string, default_value: number, min: number, max: number): number {
  const value = get_int_env(key, default_value);
  if (value < min || value > max) {
    throw new Error(`Environment variable ${key} must be between ${min} and ${max}, got ${value}`);
  }
  return value;
}

function get_bool_env(key: string, default_value: boolean): boolean {
  const raw = get_env(key, default_value ? 'true' : 'false').toLowerCase();
  return raw === 'true' || raw === '1' || raw === 'yes';
}

function get_enum_env<T extends string>(key: string, allowed: readonly T[], default_value: T): T {
  const raw = get_env(key, default_value);
  const match = allowed.find((candidate) => candidate === raw);
  if (match === undefined) {
    throw new Error(`Environment variable ${key} must be one of ${allowed.join(', ')}, got "${raw}"`);
  }
  return match;
}

export function load_config(): Config {
  const port = get_int_env('PORT', 8080);
  const storage_type = get_enum_env<StorageType>('STORAGE_TYPE', ['s3', 'local'], 's3');
  const auth_required = get_bool_env('AUTH_REQUIRED', false);

  return {
    port,
    database_url: get_env('DATABASE_URL'),
    node_env: get_env('NODE_ENV', 'development'),
    log_level: get_enum_env<LogLevel>('LOG_LEVEL', ['debug', 'info', 'warn', 'error'], 'info'),
    storage_type,
    storage_bucket: get_env('STORAGE_BUCKET', 'notes-files'),
    s3:
      storage_type === 's3'
        ? {
            endpoint: get_env('S3_ENDPOINT'),
            region: get_env('S3_REGION', 'us-east-1'),
            access_key: get_env('S3_ACCESS_KEY'),
            secret_key: get_env('S3_SECRET_KEY'),
            force_path_style: get_bool_env('S3_FORCE_PATH_STYLE', true),
          }
        : null,
    local:
      storage_type === 'local'
        ? {
            storage_path: get_env('STORAGE_PATH', './data/objects'),
            public_url: get_env('PUBLIC_URL', `http://localhost:${port}`),
            file_url_secret: get_env('FILE_URL_SECRET'),
          }
        : null,
    // S3 presigned URLs cannot outlive seven days
    file_url_ttl_seconds: get_ranged_int_env('FILE_URL_TTL_SECONDS', MAX_URL_TTL_SECONDS, 1, MAX_URL_TTL_SECONDS),
    max_upload_bytes: get_int_env('MAX_UPLOAD_BYTES', 32 * 1024 * 1024),
    read_timeout_ms: get_int_env('READ_TIMEOUT_MS', 15_000),
    write_timeout_ms: get_int_env('WRITE_TIMEOUT_MS', 15_000),
    idle_timeout_ms: get_int_env('IDLE_TIMEOUT_MS', 60_000),
    missing_note_policy: get_enum_env<MissingNotePolicy>('MISSING_NOTE_POLICY', ['ignore', 'reject'], 'ignore'),
    auth_required,
    bot_token: auth_required ? get_env('BOT_TOKEN') : get_env('BOT_TOKEN', ''),
    auth_max_age_seconds: get_int_env('AUTH_MAX_AGE_SECONDS', 24 * 60 * 60),
    static_dir: process.env.STATIC_DIR || null,
    url_refresh_cron: get_env('URL_REFRESH_CRON', '0 3 * * *'),
  };
}

export const config = load_config();
