export const PLACEHOLDER_PROJECT_ID = 'your-project-id';
export const PLACEHOLDER_BUCKET_NAME = 'your-bucket-name';

export type ModelConfig = {
  endpoint: string;
  region: string;
  model: string;
  maxTokens: number;
  temperature: number;
  topP: number;
  timeoutMs: number;
};

export type StorageConfig = {
  bucket: string;
  defaultFolder: string;
  endpoint: string;
  hmacAccessKeyId: string;
  hmacSecret: string;
  signedUrlExpirationSeconds: number;
};

export type SandboxConfig = {
  pythonExecutable: string;
  timeoutMs: number;
};

export type ConverterConfig = {
  profile: 'production' | 'non-production';
  port: number;
  googleCredentialsPath: string;
  projectId: string;
  maxRetryAttempts: number;
  retryDelayMs: number;
  requestTimeoutSeconds: number;
  maxUploadBytes: number;
  model: ModelConfig;
  storage: StorageConfig;
  sandbox: SandboxConfig;
};

type Env = Record<string, string | undefined>;

function readString(env: Env, key: string, fallback: string): string {
  const value = String(env[key] || '').trim();
  return value || fallback;
}

function normalizePositiveInt(value: number, fallback: number): number {
  if (!Number.isFinite(value)) return fallback;
  return Math.max(1, Math.floor(value));
}

function readPositiveInt(env: Env, key: string, fallback: number): number {
  return normalizePositiveInt(Number.parseInt(env[key] || String(fallback), 10), fallback);
}

function readNonNegativeInt(env: Env, key: string, fallback: number): number {
  const value = Number.parseInt(env[key] || String(fallback), 10);
  if (!Number.isFinite(value) || value < 0) return fallback;
  return value;
}

function readNumber(env: Env, key: string, fallback: number): number {
  const value = Number.parseFloat(env[key] || String(fallback));
  return Number.isFinite(value) ? value : fallback;
}

/**
 * Build the converter configuration once at startup. Every component receives
 * the resulting object explicitly; nothing reads process.env afterwards.
 */
export function loadConverterConfig(env: Env = process.env): ConverterConfig {
  const region = readString(env, 'GOOGLE_CLOUD_REGION', 'us-central1');
  const requestTimeoutSeconds = readPositiveInt(env, 'REQUEST_TIMEOUT', 300);
  const requestTimeoutMs = requestTimeoutSeconds * 1000;
  const profile: ConverterConfig['profile'] =
    String(env.NODE_ENV || '').toLowerCase() === 'production' ? 'production' : 'non-production';

  return Object.freeze({
    profile,
    port: readPositiveInt(env, 'PORT', 8080),
    googleCredentialsPath: readString(env, 'GOOGLE_APPLICATION_CREDENTIALS', ''),
    projectId: readString(env, 'GOOGLE_CLOUD_PROJECT_ID', PLACEHOLDER_PROJECT_ID),
    maxRetryAttempts: readPositiveInt(env, 'MAX_RETRY_ATTEMPTS', 3),
    retryDelayMs: readNonNegativeInt(env, 'RETRY_DELAY_MS', 2000),
    requestTimeoutSeconds,
    maxUploadBytes: readPositiveInt(env, 'MAX_UPLOAD_BYTES', 50 * 1024 * 1024),
    model: Object.freeze({
      endpoint: readString(env, 'AI_PLATFORM_ENDPOINT', `${region}-aiplatform.googleapis.com`),
      region,
      model: readString(env, 'AI_MODEL_NAME', 'meta/llama-3.1-405b-instruct-maas'),
      maxTokens: readPositiveInt(env, 'AI_MAX_TOKENS', 4096),
      temperature: readNumber(env, 'AI_TEMPERATURE', 1),
      topP: readNumber(env, 'AI_TOP_P', 0.95),
      timeoutMs: requestTimeoutMs,
    }),
    storage: Object.freeze({
      bucket: readString(env, 'GCS_BUCKET_NAME', PLACEHOLDER_BUCKET_NAME),
      defaultFolder: readString(env, 'GCS_DEFAULT_FOLDER', 'intermediatecsv'),
      endpoint: readString(env, 'GCS_ENDPOINT', 'https://storage.googleapis.com').replace(/\/+$/, ''),
      hmacAccessKeyId: readString(env, 'GCS_HMAC_ACCESS_KEY_ID', ''),
      hmacSecret: readString(env, 'GCS_HMAC_SECRET', ''),
      signedUrlExpirationSeconds: readPositiveInt(env, 'SIGNED_URL_EXPIRATION', 3600),
    }),
    sandbox: Object.freeze({
      pythonExecutable: readString(env, 'PYTHON_EXECUTABLE', 'python3'),
      timeoutMs: readPositiveInt(env, 'SANDBOX_TIMEOUT_MS', requestTimeoutMs),
    }),
  });
}
