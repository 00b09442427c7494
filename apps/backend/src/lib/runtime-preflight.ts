import { existsSync } from 'fs';
import {
  ConverterConfig,
  PLACEHOLDER_BUCKET_NAME,
  PLACEHOLDER_PROJECT_ID,
} from './converter-config';

export type RuntimePreflightReport = {
  profile: 'production' | 'non-production';
  providers: {
    googleCredentials: boolean;
    storageHmac: boolean;
  };
  warnings: string[];
};

type FileExists = (filePath: string) => boolean;

/**
 * Refuse to start with a configuration that cannot serve a single request.
 * Missing storage keys only block production; elsewhere uploads fail per request.
 */
export function validateRuntimePreflight(
  config: ConverterConfig,
  fileExists: FileExists = existsSync
): RuntimePreflightReport {
  const production = config.profile === 'production';
  const warnings: string[] = [];
  const errors: string[] = [];

  const credentialsPath = config.googleCredentialsPath;
  const credentialsFound = Boolean(credentialsPath) && fileExists(credentialsPath);
  if (!credentialsPath) {
    errors.push('GOOGLE_APPLICATION_CREDENTIALS environment variable is required.');
  } else if (!credentialsFound) {
    errors.push(`Google Cloud credentials file not found: ${credentialsPath}`);
  }

  if (config.projectId === PLACEHOLDER_PROJECT_ID) {
    errors.push('GOOGLE_CLOUD_PROJECT_ID must be set to a valid project ID.');
  }

  if (config.storage.bucket === PLACEHOLDER_BUCKET_NAME) {
    errors.push('GCS_BUCKET_NAME must be set to a valid bucket name.');
  }

  const storageHmac = Boolean(config.storage.hmacAccessKeyId) && Boolean(config.storage.hmacSecret);
  if (!storageHmac) {
    const message = 'GCS_HMAC_ACCESS_KEY_ID / GCS_HMAC_SECRET are missing; uploads and signed URLs will fail.';
    if (production) errors.push(message);
    else warnings.push(message);
  }

  if (config.sandbox.timeoutMs > config.requestTimeoutSeconds * 1000) {
    warnings.push('SANDBOX_TIMEOUT_MS exceeds REQUEST_TIMEOUT; scripts may outlive the request deadline.');
  }

  if (errors.length > 0) {
    throw new Error(`[Preflight] Runtime validation failed:\n- ${errors.join('\n- ')}`);
  }

  return {
    profile: config.profile,
    providers: {
      googleCredentials: credentialsFound,
      storageHmac,
    },
    warnings,
  };
}
