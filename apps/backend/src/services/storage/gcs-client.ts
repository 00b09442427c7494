import { S3Client } from '@aws-sdk/client-s3';
import { StorageConfig } from '../../lib/converter-config';

/**
 * Cloud Storage client over the S3-compatible XML API.
 *
 * Required config:
 *   GCS_ENDPOINT            = https://storage.googleapis.com
 *   GCS_HMAC_ACCESS_KEY_ID  = HMAC key of a service account with write access
 *   GCS_HMAC_SECRET         = HMAC secret
 */
export function isGcsConfigured(config: StorageConfig): boolean {
  return Boolean(config.endpoint) && Boolean(config.hmacAccessKeyId) && Boolean(config.hmacSecret);
}

export function buildGcsClient(config: StorageConfig): S3Client {
  return new S3Client({
    region: 'auto',
    endpoint: config.endpoint,
    forcePathStyle: true,
    // The interoperability API does not accept the SDK's default flexible checksums.
    requestChecksumCalculation: 'WHEN_REQUIRED',
    responseChecksumValidation: 'WHEN_REQUIRED',
    credentials: {
      accessKeyId: config.hmacAccessKeyId,
      secretAccessKey: config.hmacSecret,
    },
  });
}
