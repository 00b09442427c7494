import { createReadStream } from 'fs';
import { GetObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { Upload } from '@aws-sdk/lib-storage';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import { StorageConfig } from '../../lib/converter-config';
import { buildGcsClient, isGcsConfigured } from './gcs-client';

export type UploadResult = { ok: true; location: string } | { ok: false; error: string };
export type SignUrlResult = { ok: true; url: string } | { ok: false; error: string };

export interface ObjectStore {
  upload(localPath: string, bucket: string, key: string): Promise<UploadResult>;
  signUrl(bucket: string, key: string, ttlSeconds: number): Promise<SignUrlResult>;
}

// V4 signatures cannot outlive seven days.
export const MAX_SIGNED_URL_TTL_SECONDS = 7 * 24 * 60 * 60;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toGsUri(bucket: string, key: string): string {
  return `gs://${bucket}/${key}`;
}

export class GcsObjectStore implements ObjectStore {
  // Lazily initialized so the client is only created when actually used.
  private client: S3Client | null = null;

  constructor(private readonly config: StorageConfig) {}

  private getClient(): S3Client {
    if (!isGcsConfigured(this.config)) {
      throw new Error('Cloud Storage HMAC credentials are not configured');
    }
    if (!this.client) {
      this.client = buildGcsClient(this.config);
    }
    return this.client;
  }

  async upload(localPath: string, bucket: string, key: string): Promise<UploadResult> {
    const location = toGsUri(bucket, key);
    console.log(`[GcsStorage] Uploading ${localPath} to ${location}`);

    try {
      const upload = new Upload({
        client: this.getClient(),
        params: {
          Bucket: bucket,
          Key: key,
          Body: createReadStream(localPath),
          ContentType: 'text/csv',
        },
      });
      await upload.done();

      console.log(`[GcsStorage] Uploaded ${localPath} → ${location}`);
      return { ok: true, location };
    } catch (error: unknown) {
      const message = errorMessage(error);
      console.error(`[GcsStorage] Failed to upload ${location}: ${message}`);
      return { ok: false, error: message };
    }
  }

  async signUrl(bucket: string, key: string, ttlSeconds: number): Promise<SignUrlResult> {
    console.log(`[GcsStorage] Signing ${toGsUri(bucket, key)} for ${ttlSeconds}s`);

    try {
      if (ttlSeconds < 1 || ttlSeconds > MAX_SIGNED_URL_TTL_SECONDS) {
        throw new Error(`Signed URL expiration must be between 1 and ${MAX_SIGNED_URL_TTL_SECONDS} seconds`);
      }
      const url = await getSignedUrl(this.getClient(), new GetObjectCommand({ Bucket: bucket, Key: key }), {
        expiresIn: ttlSeconds,
      });
      return { ok: true, url };
    } catch (error: unknown) {
      const message = errorMessage(error);
      console.error(`[GcsStorage] Failed to generate signed URL: ${message}`);
      return { ok: false, error: message };
    }
  }
}
