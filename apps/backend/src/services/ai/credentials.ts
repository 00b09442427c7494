import { GoogleAuth } from 'google-auth-library';

const CLOUD_PLATFORM_SCOPE = 'https://www.googleapis.com/auth/cloud-platform';

export interface CredentialProvider {
  /** Bearer token for the generation endpoint, or null when none could be obtained. */
  getAccessToken(): Promise<string | null>;
}

/**
 * Application-default Google credentials (service account file or metadata
 * server). Token refresh and caching are left to google-auth-library.
 */
export class GoogleCredentialProvider implements CredentialProvider {
  private auth: GoogleAuth | undefined;

  constructor(private readonly keyFilename?: string) {}

  private getAuth(): GoogleAuth {
    if (!this.auth) {
      this.auth = new GoogleAuth({
        scopes: [CLOUD_PLATFORM_SCOPE],
        keyFilename: this.keyFilename || undefined,
      });
    }
    return this.auth;
  }

  async getAccessToken(): Promise<string | null> {
    try {
      const token = await this.getAuth().getAccessToken();
      if (!token) {
        console.error('[Credentials] Google auth returned an empty access token');
        return null;
      }
      return token;
    } catch (error: unknown) {
      console.error('[Credentials] Failed to get access token:', error instanceof Error ? error.message : error);
      return null;
    }
  }
}
