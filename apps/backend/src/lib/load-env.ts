import dotenv from 'dotenv';
import path from 'path';

export type EnvLoadReport = {
  backendEnvOverride: boolean;
  hadPreexistingCredentialsPath: boolean;
};

export type EnvLoadOptions = {
  /** Repository root; `.env` there and in `apps/backend` are read. */
  rootDir?: string;
  /** Target object; process.env when omitted. */
  env?: Record<string, string>;
};

const DEFAULT_ROOT_DIR = path.resolve(__dirname, '../../../..');

/** Root `.env` fills gaps only; `apps/backend/.env` overrides the shell outside production. */
export function loadBackendEnv(options: EnvLoadOptions = {}): EnvLoadReport {
  const env = options.env ?? process.env;
  const target = options.env ? { processEnv: options.env } : {};
  const rootDir = options.rootDir ?? DEFAULT_ROOT_DIR;
  const backendEnvOverride = String(env.NODE_ENV || '').toLowerCase() !== 'production';
  const hadPreexistingCredentialsPath = Boolean(String(env.GOOGLE_APPLICATION_CREDENTIALS || '').trim());

  dotenv.config({ path: path.join(rootDir, '.env'), override: false, ...target });
  dotenv.config({
    path: path.join(rootDir, 'apps', 'backend', '.env'),
    override: backendEnvOverride,
    ...target,
  });

  return { backendEnvOverride, hadPreexistingCredentialsPath };
}
