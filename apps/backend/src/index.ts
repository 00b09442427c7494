import http from 'http';
import { createApp } from './app';
import { ConverterConfig, loadConverterConfig } from './lib/converter-config';
import { loadBackendEnv } from './lib/load-env';
import { validateRuntimePreflight } from './lib/runtime-preflight';
import { ConverterDependencies } from './routes/jsonl-to-csv';
import { GoogleCredentialProvider } from './services/ai/credentials';
import { ModelClient } from './services/ai/model-client';
import { RetryOrchestrator } from './services/conversion/retry-orchestrator';
import { SandboxRunner } from './services/conversion/sandbox-runner';
import { GcsObjectStore } from './services/storage/gcs-storage';

function buildDependencies(config: ConverterConfig): ConverterDependencies {
  const generator = new ModelClient({
    config: config.model,
    defaultProjectId: config.projectId,
    credentials: new GoogleCredentialProvider(config.googleCredentialsPath),
  });
  const sandbox = new SandboxRunner({
    executable: config.sandbox.pythonExecutable,
    executableArgs: ['-I'],
    scriptExtension: '.py',
    timeoutMs: config.sandbox.timeoutMs,
  });

  return {
    config,
    loop: new RetryOrchestrator({ generator, sandbox, retryDelayMs: config.retryDelayMs }),
    objectStore: new GcsObjectStore(config.storage),
  };
}

async function startServer(): Promise<void> {
  const envLoad = loadBackendEnv();
  const config = loadConverterConfig();
  const preflight = validateRuntimePreflight(config);

  console.log(
    `[Preflight] profile=${preflight.profile} providers(googleCredentials=${preflight.providers.googleCredentials}, storageHmac=${preflight.providers.storageHmac}) shellCredentialsPreSet=${envLoad.hadPreexistingCredentialsPath} backendEnvOverride=${envLoad.backendEnvOverride}`
  );
  for (const warning of preflight.warnings) {
    console.warn(`[Preflight] ${warning}`);
  }

  const app = createApp(buildDependencies(config));
  const server = http.createServer(app);
  server.requestTimeout = config.requestTimeoutSeconds * 1000;

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(config.port, () => resolve());
  });

  console.log(`🚀 JSONL → CSV converter running on http://localhost:${config.port}`);
  console.log(`📊 Health check: http://localhost:${config.port}/api/health`);
  console.log(`🤖 Model: ${config.model.model} (max ${config.maxRetryAttempts} attempts)`);
}

void startServer().catch((error) => {
  console.error('[Startup] Failed to boot converter:', error);
  process.exit(1);
});
