import cors from 'cors';
import express, { NextFunction, Request, Response } from 'express';
import { MulterError } from 'multer';
import { attachRunId, getRunId } from './lib/run-id';
import { ConverterDependencies, createJsonlToCsvRouter } from './routes/jsonl-to-csv';

export const PAYLOAD_TOO_LARGE_MESSAGE = 'File upload error: File too large';

function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== 'object' || err === null) return null;
  const status = 'status' in err ? err.status : undefined;
  const expose = 'expose' in err ? err.expose : undefined;
  if (typeof status === 'number' && status >= 400 && status < 500 && expose === true) {
    return status;
  }
  return null;
}

export function createApp(deps: ConverterDependencies): express.Express {
  const app = express();
  const bodyLimit = deps.config.maxUploadBytes;

  app.use(cors());
  app.use(attachRunId);
  app.use(express.json({ limit: bodyLimit }));
  app.use(express.urlencoded({ extended: false, limit: bodyLimit }));

  app.get('/api/health', (req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      model: deps.config.model.model,
      maxRetryAttempts: deps.config.maxRetryAttempts,
    });
  });

  app.use(createJsonlToCsvRouter(deps));

  // Error handling
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const runId = getRunId(res);

    if (res.headersSent) {
      console.error(`[Server Error] ${runId} after response was sent:`, err);
      return;
    }

    if (err instanceof MulterError) {
      console.error(`[Server Error] ${runId} upload rejected: ${err.message}`);
      res.status(400).json({ error: `File upload error: ${err.message}`, code: err.code, run_id: runId });
      return;
    }

    const clientStatus = clientErrorStatus(err);
    if (clientStatus === 413) {
      console.error(`[Server Error] ${runId} request body over ${bodyLimit} bytes`);
      res.status(413).json({ error: PAYLOAD_TOO_LARGE_MESSAGE, code: 'LIMIT_FILE_SIZE', run_id: runId });
      return;
    }
    if (clientStatus !== null) {
      console.error(`[Server Error] ${runId} malformed request body:`, err);
      res.status(clientStatus).json({ error: 'Malformed request body', run_id: runId });
      return;
    }

    console.error(`[Server Error] ${runId}:`, err);
    res.status(500).json({
      error: 'Unexpected error in cloud function',
      success: false,
      run_id: runId,
      details: process.env.NODE_ENV === 'development' && err instanceof Error ? err.message : undefined,
    });
  });

  return app;
}
