import { NextFunction, Request, Response, Router } from 'express';
import { mkdtemp, rm } from 'fs/promises';
import multer from 'multer';
import os from 'os';
import path from 'path';
import { ConverterConfig } from '../lib/converter-config';
import { getRunId } from '../lib/run-id';
import { buildConversionPrompt } from '../services/ai/prompts/jsonl-to-csv-prompts';
import { validateCsv } from '../services/conversion/csv-validator';
import {
  RequestInputError,
  decodeBase64Content,
  filenameStem,
  readFirstLine,
  sanitizeFilename,
  saveInputFile,
} from '../services/conversion/input-file';
import { MISSING_OUTPUT_MESSAGE } from '../services/conversion/retry-orchestrator';
import { ConversionLoop, LoopResult } from '../services/conversion/types';
import { ObjectStore } from '../services/storage/gcs-storage';

export const CONVERT_PATHS = ['/', '/api/jsonl-to-csv'];
export const REQUEST_TIMEOUT_MESSAGE = 'Request exceeded the processing time limit';

export type ConverterDependencies = {
  config: ConverterConfig;
  loop: ConversionLoop;
  objectStore: ObjectStore;
  /** Parent directory for per-request scratch directories; defaults to the OS temp dir. */
  workRoot?: string;
};

type ConversionOptions = {
  projectId: string;
  additionalInstruction: string;
  bucket: string;
  folderPath: string;
  signedUrlExpiration: number;
};

type InputFile = {
  filename: string;
  inputPath: string;
};

export type ErrorDetails = {
  execution_error?: string;
  validation_error?: string;
  file_error?: string;
};

export type ConversionResponse = {
  run_id: string;
  success: boolean;
  original_filename: string;
  attempts: number;
  validation_message?: string;
  row_count?: number;
  column_count?: number;
  columns?: string[];
  gcs_path?: string;
  gcs_error?: string;
  signed_url?: string;
  signed_url_expiration_seconds?: number;
  signed_url_error?: string;
  error_details?: ErrorDetails;
};

function readField(body: unknown, key: string): string | undefined {
  if (typeof body !== 'object' || body === null || !(key in body)) return undefined;
  const value: unknown = Reflect.get(body, key);
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return undefined;
}

function parseExpiration(raw: string | undefined, fallback: number): number {
  if (raw === undefined || !/^\s*[+-]?\d+\s*$/.test(raw)) return fallback;
  return Number.parseInt(raw, 10);
}

function readConversionOptions(body: unknown, config: ConverterConfig, runId: string): ConversionOptions {
  const folder = readField(body, 'gcs_folder_path') ?? `${runId}/${config.storage.defaultFolder}/`;
  return {
    projectId: readField(body, 'project_id') ?? config.projectId,
    additionalInstruction: readField(body, 'additional_instruction') ?? '',
    bucket: readField(body, 'gcs_bucket') ?? config.storage.bucket,
    folderPath: folder && !folder.endsWith('/') ? `${folder}/` : folder,
    signedUrlExpiration: parseExpiration(
      readField(body, 'signed_url_expiration'),
      config.storage.signedUrlExpirationSeconds
    ),
  };
}

async function resolveInputFile(req: Request, workDir: string): Promise<InputFile> {
  const upload = req.file;
  if (upload && upload.originalname !== '') {
    console.log(`[JsonlToCsv] Processing file upload (${upload.size} bytes)`);
    return {
      filename: sanitizeFilename(upload.originalname),
      inputPath: await saveInputFile(upload.buffer, workDir),
    };
  }

  const base64Content = readField(req.body, 'file_base64');
  if (base64Content !== undefined) {
    const originalName = readField(req.body, 'file_name');
    if (originalName === undefined) {
      throw new RequestInputError('file_name is required when using file_base64');
    }
    const inputPath = await saveInputFile(decodeBase64Content(base64Content), workDir);
    console.log(`[JsonlToCsv] Base64 content decoded and saved to ${inputPath}`);
    return { filename: sanitizeFilename(originalName), inputPath };
  }

  throw new RequestInputError(
    'No file provided. Please provide either a file upload or base64 encoded file content with filename.'
  );
}

async function buildErrorDetails(result: LoopResult, outputPath: string): Promise<ErrorDetails> {
  const details: ErrorDetails = {};
  if (!result.executionSuccess) {
    details.execution_error = result.message;
  }
  if (!result.validationSuccess) {
    details.validation_error = result.outputExists
      ? result.validationMessage ?? (await validateCsv(outputPath)).message
      : 'CSV file was not created';
  }
  if (!result.outputExists) {
    details.file_error = MISSING_OUTPUT_MESSAGE;
  }
  return details;
}

async function publishCsv(
  objectStore: ObjectStore,
  outputPath: string,
  objectKey: string,
  options: ConversionOptions
): Promise<Partial<ConversionResponse>> {
  const uploaded = await objectStore.upload(outputPath, options.bucket, objectKey);
  if (!uploaded.ok) {
    return { gcs_error: uploaded.error };
  }

  const signed = await objectStore.signUrl(options.bucket, objectKey, options.signedUrlExpiration);
  if (!signed.ok) {
    return { gcs_path: uploaded.location, signed_url_error: signed.error };
  }

  return {
    gcs_path: uploaded.location,
    signed_url: signed.url,
    signed_url_expiration_seconds: options.signedUrlExpiration,
  };
}

type HandlerOutcome = { status: number; body: ConversionResponse | { error: string } };

async function handleConversion(req: Request, deps: ConverterDependencies, runId: string): Promise<HandlerOutcome> {
  let workDir: string | null = null;

  try {
    const options = readConversionOptions(req.body, deps.config, runId);
    console.log(
      `[JsonlToCsv] ${runId} project=${options.projectId} bucket=${options.bucket} folder=${options.folderPath} ` +
        `additionalInstruction=${options.additionalInstruction.length > 0}`
    );

    workDir = await mkdtemp(path.join(deps.workRoot || os.tmpdir(), 'jsonl-to-csv-'));
    const { filename, inputPath } = await resolveInputFile(req, workDir);
    const stem = filenameStem(filename);
    const outputPath = path.join(workDir, `${stem}.csv`);

    const sampleLine = await readFirstLine(inputPath);
    if (!sampleLine) {
      throw new RequestInputError('Input file is empty');
    }
    console.log(`[JsonlToCsv] ${runId} processing ${filename}; first line: ${sampleLine.slice(0, 100)}...`);

    const result = await deps.loop.run({
      inputPath,
      outputPath,
      prompt: buildConversionPrompt(options.additionalInstruction),
      sampleLine,
      maxAttempts: deps.config.maxRetryAttempts,
      projectId: options.projectId,
    });

    let response: ConversionResponse = {
      run_id: runId,
      success: result.success,
      original_filename: filename,
      attempts: result.attempts,
    };

    if (result.success) {
      response = {
        ...response,
        validation_message: result.validationMessage ?? undefined,
        row_count: result.rowCount,
        column_count: result.columns.length,
        columns: [...result.columns],
        ...(await publishCsv(deps.objectStore, outputPath, `${options.folderPath}${stem}.csv`, options)),
      };
      console.log(
        `[JsonlToCsv] ${runId} converted ${filename}: ${result.rowCount} rows, ${result.columns.length} columns`
      );
    } else {
      response.error_details = await buildErrorDetails(result, outputPath);
      console.error(`[JsonlToCsv] ${runId} conversion failed:`, response.error_details);
    }

    return { status: 200, body: response };
  } catch (error: unknown) {
    if (error instanceof RequestInputError) {
      console.error(`[JsonlToCsv] ${runId} ${error.message}`);
      return { status: error.status, body: { error: error.message } };
    }
    throw error;
  } finally {
    if (workDir) {
      const dir = workDir;
      await rm(dir, { recursive: true, force: true }).then(
        () => console.log(`[JsonlToCsv] ${runId} temporary files cleaned up`),
        (cleanupError: unknown) => console.warn(`[JsonlToCsv] ${runId} error during cleanup:`, cleanupError)
      );
    }
  }
}

export function createJsonlToCsvRouter(deps: ConverterDependencies): Router {
  const router = Router();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: deps.config.maxUploadBytes, files: 1 },
  });
  const deadlineMs = deps.config.requestTimeoutSeconds * 1000;

  router.post(CONVERT_PATHS, upload.single('file'), async (req: Request, res: Response, next: NextFunction) => {
    const runId = getRunId(res);
    const conversion = handleConversion(req, deps, runId)
      .then((value) => ({ kind: 'result' as const, value }))
      .catch((error: unknown) => ({ kind: 'error' as const, error }));

    let timer: NodeJS.Timeout | undefined;
    const raceResult = await Promise.race([
      conversion,
      new Promise<{ kind: 'timeout' }>((resolve) => {
        timer = setTimeout(() => resolve({ kind: 'timeout' }), deadlineMs);
      }),
    ]);
    clearTimeout(timer);

    if (raceResult.kind === 'result') {
      res.status(raceResult.value.status).json(raceResult.value.body);
      return;
    }

    if (raceResult.kind === 'error') {
      next(raceResult.error);
      return;
    }

    console.error(`[JsonlToCsv] ${runId} exceeded REQUEST_TIMEOUT (${deps.config.requestTimeoutSeconds}s)`);
    res.status(500).json({ error: REQUEST_TIMEOUT_MESSAGE, success: false, run_id: runId });
    void conversion.then((late) =>
      console.warn(`[JsonlToCsv] ${runId} conversion finished after the deadline (${late.kind})`)
    );
  });

  router.all(CONVERT_PATHS, (req: Request, res: Response) => {
    console.error(`[JsonlToCsv] ${getRunId(res)} invalid method ${req.method}, only POST supported`);
    res.status(400).json({ error: 'Only POST method is supported' });
  });

  return router;
}
