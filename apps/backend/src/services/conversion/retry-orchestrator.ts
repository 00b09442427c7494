import { access, rm } from 'fs/promises';
import { extractCode } from './code-extractor';
import { validateCsv } from './csv-validator';
import {
  Attempt,
  AttemptPhase,
  CodeGenerator,
  ConversionLoop,
  CsvValidationResult,
  LoopRequest,
  LoopResult,
  ScriptSandbox,
} from './types';

export const GENERATION_FAILED_MESSAGE = 'Failed to generate code from AI model';
export const MISSING_OUTPUT_MESSAGE = 'Output CSV file was not created';

export type RetryOrchestratorDeps = {
  generator: CodeGenerator;
  sandbox: ScriptSandbox;
  validate?: (outputPath: string) => Promise<CsvValidationResult>;
  extract?: (rawText: string) => string;
  fileExists?: (filePath: string) => Promise<boolean>;
  removeFile?: (filePath: string) => Promise<void>;
  retryDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

async function removeFile(filePath: string): Promise<void> {
  await rm(filePath, { force: true });
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isSuccessful(attempt: Attempt): boolean {
  return Boolean(attempt.execution?.success && attempt.outputExists && attempt.validation?.success);
}

/**
 * The message handed to the next generation call, or undefined to keep the
 * previous one (a failed model call says nothing about the code).
 */
function feedbackFor(attempt: Attempt): string | undefined {
  if (!attempt.execution) return undefined;
  if (!attempt.execution.success) return attempt.execution.output;
  if (!attempt.outputExists) return MISSING_OUTPUT_MESSAGE;
  return attempt.validation?.message;
}

function toLoopResult(attempt: Attempt): LoopResult {
  return Object.freeze({
    code: attempt.code,
    success: isSuccessful(attempt),
    executionSuccess: Boolean(attempt.execution?.success),
    message: attempt.execution ? attempt.execution.output : GENERATION_FAILED_MESSAGE,
    validationSuccess: Boolean(attempt.validation?.success),
    validationMessage: attempt.validation?.message ?? null,
    outputExists: attempt.outputExists,
    generationFailed: attempt.rawText === null,
    attempts: attempt.index,
    rowCount: attempt.validation?.rowCount ?? 0,
    columns: Object.freeze([...(attempt.validation?.columns ?? [])]),
  });
}

/**
 * Generate → extract → execute → validate, retried with the previous failure
 * as feedback. Attempts run strictly one after another and `run` always
 * resolves; after the last attempt its result is returned as is.
 */
export class RetryOrchestrator implements ConversionLoop {
  private readonly deps: Required<RetryOrchestratorDeps>;

  constructor(deps: RetryOrchestratorDeps) {
    this.deps = {
      validate: validateCsv,
      extract: extractCode,
      fileExists,
      removeFile,
      retryDelayMs: 2000,
      sleep,
      ...deps,
    };
  }

  async run(request: LoopRequest): Promise<LoopResult> {
    const maxAttempts = Number.isFinite(request.maxAttempts) ? Math.max(1, Math.floor(request.maxAttempts)) : 1;
    let feedback: string | undefined;

    for (let index = 1; ; index++) {
      const attempt = await this.runAttempt(index, maxAttempts, request, feedback);
      const result = toLoopResult(attempt);

      if (result.success) {
        console.log(`[RetryLoop] Attempt ${index}/${maxAttempts} succeeded`);
        return result;
      }

      if (index >= maxAttempts) {
        console.warn(`[RetryLoop] Exhausted ${maxAttempts} attempt(s); returning the last result`);
        return result;
      }

      feedback = feedbackFor(attempt) ?? feedback;
      console.warn(
        `[RetryLoop] Retry condition met: execution=${Boolean(attempt.execution?.success)}, ` +
          `output_exists=${attempt.outputExists}, validation=${result.validationSuccess}`
      );
      await this.deps.sleep(this.deps.retryDelayMs);
    }
  }

  private enter(attempt: Attempt, phase: AttemptPhase, maxAttempts: number): void {
    attempt.phase = phase;
    console.log(`[RetryLoop] Attempt ${attempt.index}/${maxAttempts}: ${phase}`);
  }

  private async runAttempt(
    index: number,
    maxAttempts: number,
    request: LoopRequest,
    feedback: string | undefined
  ): Promise<Attempt> {
    const attempt: Attempt = {
      index,
      phase: 'generating',
      rawText: null,
      code: null,
      execution: null,
      outputExists: false,
      validation: null,
    };

    this.enter(attempt, 'generating', maxAttempts);
    try {
      attempt.rawText = await this.deps.generator.generate({
        prompt: request.prompt,
        sampleLine: request.sampleLine,
        feedback,
        projectId: request.projectId,
      });
    } catch (error: unknown) {
      console.error(`[RetryLoop] Generator threw: ${errorMessage(error)}`);
      attempt.rawText = null;
    }

    if (!attempt.rawText) {
      attempt.rawText = null;
      console.error(`[RetryLoop] ${GENERATION_FAILED_MESSAGE}`);
      this.enter(attempt, 'failed', maxAttempts);
      return attempt;
    }

    this.enter(attempt, 'extracting', maxAttempts);
    attempt.code = this.deps.extract(attempt.rawText);

    this.enter(attempt, 'executing', maxAttempts);
    try {
      await this.deps.removeFile(request.outputPath);
      attempt.execution = await this.deps.sandbox.run(attempt.code, request.inputPath, request.outputPath);
    } catch (error: unknown) {
      attempt.execution = { success: false, output: errorMessage(error) };
    }
    attempt.outputExists = await this.deps.fileExists(request.outputPath);

    if (!attempt.execution.success || !attempt.outputExists) {
      console.warn(
        `[RetryLoop] Execution or file creation failed: success=${attempt.execution.success}, output_exists=${attempt.outputExists}`
      );
      this.enter(attempt, 'failed', maxAttempts);
      return attempt;
    }

    this.enter(attempt, 'validating', maxAttempts);
    try {
      attempt.validation = await this.deps.validate(request.outputPath);
    } catch (error: unknown) {
      attempt.validation = { success: false, message: `CSV validation failed: ${errorMessage(error)}`, rowCount: 0, columns: [] };
    }
    console.log(
      `[RetryLoop] Validation result: success=${attempt.validation.success}, message=${attempt.validation.message}`
    );

    this.enter(attempt, attempt.validation.success ? 'succeeded' : 'failed', maxAttempts);
    return attempt;
  }
}
