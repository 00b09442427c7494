import { execFile } from 'child_process';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { promisify } from 'util';
import { ExecutionOutcome, ScriptSandbox } from './types';

const execFileAsync = promisify(execFile);

/** Paths the generation prompt tells the model to hardcode. */
export const PLACEHOLDER_INPUT_PATH = '/home/user/input.jsonl';
export const PLACEHOLDER_OUTPUT_PATH = '/home/user/output.csv';

const DEFAULT_MAX_BUFFER_BYTES = 10 * 1024 * 1024;

export type SandboxRunnerOptions = {
  executable: string;
  /** Interpreter flags placed before the script path, e.g. `-I` for isolated Python. */
  executableArgs?: string[];
  scriptExtension?: string;
  timeoutMs?: number;
  maxBufferBytes?: number;
  /** Parent directory for the per-run scratch directory. */
  workRoot?: string;
};

function sanitizeForLog(text: string, maxLen = 500): string {
  return text.replace(/\s+/g, ' ').slice(0, maxLen).trim();
}

function describeFailure(error: unknown): string {
  if (typeof error !== 'object' || error === null) return String(error);

  const stderr = 'stderr' in error && typeof error.stderr === 'string' ? error.stderr : '';
  if (stderr.trim()) return stderr;

  if ('killed' in error && error.killed === true && 'signal' in error && error.signal) {
    return `Script was terminated by ${String(error.signal)} (timeout or output limit exceeded)`;
  }
  return 'message' in error && typeof error.message === 'string' ? error.message : String(error);
}

export function rewritePlaceholderPaths(code: string, inputPath: string, outputPath: string): string {
  return code
    .split(PLACEHOLDER_INPUT_PATH)
    .join(inputPath)
    .split(PLACEHOLDER_OUTPUT_PATH)
    .join(outputPath);
}

function buildSandboxEnv(): NodeJS.ProcessEnv {
  return {
    PATH: process.env.PATH || '/usr/local/bin:/usr/bin:/bin',
    LANG: process.env.LANG || 'C.UTF-8',
    PYTHONIOENCODING: 'utf-8',
    PYTHONDONTWRITEBYTECODE: '1',
  };
}

/**
 * Runs generated scripts in a child interpreter, one scratch directory per run.
 */
export class SandboxRunner implements ScriptSandbox {
  private readonly options: SandboxRunnerOptions;

  constructor(options: SandboxRunnerOptions) {
    this.options = options;
  }

  async run(code: string, inputPath: string, outputPath: string): Promise<ExecutionOutcome> {
    let workDir: string | null = null;

    try {
      workDir = await mkdtemp(path.join(this.options.workRoot || os.tmpdir(), 'sandbox-'));
      const scriptPath = path.join(workDir, `script${this.options.scriptExtension || '.py'}`);
      await writeFile(scriptPath, rewritePlaceholderPaths(code, inputPath, outputPath), 'utf-8');

      console.log(`[Sandbox] Running ${scriptPath} (input=${inputPath}, output=${outputPath})`);
      const { stdout } = await execFileAsync(
        this.options.executable,
        [...(this.options.executableArgs || []), scriptPath],
        {
          cwd: workDir,
          env: buildSandboxEnv(),
          timeout: this.options.timeoutMs || 120_000,
          maxBuffer: this.options.maxBufferBytes || DEFAULT_MAX_BUFFER_BYTES,
          encoding: 'utf8',
        }
      );

      console.log('[Sandbox] Script exited with status 0');
      return { success: true, output: stdout };
    } catch (error: unknown) {
      const output = describeFailure(error);
      console.error(`[Sandbox] Execution failed: ${sanitizeForLog(output)}`);
      return { success: false, output };
    } finally {
      if (workDir) {
        await rm(workDir, { recursive: true, force: true }).catch((cleanupError: unknown) => {
          console.warn(`[Sandbox] Failed to remove ${workDir}:`, cleanupError);
        });
      }
    }
  }
}
