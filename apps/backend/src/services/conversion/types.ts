export type ExecutionOutcome = {
  success: boolean;
  /** stdout on success, stderr (or the launch error) on failure */
  output: string;
};

export type CsvValidationResult = {
  success: boolean;
  message: string;
  rowCount: number;
  columns: string[];
};

export type GenerationRequest = {
  prompt: string;
  sampleLine: string;
  feedback?: string;
  projectId?: string;
};

export interface CodeGenerator {
  /** Resolves to null when no usable text came back; never rejects for transport errors. */
  generate(request: GenerationRequest): Promise<string | null>;
}

export interface ScriptSandbox {
  run(code: string, inputPath: string, outputPath: string): Promise<ExecutionOutcome>;
}

export type AttemptPhase =
  | 'generating'
  | 'extracting'
  | 'executing'
  | 'validating'
  | 'succeeded'
  | 'failed';

export type Attempt = {
  index: number;
  phase: AttemptPhase;
  rawText: string | null;
  code: string | null;
  execution: ExecutionOutcome | null;
  outputExists: boolean;
  validation: CsvValidationResult | null;
};

export type LoopResult = Readonly<{
  code: string | null;
  success: boolean;
  executionSuccess: boolean;
  message: string;
  validationSuccess: boolean;
  validationMessage: string | null;
  outputExists: boolean;
  generationFailed: boolean;
  attempts: number;
  rowCount: number;
  columns: readonly string[];
}>;

export type LoopRequest = {
  inputPath: string;
  outputPath: string;
  prompt: string;
  sampleLine: string;
  maxAttempts: number;
  projectId?: string;
};

export interface ConversionLoop {
  run(request: LoopRequest): Promise<LoopResult>;
}
