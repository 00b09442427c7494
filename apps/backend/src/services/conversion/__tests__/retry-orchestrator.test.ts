import { describe, test, expect, jest } from '@jest/globals';
import {
  GENERATION_FAILED_MESSAGE,
  MISSING_OUTPUT_MESSAGE,
  RetryOrchestrator,
} from '../retry-orchestrator';
import { CodeGenerator, CsvValidationResult, ExecutionOutcome, LoopRequest, ScriptSandbox } from '../types';

const REQUEST: LoopRequest = {
  inputPath: '/work/input.jsonl',
  outputPath: '/work/data.csv',
  prompt: 'Convert it',
  sampleLine: '{"id":1}',
  maxAttempts: 3,
  projectId: 'test-project',
};

const VALID: CsvValidationResult = {
  success: true,
  message: 'All columns contain some data',
  rowCount: 2,
  columns: ['id', 'name'],
};

type Harness = {
  orchestrator: RetryOrchestrator;
  generate: jest.Mock<CodeGenerator['generate']>;
  run: jest.Mock<ScriptSandbox['run']>;
  validate: jest.Mock<(outputPath: string) => Promise<CsvValidationResult>>;
  fileExists: jest.Mock<(filePath: string) => Promise<boolean>>;
  removeFile: jest.Mock<(filePath: string) => Promise<void>>;
  sleep: jest.Mock<(ms: number) => Promise<void>>;
};

function createHarness(): Harness {
  const generate = jest.fn<CodeGenerator['generate']>();
  const run = jest.fn<ScriptSandbox['run']>();
  const validate = jest.fn<(outputPath: string) => Promise<CsvValidationResult>>().mockResolvedValue(VALID);
  const fileExists = jest.fn<(filePath: string) => Promise<boolean>>().mockResolvedValue(true);
  const removeFile = jest.fn<(filePath: string) => Promise<void>>().mockResolvedValue(undefined);
  const sleep = jest.fn<(ms: number) => Promise<void>>().mockResolvedValue(undefined);

  const orchestrator = new RetryOrchestrator({
    generator: { generate },
    sandbox: { run },
    validate,
    fileExists,
    removeFile,
    retryDelayMs: 2000,
    sleep,
  });

  return { orchestrator, generate, run, validate, fileExists, removeFile, sleep };
}

function executed(output = 'done\n'): ExecutionOutcome {
  return { success: true, output };
}

function crashed(stderr: string): ExecutionOutcome {
  return { success: false, output: stderr };
}

describe('RetryOrchestrator', () => {
  test('returns after one model call when the first attempt succeeds', async () => {
    const h = createHarness();
    h.generate.mockResolvedValueOnce("```python\nprint('ok')\n```");
    h.run.mockResolvedValueOnce(executed('ok\n'));

    const result = await h.orchestrator.run(REQUEST);

    expect(h.generate).toHaveBeenCalledTimes(1);
    expect(h.generate).toHaveBeenCalledWith({
      prompt: 'Convert it',
      sampleLine: '{"id":1}',
      feedback: undefined,
      projectId: 'test-project',
    });
    expect(h.run).toHaveBeenCalledWith("print('ok')", '/work/input.jsonl', '/work/data.csv');
    expect(h.sleep).not.toHaveBeenCalled();
    expect(result).toEqual({
      code: "print('ok')",
      success: true,
      executionSuccess: true,
      message: 'ok\n',
      validationSuccess: true,
      validationMessage: 'All columns contain some data',
      outputExists: true,
      generationFailed: false,
      attempts: 1,
      rowCount: 2,
      columns: ['id', 'name'],
    });
  });

  test('never makes more model calls than maxAttempts', async () => {
    const h = createHarness();
    h.generate.mockResolvedValue(null);

    const result = await h.orchestrator.run({ ...REQUEST, maxAttempts: 4 });

    expect(h.generate).toHaveBeenCalledTimes(4);
    expect(h.run).not.toHaveBeenCalled();
    expect(h.sleep).toHaveBeenCalledTimes(3);
    expect(h.sleep).toHaveBeenCalledWith(2000);
    expect(result.success).toBe(false);
    expect(result.generationFailed).toBe(true);
    expect(result.code).toBeNull();
    expect(result.message).toBe(GENERATION_FAILED_MESSAGE);
    expect(result.attempts).toBe(4);
  });

  test('treats maxAttempts below one as a single attempt', async () => {
    const h = createHarness();
    h.generate.mockResolvedValue(null);

    await h.orchestrator.run({ ...REQUEST, maxAttempts: 0 });

    expect(h.generate).toHaveBeenCalledTimes(1);
  });

  test('feeds each failure into the next generation call', async () => {
    const h = createHarness();
    h.generate.mockResolvedValue('print(1)');
    h.run
      .mockResolvedValueOnce(crashed('Traceback: KeyError'))
      .mockResolvedValueOnce(executed())
      .mockResolvedValueOnce(executed());
    h.validate
      .mockResolvedValueOnce({ success: false, message: 'CSV file is empty', rowCount: 0, columns: ['id'] })
      .mockResolvedValueOnce(VALID);

    const result = await h.orchestrator.run(REQUEST);

    expect(result.success).toBe(true);
    expect(result.attempts).toBe(3);
    expect(h.generate.mock.calls.map(([request]) => request.feedback)).toEqual([
      undefined,
      'Traceback: KeyError',
      'CSV file is empty',
    ]);
  });

  test('asks for a fix when the script produced no file', async () => {
    const h = createHarness();
    h.generate.mockResolvedValue('print(1)');
    h.run.mockResolvedValue(executed());
    h.fileExists.mockResolvedValueOnce(false).mockResolvedValueOnce(true);

    await h.orchestrator.run(REQUEST);

    expect(h.generate.mock.calls[1][0].feedback).toBe(MISSING_OUTPUT_MESSAGE);
    expect(h.validate).toHaveBeenCalledTimes(1);
  });

  test('keeps the previous feedback across a failed model call', async () => {
    const h = createHarness();
    h.generate
      .mockResolvedValueOnce('print(1)')
      .mockResolvedValueOnce(null)
      .mockResolvedValueOnce('print(3)');
    h.run.mockResolvedValueOnce(crashed('E1')).mockResolvedValueOnce(executed());

    const result = await h.orchestrator.run(REQUEST);

    expect(result.success).toBe(true);
    expect(h.generate.mock.calls.map(([request]) => request.feedback)).toEqual([undefined, 'E1', 'E1']);
  });

  test('returns the last attempt as is after exhausting retries', async () => {
    const h = createHarness();
    h.generate.mockResolvedValueOnce('first()').mockResolvedValueOnce('second()');
    h.run.mockResolvedValueOnce(crashed('E1')).mockResolvedValueOnce(executed('wrote nothing\n'));
    h.fileExists.mockResolvedValue(false);

    const result = await h.orchestrator.run({ ...REQUEST, maxAttempts: 2 });

    expect(result).toEqual({
      code: 'second()',
      success: false,
      executionSuccess: true,
      message: 'wrote nothing\n',
      validationSuccess: false,
      validationMessage: null,
      outputExists: false,
      generationFailed: false,
      attempts: 2,
      rowCount: 0,
      columns: [],
    });
  });

  test('stops on a success that only carries a blank-column warning', async () => {
    const h = createHarness();
    h.generate.mockResolvedValue('print(1)');
    h.run.mockResolvedValue(executed());
    h.validate.mockResolvedValue({
      success: true,
      message: 'Warning: the following columns contain no data: city',
      rowCount: 2,
      columns: ['name', 'city'],
    });

    const result = await h.orchestrator.run(REQUEST);

    expect(h.generate).toHaveBeenCalledTimes(1);
    expect(result.success).toBe(true);
    expect(result.validationMessage).toBe('Warning: the following columns contain no data: city');
  });

  test('clears any earlier output before each execution', async () => {
    const h = createHarness();
    h.generate.mockResolvedValue('print(1)');
    h.run.mockResolvedValueOnce(crashed('E1')).mockResolvedValueOnce(executed());

    await h.orchestrator.run(REQUEST);

    expect(h.removeFile).toHaveBeenCalledTimes(2);
    expect(h.removeFile).toHaveBeenCalledWith('/work/data.csv');
  });

  test('turns collaborator exceptions into failed attempts', async () => {
    const h = createHarness();
    h.generate.mockRejectedValueOnce(new Error('socket hang up')).mockResolvedValueOnce('print(1)');
    h.run.mockRejectedValueOnce(new Error('spawn failed'));
    h.fileExists.mockResolvedValue(false);

    const result = await h.orchestrator.run({ ...REQUEST, maxAttempts: 2 });

    expect(result.success).toBe(false);
    expect(result.executionSuccess).toBe(false);
    expect(result.message).toBe('spawn failed');
    expect(h.generate.mock.calls[1][0].feedback).toBeUndefined();
  });
});
