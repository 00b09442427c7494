/**
 * Prompts for the JSONL → CSV script generator.
 * The script must read and write the placeholder paths below; the sandbox
 * swaps them for the real files before running it.
 */

import { PLACEHOLDER_INPUT_PATH, PLACEHOLDER_OUTPUT_PATH } from '../../conversion/sandbox-runner';

const BASE_INSTRUCTION_COUNT = 13;

export const JSONL_TO_CSV_PROMPTS = {
  base: `Write a Python script that:
1. Reads the JSONL file at '${PLACEHOLDER_INPUT_PATH}' (it already exists; never modify it).
2. Writes a CSV file to '${PLACEHOLDER_OUTPUT_PATH}' whose columns follow the fields of the response JSON.
3. For every JSONL line:
   - Takes the JSON string found at response['candidates'][0]['content']['parts'][0]['text']
   - Parses that inner JSON and maps its fields onto CSV columns
   - Skips the 'request' field
4. Maps the inner JSON fields the same way they appear in the sample line.
5. Writes '' for any missing field.
6. Wraps the parsing of each line in try/except and reports bad lines on stderr.
7. Imports only the 'json', 'csv' and 'sys' modules.
8. Is returned as code ONLY: no explanations, no Markdown.
9. Has been run against the sample before you answer, and its output matches the request.
10. Parses at least 2 lines successfully; if it would not, return a version that does.
11. Does not fail with "Error parsing inner JSON: Expecting value: line 1 column 1 (char 0)", a frequent error for this kind of input; run it and check its output.
12. Is correct; never return code you have not checked.
13. Keeps every try/except block well formed so the script has no syntax errors.`,

  sampleIntro: (sampleLine: string) =>
    `Here is a sample line from a JSONL file:

${sampleLine}`,

  feedback: (previousError: string) =>
    `Previous attempt failed with this error: ${previousError}
Please modify the code to address this issue.`,
};

/** Default instructions, with the caller's extra instruction as the next numbered item. */
export function buildConversionPrompt(additionalInstruction?: string): string {
  const extra = String(additionalInstruction || '').trim();
  if (!extra) return JSONL_TO_CSV_PROMPTS.base;
  return `${JSONL_TO_CSV_PROMPTS.base}\n${BASE_INSTRUCTION_COUNT + 1}. ${extra}`;
}

export function buildGenerationPrompt(prompt: string, sampleLine: string, feedback?: string): string {
  const parts = [JSONL_TO_CSV_PROMPTS.sampleIntro(sampleLine), prompt];
  if (feedback) {
    parts.push(JSONL_TO_CSV_PROMPTS.feedback(feedback));
  }
  return parts.join('\n\n');
}
