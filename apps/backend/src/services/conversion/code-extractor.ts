const LABELED_FENCE = /```python\s+([\s\S]*?)\s+```/;
const FENCE = '```';

/**
 * Pull a runnable script out of free-form model output.
 * Total: anything that is not recognisably code comes back unchanged.
 */
export function extractCode(rawText: string): string {
  const labeled = LABELED_FENCE.exec(rawText);
  if (labeled) {
    return labeled[1];
  }

  const codeLines: string[] = [];
  let insideFence = false;

  for (const line of rawText.split('\n')) {
    const trimmed = line.trim();
    if (trimmed === FENCE || trimmed === '```python') {
      insideFence = !insideFence;
      continue;
    }
    if (insideFence || !line.includes(FENCE)) {
      codeLines.push(line);
    }
  }

  if (codeLines.length > 0) {
    return codeLines.join('\n');
  }

  console.warn('[CodeExtractor] No code found in model output, returning it unchanged');
  return rawText;
}
