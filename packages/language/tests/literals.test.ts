import { readdirSync, readFileSync } from 'node:fs';
import { basename, dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { prettyValue } from '@luma/core';
import { describe, expect, it } from 'vitest';
import { evaluate } from '../src/evaluate.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

interface TestCase {
  source: string;
  expected: string;
  line: number;
}

function parseTestFile(path: string): TestCase[] {
  const content = readFileSync(path, 'utf-8');
  const blocks = content.split(/^======$/m);
  const cases: TestCase[] = [];
  let offset = 0;

  for (const block of blocks) {
    const line = content.slice(0, offset).split('\n').length;
    offset += block.length + 6; // '======'.length

    const trimmed = block.trim();
    if (trimmed === '') continue;

    const parts = trimmed.split(/^---$/m);
    const source = (parts[0] ?? '').trimEnd();
    const expected = (parts[1] ?? '').trim();
    cases.push({ source, expected, line });
  }

  return cases;
}

// A value renders the way prettyValue does; a failure as `<kind>: <message>`.
function render(source: string): string {
  const result = evaluate(source);
  if (result.ok) return prettyValue(result.value);
  return `${result.error.kind}: ${result.error.message}`;
}

function runTestFile(name: string) {
  const cases = parseTestFile(resolve(__dirname, name));

  for (const tc of cases) {
    const firstLine = tc.source.split('\n')[0]?.trim() ?? '';
    it(`L${tc.line}: ${firstLine}`, () => {
      expect(render(tc.source), `source:\n${tc.source}`).toBe(tc.expected);
    });
  }
}

const testFiles = readdirSync(__dirname)
  .filter((f) => f.endsWith('.test'))
  .sort();

for (const file of testFiles) {
  describe(basename(file, '.test'), () => {
    runTestFile(file);
  });
}
