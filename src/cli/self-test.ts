/**
 * Batch Self-Test
 *
 * Generates two fixed example checklists without user input, exercising the
 * full resolve -> present -> render path:
 * - TechVida Lda: Share Deal / Technology / Portugal / EN
 * - Farma Saúde SA: Merger / Healthcare / Portugal / PT
 *
 * Run with: npx tsx src/index.ts --test
 */

import type { DealContextInput } from '../checklist/validation.js';
import { generateChecklistWorkbook } from '../generator.js';
import type { GenerateOptions } from '../generator.js';

export const SELF_TEST_CASES: readonly DealContextInput[] = [
  {
    targetName: 'TechVida Lda',
    dealType: 'Share Deal',
    sector: 'Technology',
    jurisdiction: 'Portugal',
    language: 'EN',
  },
  {
    targetName: 'Farma Saúde SA',
    dealType: 'Merger',
    sector: 'Healthcare',
    jurisdiction: 'Portugal',
    language: 'PT',
  },
];

type Generate = (input: DealContextInput, options: GenerateOptions) => Promise<string>;

/**
 * Generate every self-test case in sequence.
 *
 * @returns Paths of the generated files, in case order
 */
export async function runSelfTest(
  options: GenerateOptions = {},
  generate: Generate = generateChecklistWorkbook,
): Promise<string[]> {
  console.log('[self-test] Running automated test...');
  const paths: string[] = [];

  for (const input of SELF_TEST_CASES) {
    const filePath = await generate(input, options);
    console.log(`[self-test] Test file (${input.language}) generated: ${filePath}`);
    paths.push(filePath);
  }

  return paths;
}
