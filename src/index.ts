#!/usr/bin/env node
/**
 * Application Entry Point
 *
 * Usage:
 *   Interactive: node dist/index.js
 *   Self-test:   node dist/index.js --test
 *   Development: npx tsx src/index.ts [--test]
 *
 * Workbooks are written to CHECKLIST_OUTPUT_DIR (default: current directory).
 */

import { appConfig } from './config.js';
import { createConsolePrompter, runInteractive, runSelfTest } from './cli/index.js';

async function main() {
  if (process.argv.includes('--test')) {
    await runSelfTest({ outputDir: appConfig.output.dir });
    return;
  }

  const prompter = createConsolePrompter();
  try {
    await runInteractive(
      { prompter, print: (line) => console.log(line) },
      { defaultLanguage: appConfig.defaults.language },
    );
  } finally {
    prompter.close();
  }
}

main().catch((err) => {
  // Stack traces only in development; production output stays one line
  const detail = appConfig.isDev || !(err instanceof Error) ? err : err.message;
  console.error('[startup] Fatal error:', detail);
  process.exit(1);
});
