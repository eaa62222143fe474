export { runInteractive, choose, askText, askYesNo } from './interactive.js';
export type { InteractiveIO, InteractiveOptions } from './interactive.js';
export { runSelfTest, SELF_TEST_CASES } from './self-test.js';
export { formatPreview } from './preview.js';
export { createConsolePrompter } from './prompter.js';
export type { Prompter } from './prompter.js';
