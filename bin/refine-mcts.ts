#!/usr/bin/env node
import { createLogger, setLogger } from '../src/core/logger.js';

// Modules take their logger when first imported, so swap it in before loading the CLI
if (process.argv.includes('--verbose')) {
  setLogger(createLogger('refine-mcts', true));
}

const { main } = await import('../src/cli/index.js');
await main();
