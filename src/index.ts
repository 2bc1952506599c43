#!/usr/bin/env node

import { setupCLI } from './cli.js';
import { colors } from './utils/colors.js';
import process from "node:process";

process.on('SIGINT', () => {
  console.log(colors.yellow('\nInterrupted'));
  process.exit(130);
});

setupCLI().parseAsync(process.argv).catch((error: unknown) => {
  console.error(colors.red('Fatal error:'), error);
  process.exit(1);
});
