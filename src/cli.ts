#!/usr/bin/env node
import { createRequire } from 'module';
import { Command } from 'commander';
import { createScanCommand } from './commands/scan.js';
import { extractErrorMessage } from './utils/error-handler.js';

// Get version from package.json
const require = createRequire(import.meta.url);
const pkg: { version: string } = require('../package.json');

const program = new Command('smellscope')
  .description('Detect code smells in TypeScript and JavaScript sources')
  .version(pkg.version);

program.addCommand(createScanCommand(), { isDefault: true });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(extractErrorMessage(error));
  process.exit(1);
});
