#!/usr/bin/env node
/**
 * Drover CLI
 *
 * Run browser automation tasks against a pool of headless Chrome sessions
 */

import { Command } from 'commander';
import { config } from 'dotenv';
import { runCommand } from './commands/run.js';
import { suggestCommand } from './commands/suggest.js';

// Load environment variables
config();

const program = new Command();

program
  .name('drover')
  .description('Run browser automation tasks against a pool of headless Chrome sessions')
  .version('0.1.0');

// Register commands
program.addCommand(runCommand);
program.addCommand(suggestCommand);

await program.parseAsync();
