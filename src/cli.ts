#!/usr/bin/env node

/**
 * learnings-capture CLI
 * Passive capture of sub-agent learnings into a local knowledge service
 */

import { Command } from 'commander';
import { registerAllCommands } from './cli/register-all.js';
import { failCommand } from './core/index.js';

const program = new Command();

program
  .name('learnings-capture')
  .description('Mine sub-agent transcripts for learnings and forward them to the capture service')
  .version('0.1.0');

registerAllCommands(program);

program.parseAsync().catch((error: unknown) => {
  failCommand('learnings-capture failed', error);
});
