import type { Command } from 'commander';
import { registerCaptureCommands } from './register-capture.js';

export function registerAllCommands(program: Command): void {
  registerCaptureCommands(program);
}
