import type { Command } from 'commander';
import { withCliErrorHandling } from '../core/index.js';
import { subagentStop } from '../commands/subagent-stop.js';
import { sessionStop } from '../commands/session-stop.js';
import { extract } from '../commands/extract.js';
import { detectAgent } from '../commands/detect-agent.js';

export function registerCaptureCommands(program: Command): void {
  // The hook owns its own boundary; it must never set a failing exit code.
  program
    .command('subagent-stop', { isDefault: true })
    .description('SubagentStop hook: read the hook payload on stdin and capture learnings')
    .action(subagentStop);

  program
    .command('session-stop')
    .description('Stop hook: log whether the ending session saved a summary')
    .action(sessionStop);

  program
    .command('extract <transcript>')
    .description('Print the learnings found in an agent transcript without submitting them')
    .option('--min-length <n>', 'Minimum learning length in characters')
    .option('--json', 'Output as JSON')
    .action(withCliErrorHandling('extract', extract));

  program
    .command('detect-agent <transcript>')
    .description('Print the most recently dispatched sub-agent in a parent transcript')
    .option('--json', 'Output as JSON')
    .action(withCliErrorHandling('detect-agent', detectAgent));
}
