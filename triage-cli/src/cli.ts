import { Command } from 'commander';
import { CLI_VERSION } from './version';
import { collect } from './commands/options';
import { printError } from './commands/output';

const program = new Command();

program
  .name('triage')
  .description('Review beads issue trees from the terminal')
  .version(CLI_VERSION)
  .option('--json', 'Output as JSON')
  .option('--workspace <path>', 'Directory holding .beads (default: cwd)');

// Commands load their modules lazily so --help stays fast
const reviewCmd = new Command('review')
  .description('Interactive review dashboard for an issue tree')
  .argument('[rootId]', 'Issue to review (default: pick from a list)')
  .option('--reviewer <name>', 'Reviewer name (default: $TRIAGE_REVIEWER, config, OS user)')
  .option('--review-type <type>', 'Review type: plan, implementation, security')
  .option('--save-to <target>', 'Where to save: comments, json, or a JSON file path')
  .option('--label <name>', 'Only show issues with this label (repeatable)', collect)
  .action(async (rootId: string | undefined, opts: Record<string, unknown>, cmd: Command) => {
    const { reviewAction } = await import('./commands/review');
    return reviewAction(rootId, opts, cmd);
  });
program.addCommand(reviewCmd);

const treeCmd = new Command('tree')
  .description('Print the issue tree rooted at an issue')
  .argument('<rootId>', 'Root issue id')
  .option('--status <filter>', 'all, unreviewed or needs_revision (default: all)')
  .option('--search <text>', 'Only show issues whose id or title contains text')
  .option('--label <name>', 'Only show issues with this label (repeatable)', collect)
  .action(async (rootId: string, opts: Record<string, unknown>, cmd: Command) => {
    const { treeAction } = await import('./commands/tree');
    return treeAction(rootId, opts, cmd);
  });
program.addCommand(treeCmd);

program.parseAsync().catch((err: unknown) => {
  printError(err);
  process.exitCode = 1;
});
