// Playbook commands: patterns learned from published post-mortems

import { Command } from 'commander';
import { parseTags } from '../../services/prompt/prompt-service.js';
import { loadWorkspace, resolveActor, BaseOptions } from '../utils/context.js';
import { handleError, success } from '../utils/error-handler.js';
import { formatPattern, parseList } from '../utils/format.js';

interface AddPatternOptions extends BaseOptions {
  name: string;
  problem: string;
  solution: string;
  from: string;
  tags?: string;
  owner?: string;
}

interface ListPatternOptions extends BaseOptions {
  tag?: string;
  from?: string;
}

export function registerPlaybookCommands(program: Command): void {
  const playbook = program
    .command('playbook')
    .description('Manage reusable patterns learned from post-mortems');

  playbook
    .command('add')
    .description('Record a pattern learned from one or more published post-mortems')
    .requiredOption('-n, --name <name>', 'Pattern name')
    .requiredOption('--problem <text>', 'The recurring problem')
    .requiredOption('--solution <text>', 'The reusable solution')
    .requiredOption('--from <pm-ids>', 'Comma-separated source post-mortem IDs')
    .option('--tags <tags>', 'Comma-separated tags')
    .option('-o, --owner <owner>', 'Pattern owner (defaults to the configured owner, then the git user)')
    .option('--actor <name>', 'Actor recorded in the audit log')
    .option('-p, --path <path>', 'Repository root', process.cwd())
    .action(async (options: AddPatternOptions) => {
      try {
        const ws = await loadWorkspace(options.path);
        const actor = await resolveActor(ws, options.actor);
        const owner = options.owner
          ?? (await ws.configService.getDefaultOwner())
          ?? (await ws.promptService.getGitUserName())
          ?? '';

        const pattern = await ws.playbook.addPattern(
          {
            name: options.name,
            problem: options.problem,
            solution: options.solution,
            sourcePostmortems: parseList(options.from),
            tags: parseTags(options.tags),
            owner
          },
          actor
        );

        success(`Added ${pattern.id}: ${pattern.name}`);
        console.log(`  Learned from: ${pattern.sourcePostmortems.join(', ')}`);
      } catch (error) {
        handleError(error);
      }
    });

  playbook
    .command('list')
    .description('List playbook patterns')
    .option('--tag <tag>', 'Only patterns with this tag')
    .option('--from <pm-id>', 'Only patterns learned from this post-mortem')
    .option('-p, --path <path>', 'Repository root', process.cwd())
    .action(async (options: ListPatternOptions) => {
      try {
        const ws = await loadWorkspace(options.path);
        const tag = options.tag?.trim().toLowerCase();
        const patterns = options.from !== undefined
          ? await ws.playbook.findByPostmortem(options.from)
          : await ws.playbook.listPatterns();
        const shown = tag ? patterns.filter(p => p.tags.includes(tag)) : patterns;

        if (shown.length === 0) {
          console.log('No patterns found');
          return;
        }
        console.log(`Found ${shown.length} pattern(s):\n`);
        for (const pattern of shown) {
          console.log(`  ${pattern.id} - ${pattern.name}`);
          console.log(`    From: ${pattern.sourcePostmortems.join(', ')}${pattern.tags.length > 0 ? ` | Tags: ${pattern.tags.join(', ')}` : ''}`);
        }
      } catch (error) {
        handleError(error);
      }
    });

  playbook
    .command('show <id>')
    .description('Show a playbook pattern')
    .option('-p, --path <path>', 'Repository root', process.cwd())
    .action(async (id: string, options: BaseOptions) => {
      try {
        const ws = await loadWorkspace(options.path);
        formatPattern(await ws.playbook.getPattern(id)).forEach(line => console.log(line));
      } catch (error) {
        handleError(error);
      }
    });
}
