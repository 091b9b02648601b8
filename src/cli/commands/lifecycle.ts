// Lifecycle commands: transition, supersede

import { Command } from 'commander';
import { loadWorkspace, resolveActor, BaseOptions } from '../utils/context.js';
import { handleError, success, info } from '../utils/error-handler.js';
import { formatTransitionOptions } from '../utils/format.js';

export function registerLifecycleCommands(program: Command): void {
  program
    .command('transition <id> [status]')
    .description('Move an artifact to a new status, or list the statuses it can move to')
    .option('--actor <name>', 'Actor recorded in the audit log')
    .option('-p, --path <path>', 'Repository root', process.cwd())
    .action(async (id: string, status: string | undefined, options: BaseOptions) => {
      try {
        const ws = await loadWorkspace(options.path);

        if (status === undefined) {
          const artifact = await ws.artifacts.get(id);
          console.log(`${artifact.id} is ${artifact.status}. Next statuses:`);
          formatTransitionOptions(await ws.lifecycle.getAllowedTransitions(artifact.id)).forEach(line => console.log(line));
          return;
        }

        const result = await ws.lifecycle.transition(id, status, await resolveActor(ws, options.actor));
        success(`${result.artifact.id}: ${result.from} → ${result.artifact.status}`);
        if (result.artifact.checksum && result.artifact.sealedAt) {
          console.log(`  Sealed: ${result.artifact.checksum.substring(0, 16)}...`);
        }
        if (result.tag) {
          console.log(`  Tagged: ${result.tag}`);
        }
      } catch (error) {
        handleError(error);
      }
    });

  program
    .command('supersede <old-id> <new-id>')
    .description('Retire an artifact in favour of a newer one of the same type')
    .option('--actor <name>', 'Actor recorded in the audit log')
    .option('-p, --path <path>', 'Repository root', process.cwd())
    .action(async (oldId: string, newId: string, options: BaseOptions) => {
      try {
        const ws = await loadWorkspace(options.path);
        const result = await ws.lifecycle.supersede(oldId, newId, await resolveActor(ws, options.actor));

        success(`${result.superseded.id} superseded by ${result.successor.id}`);
        if (result.tag) {
          console.log(`  Tagged: ${result.tag}`);
        }

        const checklist = await ws.impact.generateChecklist(result.superseded.id);
        if (checklist.tasks.length === 0) {
          info(`Nothing derives from ${result.superseded.id}`);
          return;
        }
        console.log('\nFollow-up:');
        for (const task of checklist.tasks) {
          console.log(`  [${task.priority}] ${task.action}`);
        }
      } catch (error) {
        handleError(error);
      }
    });
}
