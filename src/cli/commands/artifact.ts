// Query and removal commands: list, show, history, delete

import { Command } from 'commander';
import { ArtifactFilters } from '../../services/storage/file-store.js';
import { validateArtifactType } from '../../core/validation.js';
import { loadWorkspace, resolveActor, BaseOptions } from '../utils/context.js';
import { handleError, success, info } from '../utils/error-handler.js';
import {
  formatArtifactSummary,
  formatArtifactDetails,
  formatLinkDisplay,
  formatAuditEntry,
  formatTransitionOptions,
  parseList
} from '../utils/format.js';

interface ListOptions extends BaseOptions {
  type?: string;
  status?: string;
  owner?: string;
  tags?: string;
  json?: boolean;
}

interface ShowOptions extends BaseOptions {
  json?: boolean;
}

interface DeleteOptions extends BaseOptions {
  force?: boolean;
}

export function registerArtifactCommands(program: Command): void {
  program
    .command('list')
    .description('List artifacts')
    .option('--type <type>', 'Filter by artifact type')
    .option('-s, --status <status>', 'Filter by status')
    .option('--owner <owner>', 'Filter by owner')
    .option('--tags <tags>', 'Only artifacts carrying all of these comma-separated tags')
    .option('--json', 'Output as JSON')
    .option('-p, --path <path>', 'Repository root', process.cwd())
    .action(async (options: ListOptions) => {
      try {
        const ws = await loadWorkspace(options.path);

        const filters: ArtifactFilters = {
          type: options.type !== undefined ? validateArtifactType(options.type) : undefined,
          status: options.status,
          owner: options.owner,
          tags: options.tags !== undefined ? parseList(options.tags) : undefined
        };
        const artifacts = await ws.artifacts.list(filters);

        if (options.json) {
          console.log(JSON.stringify(artifacts, null, 2));
          return;
        }
        if (artifacts.length === 0) {
          console.log('No artifacts found');
          return;
        }

        console.log(`Found ${artifacts.length} artifact(s):\n`);
        for (const artifact of artifacts) {
          formatArtifactSummary(artifact).forEach(line => console.log(line));
          console.log();
        }
      } catch (error) {
        handleError(error);
      }
    });

  program
    .command('show <id>')
    .description('Show an artifact with its sections, relationships and next statuses')
    .option('--json', 'Output as JSON')
    .option('-p, --path <path>', 'Repository root', process.cwd())
    .action(async (id: string, options: ShowOptions) => {
      try {
        const ws = await loadWorkspace(options.path);
        const artifact = await ws.artifacts.get(id);

        if (options.json) {
          console.log(JSON.stringify(artifact, null, 2));
          return;
        }

        formatArtifactDetails(artifact).forEach(line => console.log(line));

        const links = await ws.links.getLinksForDisplay(artifact.id);
        console.log('\n--- Relationships ---');
        if (links.length === 0) {
          console.log('(none)');
        }
        links.forEach(link => console.log(formatLinkDisplay(link, '  ')));

        console.log('\n--- Next statuses ---');
        formatTransitionOptions(await ws.lifecycle.getAllowedTransitions(artifact.id)).forEach(line => console.log(line));
      } catch (error) {
        handleError(error);
      }
    });

  program
    .command('history <id>')
    .description('Show the audit trail of an artifact or playbook pattern')
    .option('-p, --path <path>', 'Repository root', process.cwd())
    .action(async (id: string, options: BaseOptions) => {
      try {
        const ws = await loadWorkspace(options.path);
        const normalized = id.trim().toUpperCase();
        const entries = await ws.auditService.getHistory(normalized);

        if (entries.length === 0) {
          info(`No history recorded for ${normalized}`);
          return;
        }
        console.log(`History of ${normalized}:\n`);
        entries.forEach(entry => formatAuditEntry(entry).forEach(line => console.log(line)));
      } catch (error) {
        handleError(error);
      }
    });

  program
    .command('delete <id>')
    .description('Delete an editable artifact that nothing references')
    .option('-f, --force', 'Delete without confirmation')
    .option('--actor <name>', 'Actor recorded in the audit log')
    .option('-p, --path <path>', 'Repository root', process.cwd())
    .action(async (id: string, options: DeleteOptions) => {
      try {
        const ws = await loadWorkspace(options.path);
        const artifact = await ws.artifacts.get(id);

        if (!options.force) {
          const confirmed = await ws.promptService.promptForConfirmation(
            `Delete ${artifact.id} - ${artifact.title}?`
          );
          if (!confirmed) {
            info('Deletion cancelled (use --force to delete without a prompt)');
            return;
          }
        }

        await ws.artifacts.delete(artifact.id, await resolveActor(ws, options.actor));
        success(`Deleted ${artifact.id}`);
      } catch (error) {
        handleError(error);
      }
    });
}
