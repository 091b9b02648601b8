// Editing commands: edit, signoff, assign, context

import { Command } from 'commander';
import type { AnyArtifact } from '../../models/any-artifact.js';
import { ValidationError } from '../../core/errors.js';
import { parseTags } from '../../services/prompt/prompt-service.js';
import { loadWorkspace, resolveActor, BaseOptions } from '../utils/context.js';
import { handleError, success, info } from '../utils/error-handler.js';
import { parseList } from '../utils/format.js';
import { parseSectionOptions } from './create.js';

interface EditOptions extends BaseOptions {
  title?: string;
  owner?: string;
  tags?: string;
  section: string[];
}

interface SignoffOptions extends BaseOptions {
  name?: string;
  role: string;
  reject?: boolean;
}

interface AssignOptions extends BaseOptions {
  estimate?: string;
}

interface ContextOptions extends BaseOptions {
  aggregates?: string;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function registerEditCommands(program: Command): void {
  program
    .command('edit <id>')
    .description('Edit the title, owner, tags or sections of an editable artifact')
    .option('-t, --title <title>', 'New title')
    .option('-o, --owner <owner>', 'New owner')
    .option('--tags <tags>', 'New comma-separated tags')
    .option('-s, --section <heading=text>', 'Replace a section (repeat for list items)', collect, [])
    .option('--actor <name>', 'Actor recorded in the audit log')
    .option('-p, --path <path>', 'Repository root', process.cwd())
    .action(async (id: string, options: EditOptions) => {
      try {
        const sections = parseSectionOptions(options.section);
        if (
          options.title === undefined &&
          options.owner === undefined &&
          options.tags === undefined &&
          Object.keys(sections).length === 0
        ) {
          info('Nothing to change: pass --title, --owner, --tags or --section');
          return;
        }

        const ws = await loadWorkspace(options.path);
        const actor = await resolveActor(ws, options.actor);

        let artifact: AnyArtifact = await ws.artifacts.update(
          id,
          {
            title: options.title,
            owner: options.owner,
            tags: options.tags !== undefined ? parseTags(options.tags) : undefined
          },
          actor
        );
        for (const [section, body] of Object.entries(sections)) {
          artifact = await ws.artifacts.updateSection(artifact.id, section, body, actor);
        }

        success(`Updated ${artifact.id}`);
        console.log(`  Title: ${artifact.title}`);
        console.log(`  Status: ${artifact.status}`);
      } catch (error) {
        handleError(error);
      }
    });

  program
    .command('signoff <rfc-id>')
    .description('Record a reviewer sign-off on an RFC')
    .option('-n, --name <name>', 'Reviewer name (defaults to the git user)')
    .option('-r, --role <role>', 'Reviewer role', 'reviewer')
    .option('--reject', 'Record an objection instead of an approval')
    .option('--actor <name>', 'Actor recorded in the audit log')
    .option('-p, --path <path>', 'Repository root', process.cwd())
    .action(async (rfcId: string, options: SignoffOptions) => {
      try {
        const ws = await loadWorkspace(options.path);
        const actor = await resolveActor(ws, options.actor);
        const name = options.name ?? (await ws.promptService.getGitUserName());
        if (!name) {
          throw new ValidationError('Reviewer name is required (pass --name)', 'name');
        }

        const rfc = await ws.artifacts.addSignoff(
          rfcId,
          { name, role: options.role, approved: options.reject !== true },
          actor
        );
        success(`${options.reject ? 'Objection' : 'Sign-off'} by ${name} recorded on ${rfc.id}`);
      } catch (error) {
        handleError(error);
      }
    });

  program
    .command('assign <bolt-id> <assignee>')
    .description('Assign a Bolt')
    .option('-e, --estimate <estimate>', 'Estimate, e.g. 2d or 4h')
    .option('--actor <name>', 'Actor recorded in the audit log')
    .option('-p, --path <path>', 'Repository root', process.cwd())
    .action(async (boltId: string, assignee: string, options: AssignOptions) => {
      try {
        const ws = await loadWorkspace(options.path);
        const bolt = await ws.artifacts.assign(boltId, assignee, options.estimate, await resolveActor(ws, options.actor));
        success(`Assigned ${bolt.id} to ${assignee}`);
      } catch (error) {
        handleError(error);
      }
    });

  program
    .command('context <daa-id> <name> <responsibility>')
    .description('Add a bounded context to a DAA')
    .option('-a, --aggregates <names>', 'Comma-separated aggregate roots')
    .option('--actor <name>', 'Actor recorded in the audit log')
    .option('-p, --path <path>', 'Repository root', process.cwd())
    .action(async (daaId: string, name: string, responsibility: string, options: ContextOptions) => {
      try {
        const ws = await loadWorkspace(options.path);
        const daa = await ws.artifacts.addBoundedContext(
          daaId,
          { name, responsibility, aggregates: parseList(options.aggregates) },
          await resolveActor(ws, options.actor)
        );
        success(`Added bounded context "${name.trim()}" to ${daa.id}`);
      } catch (error) {
        handleError(error);
      }
    });
}
