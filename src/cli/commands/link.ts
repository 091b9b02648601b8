// Link commands for the AirSDLC tracker CLI

import { Command } from 'commander';
import { LinkType } from '../../models/types.js';
import { validateLinkType } from '../../core/validation.js';
import { MANUAL_LINK_TYPES } from '../../services/link/link-service.js';
import { ValidationError } from '../../core/errors.js';
import type { Workspace } from '../../services/workspace.js';
import { loadWorkspace, resolveActor, BaseOptions } from '../utils/context.js';
import { handleError, success, warn } from '../utils/error-handler.js';
import { formatLinkDisplay } from '../utils/format.js';

interface LinkOptions extends BaseOptions {
  type?: string;
  list?: boolean;
}

/**
 * Displays all relationships for an artifact in tree format
 */
async function displayArtifactLinks(ws: Workspace, artifactId: string): Promise<void> {
  const artifact = await ws.artifacts.get(artifactId);
  const links = await ws.links.getLinksForDisplay(artifact.id);

  if (links.length === 0) {
    console.log(`No relationships found for ${artifact.id}`);
    return;
  }

  const incoming = links.filter(l => l.direction === 'incoming');
  const outgoing = links.filter(l => l.direction === 'outgoing');

  console.log(`\nRelationships for ${artifact.id} - ${artifact.title}\n`);

  if (outgoing.length > 0) {
    console.log('Outgoing Links (this artifact references):');
    outgoing.forEach(link => console.log(formatLinkDisplay(link, '  ')));
    console.log();
  }

  if (incoming.length > 0) {
    console.log('Incoming Links (referenced by):');
    incoming.forEach(link => console.log(formatLinkDisplay(link, '  ')));
    console.log();
  }

  console.log(`Total: ${links.length} relationship(s)`);
}

async function resolveLinkType(ws: Workspace, type: string | undefined): Promise<LinkType> {
  if (type === undefined) {
    return ws.promptService.promptForLinkType();
  }
  const linkType = validateLinkType(type);
  if (!MANUAL_LINK_TYPES.includes(linkType)) {
    throw new ValidationError(
      `${linkType} links are created by "air supersede"; use one of ${MANUAL_LINK_TYPES.join(', ')}`,
      'type'
    );
  }
  return linkType;
}

export function registerLinkCommands(program: Command): void {
  program
    .command('link <source-id> [target-ids...]')
    .description('Link an artifact to one or more others, or list its relationships')
    .option('-t, --type <type>', `Relationship type (${MANUAL_LINK_TYPES.join(', ')})`)
    .option('-l, --list', 'Display all relationships of the source artifact')
    .option('--actor <name>', 'Actor recorded in the audit log')
    .option('-p, --path <path>', 'Repository root', process.cwd())
    .action(async (sourceId: string, targetIds: string[], options: LinkOptions) => {
      try {
        const ws = await loadWorkspace(options.path);

        if (options.list) {
          await displayArtifactLinks(ws, sourceId);
          return;
        }
        if (targetIds.length === 0) {
          throw new ValidationError('At least one target ID is required to create a link', 'target');
        }

        const linkType = await resolveLinkType(ws, options.type);
        const actor = await resolveActor(ws, options.actor);
        const results = targetIds.length === 1
          ? [await ws.links.createLink(sourceId, targetIds[0], linkType, actor)]
          : await ws.links.batchLink(sourceId, targetIds, linkType, actor);

        for (const result of results) {
          if (result.warning) {
            warn(result.warning);
            continue;
          }
          success(`Created link: ${result.link.sourceId} → ${result.link.targetId}`);
          console.log(`  Type: ${result.link.type}`);
        }
      } catch (error) {
        handleError(error);
      }
    });

  program
    .command('unlink <source-id> <target-id>')
    .description('Remove a relates-to or traces-to link')
    .option('--actor <name>', 'Actor recorded in the audit log')
    .option('-p, --path <path>', 'Repository root', process.cwd())
    .action(async (sourceId: string, targetId: string, options: BaseOptions) => {
      try {
        const ws = await loadWorkspace(options.path);
        await ws.links.removeLink(sourceId, targetId, await resolveActor(ws, options.actor));
        success(`Removed link: ${sourceId.toUpperCase()} → ${targetId.toUpperCase()}`);
      } catch (error) {
        handleError(error);
      }
    });
}
