// Create command for the AirSDLC tracker CLI

import { Command } from 'commander';
import { Severity, SEVERITIES } from '../../models/types.js';
import { SeveritySchema } from '../../core/schemas.js';
import { validateArtifactType } from '../../core/validation.js';
import { ValidationError } from '../../core/errors.js';
import { parseTags } from '../../services/prompt/prompt-service.js';
import { loadWorkspace, resolveActor, BaseOptions } from '../utils/context.js';
import { handleError, success, warn } from '../utils/error-handler.js';
import { parseList } from '../utils/format.js';

interface CreateOptions extends BaseOptions {
  title?: string;
  owner?: string;
  tags?: string;
  parent?: string;
  traces?: string;
  severity?: string;
  incidentDate?: string;
  deployment?: string;
  section: string[];
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parseSeverity(value: string | undefined): Severity | undefined {
  if (value === undefined) return undefined;
  const result = SeveritySchema.safeParse(value.trim().toLowerCase());
  if (!result.success) {
    throw new ValidationError(`Invalid severity: ${value}. Valid severities: ${SEVERITIES.join(', ')}`, 'severity');
  }
  return result.data;
}

function parseDate(value: string | undefined, field: string): Date | undefined {
  if (value === undefined) return undefined;
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new ValidationError(`Invalid date: ${value}`, field);
  }
  return date;
}

/**
 * `Heading=text` pairs; repeating a heading adds one list item per occurrence
 */
export function parseSectionOptions(pairs: readonly string[]): Record<string, string[]> {
  const sections: Record<string, string[]> = {};
  for (const pair of pairs) {
    const separator = pair.indexOf('=');
    if (separator <= 0) {
      throw new ValidationError(`Expected <heading>=<text>, got "${pair}"`, 'section');
    }
    const heading = pair.slice(0, separator).trim();
    sections[heading] = [...(sections[heading] ?? []), pair.slice(separator + 1)];
  }
  return sections;
}

export function registerCreateCommand(program: Command): void {
  program
    .command('create <type>')
    .description('Create a PRD, DAA, TIP, RFC, ADR, Bolt or post-mortem')
    .option('-t, --title <title>', 'Artifact title')
    .option('-o, --owner <owner>', 'Artifact owner')
    .option('--tags <tags>', 'Comma-separated tags')
    .option('--parent <id>', 'Artifact this one derives from')
    .option('--traces <ids>', 'Post-mortems: comma-separated ADR, Bolt or PRD IDs involved')
    .option('--severity <severity>', `Post-mortems: ${SEVERITIES.join(', ')}`)
    .option('--incident-date <date>', 'Post-mortems: date of the incident')
    .option('--deployment <label>', 'Post-mortems: deployment during which the incident occurred')
    .option('-s, --section <heading=text>', 'Initial section content (repeat for list items)', collect, [])
    .option('--actor <name>', 'Actor recorded in the audit log')
    .option('-p, --path <path>', 'Repository root', process.cwd())
    .action(async (typeArg: string, options: CreateOptions) => {
      try {
        const type = validateArtifactType(typeArg);
        const ws = await loadWorkspace(options.path);

        const existing = await ws.artifacts.list({ type });
        const fields = await ws.promptService.promptForMissingFields(
          type,
          {
            title: options.title,
            owner: options.owner ?? (await ws.configService.getDefaultOwner()),
            tags: options.tags !== undefined ? parseTags(options.tags) : undefined,
            severity: parseSeverity(options.severity)
          },
          ws.promptService.getTagSuggestions(existing)
        );

        const { duplicates } = ws.promptService.validateTitleUniqueness(fields.title, existing);
        if (duplicates.length > 0) {
          warn(`Similar titles found: ${duplicates.map(d =>
            `${d.id} (${d.matchType}${d.similarity ? ` ${Math.round(d.similarity * 100)}%` : ''})`
          ).join(', ')}`);
        }

        const artifact = await ws.artifacts.create(
          {
            type,
            title: fields.title,
            owner: fields.owner,
            tags: fields.tags,
            parentId: options.parent,
            traces: parseList(options.traces),
            severity: fields.severity,
            incidentDate: parseDate(options.incidentDate, 'incidentDate'),
            deployment: options.deployment,
            sections: parseSectionOptions(options.section)
          },
          await resolveActor(ws, options.actor)
        );

        success(`Created ${artifact.type.toUpperCase()}: ${artifact.id}`);
        console.log(`  Title: ${artifact.title}`);
        console.log(`  Owner: ${artifact.owner}`);
        console.log(`  Status: ${artifact.status}`);
        for (const ref of artifact.references) {
          console.log(`  ${ref.linkType}: ${ref.targetId}`);
        }
        console.log(`  File: ${ws.fileStore.getArtifactPath(artifact.id, artifact.type)}`);
      } catch (error) {
        handleError(error);
      }
    });
}
