// Markdown serializer for artifacts

import * as yaml from 'yaml';
import type { AnyArtifact } from '../../models/any-artifact.js';
import { SECTION_LAYOUTS, SectionSpec, SectionValue, getSectionValues } from './sections.js';

/**
 * Serializes an artifact to Markdown with YAML frontmatter
 *
 * @returns Markdown string with YAML frontmatter
 */
export function serialize(artifact: AnyArtifact): string {
  const frontmatter = serializeFrontmatter(artifact);
  const content = serializeContent(artifact);

  return `---\n${frontmatter}---\n\n${content}\n`;
}

/**
 * Serializes artifact metadata to YAML frontmatter
 */
function serializeFrontmatter(artifact: AnyArtifact): string {
  const metadata: Record<string, unknown> = {
    id: artifact.id,
    type: artifact.type,
    title: artifact.title,
    status: artifact.status,
    createdAt: artifact.createdAt.toISOString(),
    updatedAt: artifact.updatedAt.toISOString(),
    owner: artifact.owner,
    tags: artifact.tags,
    references: artifact.references.length > 0 ? artifact.references : undefined,
    supersededBy: artifact.supersededBy,
    checksum: artifact.checksum,
    sealedAt: artifact.sealedAt?.toISOString()
  };

  // Type-specific structured fields
  switch (artifact.type) {
    case 'daa':
      if (artifact.boundedContexts.length > 0) {
        metadata.boundedContexts = artifact.boundedContexts;
      }
      break;
    case 'rfc':
      if (artifact.signoffs.length > 0) {
        metadata.signoffs = artifact.signoffs.map(signoff => ({
          ...signoff,
          date: signoff.date.toISOString()
        }));
      }
      break;
    case 'bolt':
      metadata.assignee = artifact.assignee;
      metadata.estimate = artifact.estimate;
      metadata.startedAt = artifact.startedAt?.toISOString();
      metadata.completedAt = artifact.completedAt?.toISOString();
      break;
    case 'postmortem':
      metadata.incidentDate = artifact.incidentDate.toISOString();
      metadata.severity = artifact.severity;
      metadata.deployment = artifact.deployment;
      break;
    default:
      break;
  }

  // Remove undefined values
  for (const key of Object.keys(metadata)) {
    if (metadata[key] === undefined) {
      delete metadata[key];
    }
  }

  return yaml.stringify(metadata);
}

/**
 * Serializes artifact body sections to Markdown, in layout order.
 * Every section heading is written, even when empty.
 */
function serializeContent(artifact: AnyArtifact): string {
  const values = getSectionValues(artifact);
  return SECTION_LAYOUTS[artifact.type]
    .map(spec => serializeSection(spec, values[spec.field]))
    .join('\n\n');
}

/**
 * Renders one section: heading followed by prose or a bullet list
 */
export function serializeSection(spec: SectionSpec, value: SectionValue | undefined): string {
  const body = Array.isArray(value)
    ? value.map(item => `- ${item}`).join('\n')
    : (value ?? '');
  return body.length > 0 ? `## ${spec.heading}\n\n${body}` : `## ${spec.heading}`;
}
