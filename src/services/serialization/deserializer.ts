// Markdown deserializer for artifacts

import type { AnyArtifact } from '../../models/any-artifact.js';
import type { ArtifactType } from '../../models/types.js';
import { FrontmatterSchema, Frontmatter, formatIssues } from '../../core/schemas.js';
import { SerializationError } from '../../core/errors.js';
import { parseFrontmatter, parseSections, parseListSection } from './parser.js';
import { SECTION_LAYOUTS } from './sections.js';

/**
 * Reads body sections by field name, using the type's heading layout
 */
class SectionReader {
  private readonly byHeading: Record<string, string>;

  constructor(private readonly type: ArtifactType, content: string) {
    this.byHeading = parseSections(content);
  }

  private raw(field: string): string | undefined {
    const spec = SECTION_LAYOUTS[this.type].find(s => s.field === field);
    return spec ? this.byHeading[spec.heading] : undefined;
  }

  text(field: string): string {
    return this.raw(field) ?? '';
  }

  list(field: string): string[] {
    return parseListSection(this.raw(field));
  }
}

/**
 * Deserializes a Markdown string with YAML frontmatter into an artifact
 *
 * @throws SerializationError if the input is malformed or the frontmatter is invalid
 */
export function deserialize(input: string): AnyArtifact {
  const { data, content } = parseFrontmatter(input);

  const result = FrontmatterSchema.safeParse(data);
  if (!result.success) {
    throw new SerializationError(`Invalid frontmatter: ${formatIssues(result.error).join('; ')}`, 2);
  }

  return buildArtifact(result.data, content);
}

function buildArtifact(fm: Frontmatter, content: string): AnyArtifact {
  const sections = new SectionReader(fm.type, content);
  const base = {
    id: fm.id,
    title: fm.title,
    createdAt: fm.createdAt,
    updatedAt: fm.updatedAt,
    owner: fm.owner,
    tags: fm.tags,
    references: fm.references,
    supersededBy: fm.supersededBy,
    checksum: fm.checksum,
    sealedAt: fm.sealedAt
  };

  switch (fm.type) {
    case 'prd':
      return {
        ...base,
        type: 'prd',
        status: fm.status,
        problem: sections.text('problem'),
        goals: sections.list('goals'),
        userStories: sections.list('userStories'),
        acceptanceCriteria: sections.list('acceptanceCriteria'),
        nonGoals: sections.list('nonGoals')
      };
    case 'daa':
      return {
        ...base,
        type: 'daa',
        status: fm.status,
        domainOverview: sections.text('domainOverview'),
        boundedContexts: fm.boundedContexts,
        invariants: sections.list('invariants'),
        operations: sections.list('operations'),
        openQuestions: sections.list('openQuestions')
      };
    case 'tip':
      return {
        ...base,
        type: 'tip',
        status: fm.status,
        summary: sections.text('summary'),
        technicalApproach: sections.text('technicalApproach'),
        technologies: sections.list('technologies'),
        risks: sections.list('risks')
      };
    case 'rfc':
      return {
        ...base,
        type: 'rfc',
        status: fm.status,
        problemStatement: sections.text('problemStatement'),
        proposedDesign: sections.text('proposedDesign'),
        alternatives: sections.list('alternatives'),
        openQuestions: sections.list('openQuestions'),
        signoffs: fm.signoffs
      };
    case 'adr':
      return {
        ...base,
        type: 'adr',
        status: fm.status,
        context: sections.text('context'),
        decision: sections.text('decision'),
        consequences: sections.list('consequences'),
        alternativesConsidered: sections.list('alternativesConsidered')
      };
    case 'bolt':
      return {
        ...base,
        type: 'bolt',
        status: fm.status,
        description: sections.text('description'),
        acceptanceCriteria: sections.list('acceptanceCriteria'),
        assignee: fm.assignee,
        estimate: fm.estimate,
        startedAt: fm.startedAt,
        completedAt: fm.completedAt
      };
    case 'postmortem':
      return {
        ...base,
        type: 'postmortem',
        status: fm.status,
        incidentDate: fm.incidentDate,
        severity: fm.severity,
        deployment: fm.deployment,
        summary: sections.text('summary'),
        timeline: sections.list('timeline'),
        rootCause: sections.text('rootCause'),
        actionItems: sections.list('actionItems'),
        lessonsLearned: sections.list('lessonsLearned')
      };
  }
}
