// Body section layout for each artifact type

import type { ArtifactType } from '../../models/types.js';
import type { AnyArtifact } from '../../models/any-artifact.js';

export type SectionKind = 'text' | 'list';

/**
 * A `##` section in an artifact's Markdown body
 */
export interface SectionSpec {
  /** Markdown heading text */
  heading: string;
  /** Artifact field the section maps to */
  field: string;
  kind: SectionKind;
  /** Template text written into new artifacts */
  placeholder: string;
}

export type SectionValue = string | string[];

/**
 * Section order and placeholders, per artifact type
 */
export const SECTION_LAYOUTS: Record<ArtifactType, readonly SectionSpec[]> = {
  prd: [
    { heading: 'Problem', field: 'problem', kind: 'text', placeholder: '[Describe the problem to be solved]' },
    { heading: 'Goals', field: 'goals', kind: 'list', placeholder: '[List the business goals]' },
    { heading: 'User Stories', field: 'userStories', kind: 'list', placeholder: '[As a <role>, I want <capability> so that <benefit>]' },
    { heading: 'Acceptance Criteria', field: 'acceptanceCriteria', kind: 'list', placeholder: '[List measurable acceptance criteria]' },
    { heading: 'Non-Goals', field: 'nonGoals', kind: 'list', placeholder: '[List what is explicitly out of scope]' }
  ],
  daa: [
    { heading: 'Domain Overview', field: 'domainOverview', kind: 'text', placeholder: '[Describe the domain in technology-agnostic terms]' },
    { heading: 'Invariants', field: 'invariants', kind: 'list', placeholder: '[List the business rules that must always hold]' },
    { heading: 'Operations', field: 'operations', kind: 'list', placeholder: '[List the domain operations and their effects]' },
    { heading: 'Open Questions', field: 'openQuestions', kind: 'list', placeholder: '[List questions for the human validators]' }
  ],
  tip: [
    { heading: 'Summary', field: 'summary', kind: 'text', placeholder: '[Summarize the feature and why a full DAA is not needed]' },
    { heading: 'Technical Approach', field: 'technicalApproach', kind: 'text', placeholder: '[Describe the implementation approach]' },
    { heading: 'Technologies', field: 'technologies', kind: 'list', placeholder: '[List the technologies involved]' },
    { heading: 'Risks', field: 'risks', kind: 'list', placeholder: '[List known risks]' }
  ],
  rfc: [
    { heading: 'Problem Statement', field: 'problemStatement', kind: 'text', placeholder: '[Describe the design problem]' },
    { heading: 'Proposed Design', field: 'proposedDesign', kind: 'text', placeholder: '[Describe the proposed design]' },
    { heading: 'Alternatives', field: 'alternatives', kind: 'list', placeholder: '[List the alternatives considered]' },
    { heading: 'Open Questions', field: 'openQuestions', kind: 'list', placeholder: '[List open questions for reviewers]' }
  ],
  adr: [
    { heading: 'Context', field: 'context', kind: 'text', placeholder: '[Describe the context and forces at play]' },
    { heading: 'Decision', field: 'decision', kind: 'text', placeholder: '[State the decision]' },
    { heading: 'Consequences', field: 'consequences', kind: 'list', placeholder: '[List the consequences of this decision]' },
    { heading: 'Alternatives Considered', field: 'alternativesConsidered', kind: 'list', placeholder: '[List rejected alternatives and why]' }
  ],
  bolt: [
    { heading: 'Description', field: 'description', kind: 'text', placeholder: '[Describe the unit of work]' },
    { heading: 'Acceptance Criteria', field: 'acceptanceCriteria', kind: 'list', placeholder: '[List the criteria for done]' }
  ],
  postmortem: [
    { heading: 'Summary', field: 'summary', kind: 'text', placeholder: '[Summarize the incident and its impact]' },
    { heading: 'Timeline', field: 'timeline', kind: 'list', placeholder: '[List the key events with timestamps]' },
    { heading: 'Root Cause', field: 'rootCause', kind: 'text', placeholder: '[Describe the root cause]' },
    { heading: 'Action Items', field: 'actionItems', kind: 'list', placeholder: '[List follow-up actions]' },
    { heading: 'Lessons Learned', field: 'lessonsLearned', kind: 'list', placeholder: '[List lessons for the playbook]' }
  ]
};

/**
 * True when a value is still the bracketed template placeholder
 */
export function isPlaceholder(value: string): boolean {
  return /^\[[^\]]*\]$/.test(value.trim());
}

/**
 * True when a section has no real content
 */
export function isSectionEmpty(value: SectionValue | undefined): boolean {
  if (value === undefined) return true;
  if (typeof value === 'string') {
    return value.trim().length === 0 || isPlaceholder(value);
  }
  return value.filter(item => item.trim().length > 0 && !isPlaceholder(item)).length === 0;
}

/**
 * Finds a section spec by heading or field name (case-insensitive)
 */
export function findSection(type: ArtifactType, name: string): SectionSpec | undefined {
  const needle = name.trim().toLowerCase();
  return SECTION_LAYOUTS[type].find(
    spec => spec.heading.toLowerCase() === needle || spec.field.toLowerCase() === needle
  );
}

/**
 * Reads the body sections of an artifact, keyed by field name
 */
export function getSectionValues(artifact: AnyArtifact): Record<string, SectionValue> {
  switch (artifact.type) {
    case 'prd':
      return {
        problem: artifact.problem,
        goals: artifact.goals,
        userStories: artifact.userStories,
        acceptanceCriteria: artifact.acceptanceCriteria,
        nonGoals: artifact.nonGoals
      };
    case 'daa':
      return {
        domainOverview: artifact.domainOverview,
        invariants: artifact.invariants,
        operations: artifact.operations,
        openQuestions: artifact.openQuestions
      };
    case 'tip':
      return {
        summary: artifact.summary,
        technicalApproach: artifact.technicalApproach,
        technologies: artifact.technologies,
        risks: artifact.risks
      };
    case 'rfc':
      return {
        problemStatement: artifact.problemStatement,
        proposedDesign: artifact.proposedDesign,
        alternatives: artifact.alternatives,
        openQuestions: artifact.openQuestions
      };
    case 'adr':
      return {
        context: artifact.context,
        decision: artifact.decision,
        consequences: artifact.consequences,
        alternativesConsidered: artifact.alternativesConsidered
      };
    case 'bolt':
      return {
        description: artifact.description,
        acceptanceCriteria: artifact.acceptanceCriteria
      };
    case 'postmortem':
      return {
        summary: artifact.summary,
        timeline: artifact.timeline,
        rootCause: artifact.rootCause,
        actionItems: artifact.actionItems,
        lessonsLearned: artifact.lessonsLearned
      };
  }
}

/**
 * Template values for a new artifact: every section holds its placeholder
 */
export function templateValues(type: ArtifactType): Record<string, SectionValue> {
  const values: Record<string, SectionValue> = {};
  for (const spec of SECTION_LAYOUTS[type]) {
    values[spec.field] = spec.kind === 'list' ? [spec.placeholder] : spec.placeholder;
  }
  return values;
}

/**
 * Returns a copy of the artifact with the given sections replaced.
 * Values of the wrong kind for a section are ignored.
 */
export function withSections(artifact: AnyArtifact, values: Readonly<Record<string, SectionValue>>): AnyArtifact {
  const text = (field: string, current: string): string => {
    const value = values[field];
    return typeof value === 'string' ? value : current;
  };
  const list = (field: string, current: string[]): string[] => {
    const value = values[field];
    return Array.isArray(value) ? [...value] : current;
  };

  switch (artifact.type) {
    case 'prd':
      return {
        ...artifact,
        problem: text('problem', artifact.problem),
        goals: list('goals', artifact.goals),
        userStories: list('userStories', artifact.userStories),
        acceptanceCriteria: list('acceptanceCriteria', artifact.acceptanceCriteria),
        nonGoals: list('nonGoals', artifact.nonGoals)
      };
    case 'daa':
      return {
        ...artifact,
        domainOverview: text('domainOverview', artifact.domainOverview),
        invariants: list('invariants', artifact.invariants),
        operations: list('operations', artifact.operations),
        openQuestions: list('openQuestions', artifact.openQuestions)
      };
    case 'tip':
      return {
        ...artifact,
        summary: text('summary', artifact.summary),
        technicalApproach: text('technicalApproach', artifact.technicalApproach),
        technologies: list('technologies', artifact.technologies),
        risks: list('risks', artifact.risks)
      };
    case 'rfc':
      return {
        ...artifact,
        problemStatement: text('problemStatement', artifact.problemStatement),
        proposedDesign: text('proposedDesign', artifact.proposedDesign),
        alternatives: list('alternatives', artifact.alternatives),
        openQuestions: list('openQuestions', artifact.openQuestions)
      };
    case 'adr':
      return {
        ...artifact,
        context: text('context', artifact.context),
        decision: text('decision', artifact.decision),
        consequences: list('consequences', artifact.consequences),
        alternativesConsidered: list('alternativesConsidered', artifact.alternativesConsidered)
      };
    case 'bolt':
      return {
        ...artifact,
        description: text('description', artifact.description),
        acceptanceCriteria: list('acceptanceCriteria', artifact.acceptanceCriteria)
      };
    case 'postmortem':
      return {
        ...artifact,
        summary: text('summary', artifact.summary),
        timeline: list('timeline', artifact.timeline),
        rootCause: text('rootCause', artifact.rootCause),
        actionItems: list('actionItems', artifact.actionItems),
        lessonsLearned: list('lessonsLearned', artifact.lessonsLearned)
      };
  }
}
