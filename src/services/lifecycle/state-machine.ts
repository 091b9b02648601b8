/**
 * Lifecycle rules for AirSDLC artifacts.
 *
 * Holds the per-type transition tables, the statuses in which content may
 * change, the statuses that seal an artifact, and the validation gates that
 * guard individual transitions. Everything here is pure; the
 * LifecycleService loads artifacts and applies the results.
 */

import type { AnyArtifact } from '../../models/any-artifact.js';
import {
  ArtifactType,
  ArtifactStatus,
  StatusOf,
  RETIRED_STATUSES,
  isStatusOf
} from '../../models/types.js';
import { TransitionError, type GateFailure } from '../../core/errors.js';
import { SECTION_LAYOUTS, getSectionValues, isSectionEmpty } from '../serialization/sections.js';

type Edge<T extends ArtifactType> = readonly [StatusOf<T>, StatusOf<T>];

/**
 * Legal status changes per artifact type. `superseded` is
 * absent: only supersession reaches it.
 */
export const TRANSITIONS: { readonly [T in ArtifactType]: readonly Edge<T>[] } = {
  prd: [['draft', 'approved']],
  daa: [['draft', 'validated'], ['validated', 'draft'], ['validated', 'locked']],
  tip: [['draft', 'validated'], ['validated', 'draft'], ['validated', 'locked']],
  rfc: [['draft', 'review'], ['review', 'draft'], ['review', 'approved'], ['review', 'rejected']],
  adr: [['proposed', 'accepted'], ['proposed', 'rejected'], ['accepted', 'deprecated']],
  bolt: [['todo', 'in-progress'], ['in-progress', 'todo'], ['in-progress', 'done']],
  postmortem: [['draft', 'published']]
};

export const INITIAL_STATUS: { readonly [T in ArtifactType]: StatusOf<T> } = {
  prd: 'draft',
  daa: 'draft',
  tip: 'draft',
  rfc: 'draft',
  adr: 'proposed',
  bolt: 'todo',
  postmortem: 'draft'
};

/**
 * Statuses in which title, owner, tags and body may change
 */
export const EDITABLE_STATUSES: { readonly [T in ArtifactType]: readonly StatusOf<T>[] } = {
  prd: ['draft'],
  daa: ['draft'],
  tip: ['draft'],
  rfc: ['draft', 'review'],
  adr: ['proposed'],
  bolt: ['todo', 'in-progress'],
  postmortem: ['draft']
};

/**
 * Entering this status records the content checksum
 */
export const SEALED_STATUS: { readonly [T in ArtifactType]: StatusOf<T> } = {
  prd: 'approved',
  daa: 'locked',
  tip: 'locked',
  rfc: 'approved',
  adr: 'accepted',
  bolt: 'done',
  postmortem: 'published'
};

/**
 * The only status from which an artifact may be superseded; null when the
 * type does not support supersession.
 */
export const SUPERSEDABLE_STATUS: { readonly [T in ArtifactType]: StatusOf<T> | null } = {
  prd: 'approved',
  daa: 'locked',
  tip: 'locked',
  rfc: 'approved',
  adr: 'accepted',
  bolt: null,
  postmortem: null
};

/**
 * Lineage parent types. Empty for roots.
 */
export const PARENT_TYPES: { readonly [T in ArtifactType]: readonly ArtifactType[] } = {
  prd: [],
  daa: ['prd'],
  tip: ['prd'],
  rfc: ['daa', 'tip'],
  adr: ['rfc'],
  bolt: ['adr'],
  postmortem: []
};

/**
 * Types a post-mortem may trace to
 */
export const TRACE_TARGET_TYPES: readonly ArtifactType[] = ['adr', 'bolt', 'prd'];

/**
 * Section fields that must hold real content before the gated transition
 */
export const DEFAULT_REQUIRED_SECTIONS: { readonly [T in ArtifactType]: readonly string[] } = {
  prd: ['problem', 'goals', 'acceptanceCriteria'],
  daa: ['domainOverview', 'invariants'],
  tip: ['summary', 'technicalApproach'],
  rfc: ['problemStatement', 'proposedDesign'],
  adr: ['context', 'decision', 'consequences'],
  bolt: ['description', 'acceptanceCriteria'],
  postmortem: ['summary', 'rootCause', 'actionItems']
};

/**
 * Checks attached to one transition
 */
export interface GateRule {
  /** Required sections must be filled */
  sections?: boolean;
  /** Parent must be in one of these statuses */
  parentStatuses?: readonly ArtifactStatus[];
  /** RFC sign-offs must reach the configured approval count */
  approvals?: boolean;
  /** Post-mortem must trace to at least one artifact */
  traces?: boolean;
}

export const GATES: ReadonlyMap<string, GateRule> = new Map<string, GateRule>([
  ['prd:approved', { sections: true }],
  ['daa:validated', { sections: true, parentStatuses: ['approved'] }],
  ['tip:validated', { sections: true, parentStatuses: ['approved'] }],
  ['rfc:review', { sections: true, parentStatuses: ['validated', 'locked'] }],
  ['rfc:approved', { approvals: true }],
  ['adr:accepted', { sections: true, parentStatuses: ['approved'] }],
  ['bolt:in-progress', { parentStatuses: ['accepted'] }],
  ['bolt:done', { sections: true }],
  ['postmortem:published', { sections: true, traces: true }]
]);

/**
 * Settings the gates read from configuration
 */
export interface GateSettings {
  requiredApprovals: number;
  requiredSections: { readonly [T in ArtifactType]: readonly string[] };
}

export const DEFAULT_GATE_SETTINGS: GateSettings = {
  requiredApprovals: 1,
  requiredSections: DEFAULT_REQUIRED_SECTIONS
};

/**
 * What a gate needs to know beyond the artifact itself
 */
export interface GateContext {
  /** Lineage parent, or null when there is none or it is missing */
  parent: AnyArtifact | null;
  settings: GateSettings;
}

/**
 * Statuses reachable from `from` by a plain transition
 */
export function getTargets(type: ArtifactType, from: string): ArtifactStatus[] {
  const edges: readonly (readonly [ArtifactStatus, ArtifactStatus])[] = TRANSITIONS[type];
  return edges.filter(([source]) => source === from).map(([, target]) => target);
}

export function canTransition(type: ArtifactType, from: string, to: string): boolean {
  return getTargets(type, from).some(target => target === to);
}

export function isEditable(type: ArtifactType, status: string): boolean {
  const editable: readonly string[] = EDITABLE_STATUSES[type];
  return editable.includes(status);
}

export function isSealedStatus(type: ArtifactType, status: string): boolean {
  return SEALED_STATUS[type] === status;
}

export function getSupersedableStatus(type: ArtifactType): ArtifactStatus | null {
  return SUPERSEDABLE_STATUS[type];
}

/**
 * Superseded, rejected and deprecated artifacts accept no new children
 */
export function isRetired(status: ArtifactStatus): boolean {
  return RETIRED_STATUSES.includes(status);
}

export function requiresParent(type: ArtifactType): boolean {
  return PARENT_TYPES[type].length > 0;
}

/**
 * Required sections that are empty or still hold their placeholder
 */
export function findEmptySections(artifact: AnyArtifact, required: readonly string[]): string[] {
  const values = getSectionValues(artifact);
  return SECTION_LAYOUTS[artifact.type]
    .filter(spec => required.includes(spec.field) && isSectionEmpty(values[spec.field]))
    .map(spec => spec.heading);
}

/**
 * Number of distinct reviewers who approved an RFC
 */
export function countApprovals(artifact: AnyArtifact): number {
  if (artifact.type !== 'rfc') {
    return 0;
  }
  const approvers = new Set(
    artifact.signoffs.filter(signoff => signoff.approved).map(signoff => signoff.name.toLowerCase())
  );
  return approvers.size;
}

/**
 * Evaluates every gate on the transition to `to` and reports all failures.
 * An empty result means the transition may proceed.
 */
export function evaluateGates(artifact: AnyArtifact, to: ArtifactStatus, context: GateContext): GateFailure[] {
  const rule = GATES.get(`${artifact.type}:${to}`);
  if (!rule) {
    return [];
  }

  const failures: GateFailure[] = [];

  if (rule.sections) {
    const empty = findEmptySections(artifact, context.settings.requiredSections[artifact.type]);
    for (const heading of empty) {
      failures.push({ gate: 'required-section', message: `Section "${heading}" is empty` });
    }
  }

  if (rule.parentStatuses) {
    const { parent } = context;
    if (!parent) {
      failures.push({ gate: 'parent', message: `${artifact.id} has no parent artifact` });
    } else if (!rule.parentStatuses.includes(parent.status)) {
      failures.push({
        gate: 'parent-status',
        message: `Parent ${parent.id} must be ${rule.parentStatuses.join(' or ')} (is ${parent.status})`
      });
    }
  }

  if (rule.approvals) {
    const required = context.settings.requiredApprovals;
    const approvals = countApprovals(artifact);
    if (approvals < required) {
      failures.push({
        gate: 'approvals',
        message: `Needs ${required} approving sign-off(s), has ${approvals}`
      });
    }
  }

  if (rule.traces) {
    const traces = artifact.references.filter(ref => ref.linkType === 'traces-to');
    if (traces.length === 0) {
      failures.push({
        gate: 'traces',
        message: 'Post-mortem must trace to at least one ADR, Bolt or PRD'
      });
    }
  }

  return failures;
}

/**
 * Returns a copy of the artifact in `status`
 *
 * @throws TransitionError if the status does not belong to the artifact's type
 */
export function withStatus(artifact: AnyArtifact, status: ArtifactStatus): AnyArtifact {
  switch (artifact.type) {
    case 'prd':
      if (isStatusOf('prd', status)) return { ...artifact, status };
      break;
    case 'daa':
      if (isStatusOf('daa', status)) return { ...artifact, status };
      break;
    case 'tip':
      if (isStatusOf('tip', status)) return { ...artifact, status };
      break;
    case 'rfc':
      if (isStatusOf('rfc', status)) return { ...artifact, status };
      break;
    case 'adr':
      if (isStatusOf('adr', status)) return { ...artifact, status };
      break;
    case 'bolt':
      if (isStatusOf('bolt', status)) return { ...artifact, status };
      break;
    case 'postmortem':
      if (isStatusOf('postmortem', status)) return { ...artifact, status };
      break;
  }
  throw new TransitionError(
    `"${status}" is not a ${artifact.type} status`,
    artifact.status,
    status,
    { artifactId: artifact.id }
  );
}
