// Artifact factories shared by the test suites

import type { PRD } from '../models/prd.js';
import type { DAA } from '../models/daa.js';
import type { TIP } from '../models/tip.js';
import type { RFC } from '../models/rfc.js';
import type { ADR } from '../models/adr.js';
import type { Bolt } from '../models/bolt.js';
import type { Postmortem } from '../models/postmortem.js';
import type { Reference } from '../models/reference.js';
import type { ArtifactType } from '../models/types.js';
import { typeFromId } from '../core/validation.js';

export const CREATED = new Date('2025-03-01T09:00:00.000Z');
export const UPDATED = new Date('2025-03-02T09:00:00.000Z');

function base(id: string) {
  return {
    id,
    title: `Title of ${id}`,
    createdAt: CREATED,
    updatedAt: UPDATED,
    owner: 'test.owner',
    tags: [],
    references: []
  };
}

/**
 * A link whose target type is taken from the target ID
 */
export function ref(targetId: string, linkType: Reference['linkType'] = 'derives-from'): Reference {
  const targetType: ArtifactType = typeFromId(targetId) ?? 'prd';
  return { targetId, targetType, linkType };
}

export function makePRD(overrides: Partial<PRD> = {}): PRD {
  return {
    ...base('PRD-0001'),
    type: 'prd',
    status: 'draft',
    problem: 'Users cannot reorder past purchases',
    goals: ['Reorder in one step'],
    userStories: ['As a buyer, I want to reorder a past basket'],
    acceptanceCriteria: ['Reorder button on every past order'],
    nonGoals: [],
    ...overrides
  };
}

export function makeDAA(overrides: Partial<DAA> = {}): DAA {
  return {
    ...base('DAA-0001'),
    type: 'daa',
    status: 'draft',
    references: [ref('PRD-0001')],
    domainOverview: 'Orders reference products and quantities',
    boundedContexts: [],
    invariants: ['A reorder never exceeds available stock'],
    operations: ['Reorder'],
    openQuestions: [],
    ...overrides
  };
}

export function makeTIP(overrides: Partial<TIP> = {}): TIP {
  return {
    ...base('TIP-0001'),
    type: 'tip',
    status: 'draft',
    references: [ref('PRD-0001')],
    summary: 'Add a reorder endpoint',
    technicalApproach: 'Copy the basket lines into a new cart',
    technologies: ['REST'],
    risks: [],
    ...overrides
  };
}

export function makeRFC(overrides: Partial<RFC> = {}): RFC {
  return {
    ...base('RFC-0001'),
    type: 'rfc',
    status: 'draft',
    references: [ref('DAA-0001')],
    problemStatement: 'Reorders must respect stock limits',
    proposedDesign: 'Reserve stock before creating the cart',
    alternatives: ['Best-effort copy'],
    openQuestions: [],
    signoffs: [],
    ...overrides
  };
}

export function makeADR(overrides: Partial<ADR> = {}): ADR {
  return {
    ...base('ADR-0001'),
    type: 'adr',
    status: 'proposed',
    references: [ref('RFC-0001')],
    context: 'Stock is shared between channels',
    decision: 'Reserve stock synchronously',
    consequences: ['Reorder latency grows by one call'],
    alternativesConsidered: [],
    ...overrides
  };
}

export function makeBolt(overrides: Partial<Bolt> = {}): Bolt {
  return {
    ...base('BOLT-0001'),
    type: 'bolt',
    status: 'todo',
    references: [ref('ADR-0001')],
    description: 'Implement the reservation call',
    acceptanceCriteria: ['Reservation is released on failure'],
    ...overrides
  };
}

export function makePostmortem(overrides: Partial<Postmortem> = {}): Postmortem {
  return {
    ...base('PM-0001'),
    type: 'postmortem',
    status: 'draft',
    references: [ref('ADR-0001', 'traces-to')],
    incidentDate: new Date('2025-03-10T00:00:00.000Z'),
    severity: 'sev2',
    summary: 'Reorders failed for 20 minutes',
    timeline: ['10:00 alerts fired'],
    rootCause: 'Reservation timeout too low',
    actionItems: ['Raise the timeout'],
    lessonsLearned: [],
    ...overrides
  };
}
