/**
 * Artifact Service
 *
 * Creates and edits AirSDLC artifacts. Creation enforces lineage (every
 * derived artifact names a live parent of the right type); edits are only
 * accepted while the artifact's status is editable.
 */

import type { AnyArtifact } from '../../models/any-artifact.js';
import type { Reference } from '../../models/reference.js';
import type { BoundedContext } from '../../models/daa.js';
import type { Signoff } from '../../models/rfc.js';
import { ArtifactType, Severity } from '../../models/types.js';
import { FileStore, ArtifactFilters } from '../storage/file-store.js';
import { IdGenerator } from '../id-generator.js';
import { AuditService, FieldChange, SYSTEM_ACTOR } from '../audit/audit-service.js';
import { ConfigService } from '../config/config-service.js';
import { ArtifactValidator } from '../validation/validator.js';
import {
  SECTION_LAYOUTS,
  SectionSpec,
  SectionValue,
  findSection,
  getSectionValues,
  templateValues,
  withSections
} from '../serialization/sections.js';
import {
  INITIAL_STATUS,
  PARENT_TYPES,
  TRACE_TARGET_TYPES,
  isEditable,
  isRetired,
  requiresParent
} from '../lifecycle/state-machine.js';
import {
  MAX_LENGTHS,
  validateId,
  validateTitle,
  validateOwner,
  validateTags
} from '../../core/validation.js';
import {
  ValidationError,
  NotFoundError,
  LineageError,
  ImmutableArtifactError
} from '../../core/errors.js';
import { logger } from '../../core/logger.js';

/**
 * Data for creating a new artifact
 */
export interface CreateArtifactInput {
  type: ArtifactType;
  title: string;
  /** Falls back to `defaults.owner` from config */
  owner?: string;
  tags?: string[];
  /** Lineage parent; required for every type except PRD and post-mortem */
  parentId?: string;
  /** Post-mortems only: ADRs, Bolts or PRDs involved in the incident */
  traces?: string[];
  severity?: Severity;
  incidentDate?: Date;
  deployment?: string;
  /** Initial section content keyed by heading or field; the rest get placeholders */
  sections?: Record<string, SectionValue>;
}

export interface UpdateArtifactData {
  title?: string;
  owner?: string;
  tags?: string[];
}

export interface SignoffInput {
  name: string;
  role: string;
  approved: boolean;
}

export interface ArtifactDependencies {
  fileStore: FileStore;
  idGenerator: IdGenerator;
  auditService: AuditService;
  configService: ConfigService;
}

const HEADING_LINE = /^#{1,2}\s/m;

/**
 * Turns free-form input into list items: one per non-empty line, with
 * leading bullets removed and no embedded line breaks
 */
export function toListItems(body: string | string[]): string[] {
  const lines = Array.isArray(body) ? body.flatMap(item => item.split(/\r?\n/)) : body.split(/\r?\n/);
  return lines
    .map(line => line.trim().replace(/^[-*]\s+/, '').trim())
    .filter(line => line.length > 0);
}

function toSectionValue(spec: SectionSpec, body: SectionValue): SectionValue {
  const joined = Array.isArray(body) ? body.join('\n') : body;
  if (HEADING_LINE.test(joined)) {
    throw new ValidationError(`Section "${spec.heading}" cannot contain Markdown headings`, spec.field);
  }
  if (joined.length > MAX_LENGTHS.section) {
    throw new ValidationError(`Section "${spec.heading}" exceeds maximum length of ${MAX_LENGTHS.section}`, spec.field);
  }
  return spec.kind === 'list' ? toListItems(body) : joined.trim();
}

interface CommonFields {
  id: string;
  title: string;
  createdAt: Date;
  updatedAt: Date;
  owner: string;
  tags: string[];
  references: Reference[];
}

/**
 * An artifact of `type` in its initial status with empty sections
 */
function blankArtifact(type: ArtifactType, common: CommonFields, input: CreateArtifactInput): AnyArtifact {
  switch (type) {
    case 'prd':
      return { ...common, type, status: INITIAL_STATUS.prd, problem: '', goals: [], userStories: [], acceptanceCriteria: [], nonGoals: [] };
    case 'daa':
      return { ...common, type, status: INITIAL_STATUS.daa, domainOverview: '', boundedContexts: [], invariants: [], operations: [], openQuestions: [] };
    case 'tip':
      return { ...common, type, status: INITIAL_STATUS.tip, summary: '', technicalApproach: '', technologies: [], risks: [] };
    case 'rfc':
      return { ...common, type, status: INITIAL_STATUS.rfc, problemStatement: '', proposedDesign: '', alternatives: [], openQuestions: [], signoffs: [] };
    case 'adr':
      return { ...common, type, status: INITIAL_STATUS.adr, context: '', decision: '', consequences: [], alternativesConsidered: [] };
    case 'bolt':
      return { ...common, type, status: INITIAL_STATUS.bolt, description: '', acceptanceCriteria: [] };
    case 'postmortem': {
      if (!input.severity) {
        throw new ValidationError('Severity is required for post-mortems', 'severity');
      }
      return {
        ...common,
        type,
        status: INITIAL_STATUS.postmortem,
        incidentDate: input.incidentDate ?? common.createdAt,
        severity: input.severity,
        deployment: input.deployment?.trim() || undefined,
        summary: '',
        timeline: [],
        rootCause: '',
        actionItems: [],
        lessonsLearned: []
      };
    }
  }
}

/**
 * Artifact Service for managing every AirSDLC artifact type
 */
export class ArtifactService {
  private readonly fileStore: FileStore;
  private readonly idGenerator: IdGenerator;
  private readonly auditService: AuditService;
  private readonly configService: ConfigService;
  private readonly validator = new ArtifactValidator();

  constructor(deps: ArtifactDependencies) {
    this.fileStore = deps.fileStore;
    this.idGenerator = deps.idGenerator;
    this.auditService = deps.auditService;
    this.configService = deps.configService;
  }

  /**
   * Creates an artifact from its template
   *
   * @throws LineageError if the parent is absent, of the wrong type or retired
   * @throws NotFoundError if the parent or a trace target does not exist
   */
  async create(input: CreateArtifactInput, actor: string = SYSTEM_ACTOR): Promise<AnyArtifact> {
    const { type } = input;
    const title = validateTitle(input.title);
    const owner = validateOwner(input.owner?.trim() || (await this.configService.getDefaultOwner()) || '');
    const tags = validateTags([...(await this.configService.getDefaultTags(type)), ...(input.tags ?? [])]);

    const references: Reference[] = [];
    const parent = await this.resolveParent(type, input.parentId);
    if (parent) {
      references.push({ targetId: parent.id, targetType: parent.type, linkType: 'derives-from' });
    }
    for (const target of await this.resolveTraces(type, input.traces ?? [])) {
      references.push({ targetId: target.id, targetType: target.type, linkType: 'traces-to' });
    }

    let id = this.idGenerator.generateId(type);
    while (await this.fileStore.exists(id)) {
      logger.warn(`${id} already exists on disk, skipping`);
      id = this.idGenerator.generateId(type);
    }

    const now = new Date();
    const blank = blankArtifact(type, { id, title, createdAt: now, updatedAt: now, owner, tags, references }, input);
    const artifact = withSections(
      withSections(blank, templateValues(type)),
      this.normalizeSections(type, input.sections ?? {})
    );

    this.assertValid(artifact);
    await this.fileStore.save(artifact);
    await this.auditService.logAction({ artifactId: id, action: 'create', actor, timestamp: now });
    logger.info(`Created ${id}: ${title}`);

    return artifact;
  }

  private async resolveParent(type: ArtifactType, parentId: string | undefined): Promise<AnyArtifact | null> {
    const allowed = PARENT_TYPES[type];

    if (!requiresParent(type)) {
      if (parentId) {
        throw new LineageError(`A ${type} has no lineage parent`);
      }
      return null;
    }

    if (!parentId) {
      throw new LineageError(
        `A ${type} must derive from a ${allowed.join(' or ')}; pass its ID as the parent`,
        { type }
      );
    }

    const parent = await this.get(parentId);
    if (!allowed.includes(parent.type)) {
      throw new LineageError(
        `A ${type} cannot derive from ${parent.id}: expected a ${allowed.join(' or ')}`,
        { type, parentId: parent.id }
      );
    }
    if (isRetired(parent.status)) {
      throw new LineageError(`${parent.id} is ${parent.status} and cannot take new children`, { parentId: parent.id });
    }
    return parent;
  }

  private async resolveTraces(type: ArtifactType, traces: readonly string[]): Promise<AnyArtifact[]> {
    if (traces.length === 0) {
      return [];
    }
    if (type !== 'postmortem') {
      throw new ValidationError('Only post-mortems trace to other artifacts', 'traces');
    }

    const targets: AnyArtifact[] = [];
    for (const traceId of new Set(traces.map(t => validateId(t)))) {
      const target = await this.get(traceId);
      if (!TRACE_TARGET_TYPES.includes(target.type)) {
        throw new LineageError(`A post-mortem cannot trace to ${target.id}: expected an ADR, Bolt or PRD`);
      }
      targets.push(target);
    }
    return targets;
  }

  private normalizeSections(type: ArtifactType, sections: Record<string, SectionValue>): Record<string, SectionValue> {
    const values: Record<string, SectionValue> = {};
    for (const [name, body] of Object.entries(sections)) {
      const spec = this.requireSection(type, name);
      values[spec.field] = toSectionValue(spec, body);
    }
    return values;
  }

  private requireSection(type: ArtifactType, name: string): SectionSpec {
    const spec = findSection(type, name);
    if (!spec) {
      const known = SECTION_LAYOUTS[type].map(s => s.heading).join(', ');
      throw new ValidationError(`Unknown ${type} section "${name}". Sections: ${known}`, 'section');
    }
    return spec;
  }

  private assertValid(artifact: AnyArtifact): void {
    const result = this.validator.validate(artifact);
    if (!result.valid) {
      throw new ValidationError(
        `${artifact.id} is invalid: ${result.errors.map(e => `${e.field}: ${e.message}`).join('; ')}`
      );
    }
  }

  private assertEditable(artifact: AnyArtifact): void {
    if (!isEditable(artifact.type, artifact.status)) {
      throw new ImmutableArtifactError(artifact.id, artifact.status);
    }
  }

  private async commitUpdate(
    artifact: AnyArtifact,
    changes: Record<string, FieldChange>,
    actor: string
  ): Promise<AnyArtifact> {
    this.assertValid(artifact);
    await this.fileStore.save(artifact);
    await this.auditService.logAction({
      artifactId: artifact.id,
      action: 'update',
      actor,
      timestamp: artifact.updatedAt,
      changes
    });
    return artifact;
  }

  /**
   * @throws NotFoundError if no such artifact exists
   */
  async get(id: string): Promise<AnyArtifact> {
    const artifact = await this.find(id);
    if (!artifact) {
      throw new NotFoundError('Artifact', id.trim().toUpperCase());
    }
    return artifact;
  }

  async find(id: string): Promise<AnyArtifact | null> {
    return this.fileStore.load(validateId(id));
  }

  async list(filters?: ArtifactFilters): Promise<AnyArtifact[]> {
    return this.fileStore.list(filters);
  }

  /**
   * Changes title, owner or tags. Fields equal to the current value are ignored.
   */
  async update(id: string, data: UpdateArtifactData, actor: string = SYSTEM_ACTOR): Promise<AnyArtifact> {
    const existing = await this.get(id);
    this.assertEditable(existing);

    const changes: Record<string, FieldChange> = {};
    let updated: AnyArtifact = existing;

    if (data.title !== undefined) {
      const title = validateTitle(data.title);
      if (title !== existing.title) {
        changes.title = { old: existing.title, new: title };
        updated = { ...updated, title };
      }
    }
    if (data.owner !== undefined) {
      const owner = validateOwner(data.owner);
      if (owner !== existing.owner) {
        changes.owner = { old: existing.owner, new: owner };
        updated = { ...updated, owner };
      }
    }
    if (data.tags !== undefined) {
      const tags = validateTags(data.tags);
      if (tags.join(',') !== existing.tags.join(',')) {
        changes.tags = { old: existing.tags, new: tags };
        updated = { ...updated, tags };
      }
    }

    if (Object.keys(changes).length === 0) {
      return existing;
    }
    return this.commitUpdate({ ...updated, updatedAt: new Date() }, changes, actor);
  }

  /**
   * Replaces the body of one section, addressed by heading or field name
   */
  async updateSection(id: string, section: string, body: SectionValue, actor: string = SYSTEM_ACTOR): Promise<AnyArtifact> {
    const existing = await this.get(id);
    this.assertEditable(existing);

    const spec = this.requireSection(existing.type, section);
    const value = toSectionValue(spec, body);
    const updated = withSections({ ...existing, updatedAt: new Date() }, { [spec.field]: value });

    return this.commitUpdate(
      updated,
      { [spec.field]: { old: getSectionValues(existing)[spec.field], new: value } },
      actor
    );
  }

  /**
   * Records a reviewer's sign-off on an RFC, replacing that reviewer's earlier one
   */
  async addSignoff(id: string, input: SignoffInput, actor: string = SYSTEM_ACTOR): Promise<AnyArtifact> {
    const existing = await this.get(id);
    if (existing.type !== 'rfc') {
      throw new ValidationError(`Sign-offs apply to RFCs, not ${existing.id}`, 'signoff');
    }
    this.assertEditable(existing);

    const role = input.role.trim();
    if (role.length === 0) {
      throw new ValidationError('Sign-off role cannot be empty', 'role');
    }

    const signoff: Signoff = {
      name: validateOwner(input.name),
      role,
      approved: input.approved,
      date: new Date()
    };
    const signoffs = [
      ...existing.signoffs.filter(s => s.name.toLowerCase() !== signoff.name.toLowerCase()),
      signoff
    ];

    return this.commitUpdate(
      { ...existing, signoffs, updatedAt: signoff.date },
      { signoffs: { old: existing.signoffs.length, new: signoffs.length } },
      actor
    );
  }

  /**
   * Adds a bounded context to a DAA
   */
  async addBoundedContext(id: string, context: BoundedContext, actor: string = SYSTEM_ACTOR): Promise<AnyArtifact> {
    const existing = await this.get(id);
    if (existing.type !== 'daa') {
      throw new ValidationError(`Bounded contexts belong to DAAs, not ${existing.id}`, 'boundedContexts');
    }
    this.assertEditable(existing);

    const name = context.name.trim();
    if (existing.boundedContexts.some(c => c.name.toLowerCase() === name.toLowerCase())) {
      throw new ValidationError(`${existing.id} already has a bounded context named "${name}"`, 'boundedContexts');
    }

    const boundedContexts = [
      ...existing.boundedContexts,
      {
        name,
        responsibility: context.responsibility.trim(),
        aggregates: context.aggregates.map(a => a.trim()).filter(a => a.length > 0)
      }
    ];

    return this.commitUpdate(
      { ...existing, boundedContexts, updatedAt: new Date() },
      { boundedContexts: { old: existing.boundedContexts.map(c => c.name), new: boundedContexts.map(c => c.name) } },
      actor
    );
  }

  /**
   * Sets a Bolt's assignee and, optionally, its estimate
   */
  async assign(id: string, assignee: string, estimate?: string, actor: string = SYSTEM_ACTOR): Promise<AnyArtifact> {
    const existing = await this.get(id);
    if (existing.type !== 'bolt') {
      throw new ValidationError(`Only Bolts can be assigned, not ${existing.id}`, 'assignee');
    }
    this.assertEditable(existing);

    const name = validateOwner(assignee);
    const changes: Record<string, FieldChange> = {
      assignee: { old: existing.assignee ?? null, new: name }
    };
    const trimmedEstimate = estimate?.trim();
    if (trimmedEstimate) {
      changes.estimate = { old: existing.estimate ?? null, new: trimmedEstimate };
    }

    return this.commitUpdate(
      {
        ...existing,
        assignee: name,
        estimate: trimmedEstimate || existing.estimate,
        updatedAt: new Date()
      },
      changes,
      actor
    );
  }

  /**
   * Deletes an artifact that never left its initial status and that
   * nothing links to
   */
  async delete(id: string, actor: string = SYSTEM_ACTOR): Promise<void> {
    const existing = await this.get(id);
    if (existing.status !== INITIAL_STATUS[existing.type]) {
      throw new ImmutableArtifactError(existing.id, existing.status);
    }

    const all = await this.fileStore.list();
    const referrers = all
      .filter(other => other.references.some(ref => ref.targetId === existing.id))
      .map(other => other.id)
      .sort();
    if (referrers.length > 0) {
      throw new LineageError(
        `Cannot delete ${existing.id}: referenced by ${referrers.join(', ')}`,
        { referrers }
      );
    }

    await this.fileStore.delete(existing.id);
    await this.auditService.logAction({ artifactId: existing.id, action: 'delete', actor });
    logger.info(`Deleted ${existing.id}`);
  }
}
