/**
 * Link Service
 *
 * Manages links between artifacts. Links live only on the source
 * artifact; incoming links are found by scanning the store.
 */

import type { AnyArtifact } from '../../models/any-artifact.js';
import type { Reference } from '../../models/reference.js';
import { ArtifactType, LinkType } from '../../models/types.js';
import { FileStore } from '../storage/file-store.js';
import { AuditService, SYSTEM_ACTOR } from '../audit/audit-service.js';
import { validateId } from '../../core/validation.js';
import { NotFoundError, LineageError, ValidationError, ImmutableArtifactError } from '../../core/errors.js';
import { logger } from '../../core/logger.js';
import { getParentIds, wouldCreateCycle } from './lineage.js';
import {
  PARENT_TYPES,
  TRACE_TARGET_TYPES,
  isEditable,
  isRetired
} from '../lifecycle/state-machine.js';

/**
 * Link types that can be created with `createLink`
 */
export const MANUAL_LINK_TYPES: readonly LinkType[] = ['derives-from', 'traces-to', 'relates-to'];

/**
 * Represents a link between two artifacts
 */
export interface Link {
  sourceId: string;
  targetId: string;
  type: LinkType;
}

/**
 * Information about an artifact's links
 */
export interface LinkInfo {
  incoming: Link[];
  outgoing: Link[];
}

/**
 * Result of a link creation operation
 */
export interface LinkResult {
  link: Link;
  /** Set when the link already existed and nothing was written */
  warning?: string;
}

/**
 * Result of duplicate link detection
 */
export interface DuplicateLinkResult {
  exists: boolean;
  existingType?: LinkType;
}

/**
 * Link display information for `air show`
 */
export interface LinkDisplay {
  id: string;
  title: string;
  type: ArtifactType;
  linkType: LinkType;
  direction: 'incoming' | 'outgoing';
}

export interface LinkDependencies {
  fileStore: FileStore;
  auditService: AuditService;
}

/**
 * Link Service Interface
 */
export interface ILinkService {
  createLink(sourceId: string, targetId: string, type: LinkType, actor?: string): Promise<LinkResult>;
  removeLink(sourceId: string, targetId: string, actor?: string): Promise<void>;
  getLinks(artifactId: string): Promise<LinkInfo>;
  getParent(artifactId: string): Promise<AnyArtifact | null>;
  getChildren(artifactId: string): Promise<AnyArtifact[]>;
  batchLink(sourceId: string, targetIds: string[], type: LinkType, actor?: string): Promise<LinkResult[]>;
  getLinksForDisplay(artifactId: string): Promise<LinkDisplay[]>;
}

/**
 * Link Service Implementation
 */
export class LinkService implements ILinkService {
  private readonly fileStore: FileStore;
  private readonly auditService: AuditService;

  constructor(deps: LinkDependencies) {
    this.fileStore = deps.fileStore;
    this.auditService = deps.auditService;
  }

  private async require(id: string): Promise<AnyArtifact> {
    const normalized = validateId(id);
    const artifact = await this.fileStore.load(normalized);
    if (!artifact) {
      throw new NotFoundError('Artifact', normalized);
    }
    return artifact;
  }

  /**
   * Adds a link from `sourceId` to `targetId`
   *
   * @throws NotFoundError if either artifact doesn't exist
   * @throws LineageError if the link breaks a lineage rule
   */
  async createLink(
    sourceId: string,
    targetId: string,
    type: LinkType,
    actor: string = SYSTEM_ACTOR
  ): Promise<LinkResult> {
    const source = await this.require(sourceId);
    const target = await this.require(targetId);
    const link: Link = { sourceId: source.id, targetId: target.id, type };

    if (source.id === target.id) {
      throw new LineageError(`${source.id} cannot link to itself`);
    }

    const duplicate = this.findDuplicate(source, target.id);
    if (duplicate.exists) {
      return {
        link,
        warning: `Link already exists between ${source.id} and ${target.id} with type '${duplicate.existingType}'`
      };
    }

    switch (type) {
      case 'supersedes':
        throw new LineageError(`Use supersede to replace ${target.id}; supersedes links cannot be added directly`);
      case 'derives-from':
        await this.checkParentLink(source, target);
        break;
      case 'traces-to':
        if (source.type !== 'postmortem') {
          throw new LineageError('Only post-mortems can trace to other artifacts', { sourceId: source.id });
        }
        if (!TRACE_TARGET_TYPES.includes(target.type)) {
          throw new LineageError(`A post-mortem cannot trace to ${target.id}: expected an ADR, Bolt or PRD`);
        }
        break;
      case 'relates-to':
        break;
    }

    const reference: Reference = { targetId: target.id, targetType: target.type, linkType: type };
    const now = new Date();
    await this.fileStore.save({ ...source, references: [...source.references, reference], updatedAt: now });
    await this.auditService.logAction({
      artifactId: source.id,
      action: 'link',
      actor,
      timestamp: now,
      changes: { [type]: { old: null, new: target.id } }
    });
    logger.info(`Linked ${source.id} ${type} ${target.id}`);

    return { link };
  }

  private async checkParentLink(source: AnyArtifact, target: AnyArtifact): Promise<void> {
    const allowed = PARENT_TYPES[source.type];
    if (allowed.length === 0) {
      throw new LineageError(`A ${source.type} has no lineage parent`);
    }
    if (!allowed.includes(target.type)) {
      throw new LineageError(
        `A ${source.type} cannot derive from ${target.id}: expected a ${allowed.join(' or ')}`,
        { sourceId: source.id, targetId: target.id }
      );
    }

    const parents = getParentIds(source);
    if (parents.length > 0) {
      throw new LineageError(`${source.id} already derives from ${parents.join(', ')}`);
    }
    if (!isEditable(source.type, source.status)) {
      throw new ImmutableArtifactError(source.id, source.status);
    }
    if (isRetired(target.status)) {
      throw new LineageError(`${target.id} is ${target.status} and cannot take new children`);
    }

    const all = await this.fileStore.list();
    if (wouldCreateCycle(all, source.id, target.id)) {
      throw new LineageError(`${source.id} deriving from ${target.id} would create a lineage cycle`);
    }
  }

  /**
   * Removes the link from `sourceId` to `targetId`
   *
   * @throws LineageError for lineage links, which are permanent
   */
  async removeLink(sourceId: string, targetId: string, actor: string = SYSTEM_ACTOR): Promise<void> {
    const source = await this.require(sourceId);
    const normalizedTarget = validateId(targetId);

    const reference = source.references.find(ref => ref.targetId === normalizedTarget);
    if (!reference) {
      throw new NotFoundError('Link', `${source.id} -> ${normalizedTarget}`);
    }
    if (reference.linkType === 'derives-from' || reference.linkType === 'supersedes') {
      throw new LineageError(
        `The ${reference.linkType} link from ${source.id} to ${normalizedTarget} is part of the lineage and cannot be removed`
      );
    }

    const references = source.references.filter(ref => ref.targetId !== normalizedTarget);
    if (
      reference.linkType === 'traces-to' &&
      source.status === 'published' &&
      !references.some(ref => ref.linkType === 'traces-to')
    ) {
      throw new ValidationError(`${source.id} is published and must keep at least one trace`, 'references');
    }

    const now = new Date();
    await this.fileStore.save({ ...source, references, updatedAt: now });
    await this.auditService.logAction({
      artifactId: source.id,
      action: 'unlink',
      actor,
      timestamp: now,
      changes: { [reference.linkType]: { old: normalizedTarget, new: null } }
    });
    logger.info(`Unlinked ${source.id} from ${normalizedTarget}`);
  }

  /**
   * Gets all links for an artifact (both incoming and outgoing)
   */
  async getLinks(artifactId: string): Promise<LinkInfo> {
    const artifact = await this.require(artifactId);

    const outgoing = artifact.references.map(ref => ({
      sourceId: artifact.id,
      targetId: ref.targetId,
      type: ref.linkType
    }));

    const incoming: Link[] = [];
    for (const other of await this.fileStore.list()) {
      if (other.id === artifact.id) continue;

      for (const ref of other.references) {
        if (ref.targetId === artifact.id) {
          incoming.push({ sourceId: other.id, targetId: artifact.id, type: ref.linkType });
        }
      }
    }

    return { incoming, outgoing };
  }

  /**
   * The artifact this one derives from, or null for root types
   */
  async getParent(artifactId: string): Promise<AnyArtifact | null> {
    const artifact = await this.require(artifactId);
    const [parentId] = getParentIds(artifact);
    return parentId ? this.fileStore.load(parentId) : null;
  }

  /**
   * Artifacts deriving from this one, by ID
   */
  async getChildren(artifactId: string): Promise<AnyArtifact[]> {
    const artifact = await this.require(artifactId);
    const all = await this.fileStore.list();
    return all
      .filter(other => getParentIds(other).includes(artifact.id))
      .sort((a, b) => a.id.localeCompare(b.id));
  }

  private findDuplicate(source: AnyArtifact, targetId: string): DuplicateLinkResult {
    const existing = source.references.find(ref => ref.targetId === targetId);
    return existing ? { exists: true, existingType: existing.linkType } : { exists: false };
  }

  /**
   * Creates links from one source to several targets, checking that every
   * target exists before writing any
   */
  async batchLink(
    sourceId: string,
    targetIds: string[],
    type: LinkType,
    actor: string = SYSTEM_ACTOR
  ): Promise<LinkResult[]> {
    await this.require(sourceId);
    for (const targetId of targetIds) {
      await this.require(targetId);
    }

    const results: LinkResult[] = [];
    for (const targetId of targetIds) {
      results.push(await this.createLink(sourceId, targetId, type, actor));
    }
    return results;
  }

  /**
   * Gets links formatted for display, skipping targets that no longer exist
   */
  async getLinksForDisplay(artifactId: string): Promise<LinkDisplay[]> {
    const links = await this.getLinks(artifactId);
    const displays: LinkDisplay[] = [];

    for (const link of links.outgoing) {
      const target = await this.fileStore.load(link.targetId);
      if (target) {
        displays.push({ id: target.id, title: target.title, type: target.type, linkType: link.type, direction: 'outgoing' });
      }
    }

    for (const link of links.incoming) {
      const source = await this.fileStore.load(link.sourceId);
      if (source) {
        displays.push({ id: source.id, title: source.title, type: source.type, linkType: link.type, direction: 'incoming' });
      }
    }

    return displays;
  }
}
