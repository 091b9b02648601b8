/**
 * Lifecycle Service
 *
 * Applies status transitions and supersession to stored artifacts. The
 * rules themselves live in state-machine.ts; this service loads the
 * artifacts they need, seals, saves, audits and tags.
 */

import type { AnyArtifact } from '../../models/any-artifact.js';
import type { ArtifactStatus } from '../../models/types.js';
import { FileStore } from '../storage/file-store.js';
import { AuditService, SYSTEM_ACTOR } from '../audit/audit-service.js';
import { ConfigService } from '../config/config-service.js';
import { GitTagService } from '../git/git-tag-service.js';
import { seal } from '../../core/integrity.js';
import { validateId, validateStatus } from '../../core/validation.js';
import {
  NotFoundError,
  TransitionError,
  GateError,
  LineageError,
  type GateFailure
} from '../../core/errors.js';
import { logger } from '../../core/logger.js';
import { getParentId, wouldCreateCycle } from '../link/lineage.js';
import {
  getTargets,
  canTransition,
  evaluateGates,
  isSealedStatus,
  getSupersedableStatus,
  withStatus,
  GateContext
} from './state-machine.js';

export interface LifecycleDependencies {
  fileStore: FileStore;
  auditService: AuditService;
  configService: ConfigService;
  gitTagService: GitTagService;
}

/**
 * A status the artifact could move to, with the gates that would block it
 */
export interface TransitionOption {
  to: ArtifactStatus;
  failures: GateFailure[];
  allowed: boolean;
}

export interface TransitionResult {
  artifact: AnyArtifact;
  from: ArtifactStatus;
  /** Git tag created for the new status, if any */
  tag: string | null;
}

export interface SupersedeResult {
  superseded: AnyArtifact;
  successor: AnyArtifact;
  tag: string | null;
}

export class LifecycleService {
  private readonly fileStore: FileStore;
  private readonly auditService: AuditService;
  private readonly configService: ConfigService;
  private readonly gitTagService: GitTagService;

  constructor(deps: LifecycleDependencies) {
    this.fileStore = deps.fileStore;
    this.auditService = deps.auditService;
    this.configService = deps.configService;
    this.gitTagService = deps.gitTagService;
  }

  private async require(id: string): Promise<AnyArtifact> {
    const normalized = validateId(id);
    const artifact = await this.fileStore.load(normalized);
    if (!artifact) {
      throw new NotFoundError('Artifact', normalized);
    }
    return artifact;
  }

  private async gateContext(artifact: AnyArtifact): Promise<GateContext> {
    const parentId = getParentId(artifact);
    const parent = parentId ? await this.fileStore.load(parentId) : null;
    return {
      parent,
      settings: await this.configService.getGateSettings()
    };
  }

  private async tag(artifactId: string, status: ArtifactStatus): Promise<string | null> {
    const git = await this.configService.getGitConfig();
    return this.gitTagService.tagLifecycle(artifactId, status, {
      enabled: git.tagOnSeal,
      tagPrefix: git.tagPrefix
    });
  }

  /**
   * Every status reachable from the current one, with a dry run of its gates
   */
  async getAllowedTransitions(id: string): Promise<TransitionOption[]> {
    const artifact = await this.require(id);
    const context = await this.gateContext(artifact);

    return getTargets(artifact.type, artifact.status).map(to => {
      const failures = evaluateGates(artifact, to, context);
      return { to, failures, allowed: failures.length === 0 };
    });
  }

  /**
   * Moves an artifact to a new status
   *
   * @throws TransitionError if the lifecycle table has no such edge
   * @throws GateError listing every failed gate
   */
  async transition(id: string, to: string, actor: string = SYSTEM_ACTOR): Promise<TransitionResult> {
    const artifact = await this.require(id);
    const from = artifact.status;
    const target = validateStatus(to, artifact.type);

    if (target === 'superseded') {
      throw new TransitionError(
        `${artifact.id} cannot be moved to superseded directly; use supersede`,
        from,
        target
      );
    }

    if (!canTransition(artifact.type, from, target)) {
      const allowed = getTargets(artifact.type, from);
      throw new TransitionError(
        `Cannot move ${artifact.id} from ${from} to ${target}. ` +
        (allowed.length > 0 ? `Allowed: ${allowed.join(', ')}` : `${from} is a final status`),
        from,
        target,
        { artifactId: artifact.id }
      );
    }

    const failures = evaluateGates(artifact, target, await this.gateContext(artifact));
    if (failures.length > 0) {
      throw new GateError(artifact.id, target, failures);
    }

    const now = new Date();
    let updated: AnyArtifact = { ...withStatus(artifact, target), updatedAt: now };

    if (updated.type === 'bolt') {
      if (target === 'in-progress' && !updated.startedAt) {
        updated = { ...updated, startedAt: now };
      }
      if (target === 'done') {
        updated = { ...updated, completedAt: now };
      }
    }

    const sealing = isSealedStatus(updated.type, target);
    if (sealing) {
      updated = seal(updated, now);
    }

    await this.fileStore.save(updated);
    await this.auditService.logAction({
      artifactId: updated.id,
      action: 'transition',
      actor,
      timestamp: now,
      changes: { status: { old: from, new: target } }
    });
    logger.info(`${updated.id}: ${from} -> ${target}`);

    const tag = sealing ? await this.tag(updated.id, target) : null;
    return { artifact: updated, from, tag };
  }

  /**
   * Replaces `oldId` by `newId`: the old artifact becomes superseded and the
   * new one records a `supersedes` link.
   *
   * @throws LineageError for a self, cross-type or cyclic supersession
   * @throws TransitionError when either artifact is not in the supersedable status
   */
  async supersede(oldId: string, newId: string, actor: string = SYSTEM_ACTOR): Promise<SupersedeResult> {
    const old = await this.require(oldId);
    const successor = await this.require(newId);

    if (old.id === successor.id) {
      throw new LineageError(`${old.id} cannot supersede itself`);
    }
    if (old.type !== successor.type) {
      throw new LineageError(
        `${successor.id} cannot supersede ${old.id}: supersession requires the same artifact type`,
        { oldType: old.type, newType: successor.type }
      );
    }

    const required = getSupersedableStatus(old.type);
    if (required === null) {
      throw new TransitionError(`${old.type} artifacts cannot be superseded`, old.status, 'superseded');
    }
    if (old.status === 'superseded') {
      throw new TransitionError(
        `${old.id} is already superseded by ${old.supersededBy ?? 'another artifact'}`,
        old.status,
        'superseded'
      );
    }
    if (old.status !== required) {
      throw new TransitionError(
        `${old.id} must be ${required} to be superseded (is ${old.status})`,
        old.status,
        'superseded'
      );
    }
    if (successor.status !== required) {
      throw new TransitionError(
        `${successor.id} must be ${required} before it can supersede ${old.id} (is ${successor.status})`,
        successor.status,
        required
      );
    }

    const all = await this.fileStore.list();
    if (wouldCreateCycle(all, successor.id, old.id)) {
      throw new LineageError(`${successor.id} superseding ${old.id} would create a lineage cycle`);
    }

    const now = new Date();
    const retired: AnyArtifact = {
      ...withStatus(old, 'superseded'),
      supersededBy: successor.id,
      updatedAt: now
    };
    const replacement: AnyArtifact = {
      ...successor,
      references: [
        ...successor.references.filter(ref => ref.targetId !== old.id),
        { targetId: old.id, targetType: old.type, linkType: 'supersedes' }
      ],
      updatedAt: now
    };

    await this.fileStore.save(retired);
    await this.fileStore.save(replacement);

    await this.auditService.logAction({
      artifactId: retired.id,
      action: 'supersede',
      actor,
      timestamp: now,
      changes: {
        status: { old: old.status, new: 'superseded' },
        supersededBy: { old: null, new: successor.id }
      }
    });
    await this.auditService.logAction({
      artifactId: replacement.id,
      action: 'supersede',
      actor,
      timestamp: now,
      changes: { supersedes: { old: null, new: old.id } }
    });
    logger.info(`${successor.id} supersedes ${old.id}`);

    const tag = await this.tag(retired.id, 'superseded');
    return { superseded: retired, successor: replacement, tag };
  }
}
