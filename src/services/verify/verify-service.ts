/**
 * Verify Service
 *
 * Scans the whole store and reports every broken invariant: invalid
 * artifacts, tampered seals, dangling links, orphans, lineage cycles,
 * parents that fell behind their children and files that cannot be read.
 */

import type { AnyArtifact } from '../../models/any-artifact.js';
import { ArtifactStatus, RETIRED_STATUSES, STATUSES } from '../../models/types.js';
import { FileStore } from '../storage/file-store.js';
import { ConfigService } from '../config/config-service.js';
import { PlaybookService } from '../playbook/playbook-service.js';
import { ArtifactValidator } from '../validation/validator.js';
import { verifyIntegrity } from '../../core/integrity.js';
import { errorMessage } from '../../core/errors.js';
import { logger } from '../../core/logger.js';
import { findLineageCycles, getParentIds } from '../link/lineage.js';
import { GATES, requiresParent } from '../lifecycle/state-machine.js';

export type IssueKind =
  | 'invalid-artifact'
  | 'checksum-mismatch'
  | 'broken-reference'
  | 'missing-parent'
  | 'lineage-cycle'
  | 'status-inconsistency'
  | 'unparseable-file';

export type IssueSeverity = 'error' | 'warning';

export interface VerifyIssue {
  kind: IssueKind;
  severity: IssueSeverity;
  /** Artifact or pattern ID, when the file could be read */
  artifactId?: string;
  /** File path, for unreadable files */
  path?: string;
  message: string;
}

export interface VerifyReport {
  /** Artifacts and patterns read */
  checked: number;
  issues: VerifyIssue[];
  errors: number;
  warnings: number;
  /** No errors; warnings are allowed */
  ok: boolean;
}

export interface VerifyDependencies {
  fileStore: FileStore;
  configService: ConfigService;
  playbook: PlaybookService;
}

/**
 * Statuses a parent may hold once a child passed its gate: the gated ones,
 * or superseded when a newer parent replaced it
 */
function parentStatusesAfterGate(gated: readonly ArtifactStatus[]): readonly ArtifactStatus[] {
  return [...gated, 'superseded'];
}

/**
 * True when `status` is `gated` or a later, still-live status of the same lifecycle
 */
function hasPassed(artifact: AnyArtifact, gated: string): boolean {
  const order: readonly string[] = STATUSES[artifact.type];
  if (RETIRED_STATUSES.includes(artifact.status)) {
    return false;
  }
  const gatedIndex = order.indexOf(gated);
  return gatedIndex >= 0 && order.indexOf(artifact.status) >= gatedIndex;
}

export class VerifyService {
  private readonly fileStore: FileStore;
  private readonly configService: ConfigService;
  private readonly playbook: PlaybookService;
  private readonly validator = new ArtifactValidator();

  constructor(deps: VerifyDependencies) {
    this.fileStore = deps.fileStore;
    this.configService = deps.configService;
    this.playbook = deps.playbook;
  }

  async verify(): Promise<VerifyReport> {
    const { artifacts, failures } = await this.fileStore.scan();
    const playbook = await this.playbook.scan();
    const index = new Map(artifacts.map(a => [a.id, a]));

    const issues: VerifyIssue[] = [];

    for (const failure of [...failures, ...playbook.failures]) {
      issues.push({ kind: 'unparseable-file', severity: 'error', path: failure.path, message: failure.error });
    }

    for (const artifact of artifacts) {
      issues.push(...this.checkArtifact(artifact, index));
    }

    for (const cycle of findLineageCycles(artifacts)) {
      issues.push({
        kind: 'lineage-cycle',
        severity: 'error',
        artifactId: cycle[0],
        message: `Lineage cycle: ${cycle.join(' -> ')}`
      });
    }

    for (const pattern of playbook.patterns) {
      for (const sourceId of pattern.sourcePostmortems) {
        if (!index.has(sourceId)) {
          issues.push({
            kind: 'broken-reference',
            severity: 'error',
            artifactId: pattern.id,
            message: `${pattern.id} is learned from ${sourceId}, which does not exist`
          });
        }
      }
    }

    issues.push(...(await this.checkConfig()));

    const errors = issues.filter(i => i.severity === 'error').length;
    const warnings = issues.length - errors;
    logger.debug('Verified store', { checked: artifacts.length + playbook.patterns.length, errors, warnings });

    return {
      checked: artifacts.length + playbook.patterns.length,
      issues,
      errors,
      warnings,
      ok: errors === 0
    };
  }

  private checkArtifact(artifact: AnyArtifact, index: ReadonlyMap<string, AnyArtifact>): VerifyIssue[] {
    const issues: VerifyIssue[] = [];
    const artifactId = artifact.id;

    for (const error of this.validator.validate(artifact).errors) {
      issues.push({ kind: 'invalid-artifact', severity: 'error', artifactId, message: `${error.field}: ${error.message}` });
    }

    const integrity = verifyIntegrity(artifact);
    if (!integrity.valid) {
      issues.push({
        kind: 'checksum-mismatch',
        severity: 'error',
        artifactId,
        message: integrity.reason ?? `${artifactId} does not match its seal`
      });
    }

    for (const ref of artifact.references) {
      if (!index.has(ref.targetId)) {
        issues.push({
          kind: 'broken-reference',
          severity: 'error',
          artifactId,
          message: `${ref.linkType} link to ${ref.targetId}, which does not exist`
        });
      }
    }
    if (artifact.supersededBy && !index.has(artifact.supersededBy)) {
      issues.push({
        kind: 'broken-reference',
        severity: 'error',
        artifactId,
        message: `Superseded by ${artifact.supersededBy}, which does not exist`
      });
    }

    const parentIds = getParentIds(artifact);
    if (requiresParent(artifact.type) && parentIds.length !== 1) {
      issues.push({
        kind: 'missing-parent',
        severity: 'error',
        artifactId,
        message: parentIds.length === 0
          ? `${artifactId} does not derive from any artifact`
          : `${artifactId} derives from ${parentIds.length} artifacts: ${parentIds.join(', ')}`
      });
    }

    const parent = parentIds.length === 1 ? index.get(parentIds[0]) : undefined;
    if (parent) {
      for (const [key, rule] of GATES) {
        const [type, gated] = key.split(':');
        if (type !== artifact.type || !rule.parentStatuses || !hasPassed(artifact, gated)) continue;

        const allowed = parentStatusesAfterGate(rule.parentStatuses);
        if (!allowed.includes(parent.status)) {
          issues.push({
            kind: 'status-inconsistency',
            severity: 'warning',
            artifactId,
            message: `${artifactId} is ${artifact.status} but its parent ${parent.id} is ${parent.status} (expected ${allowed.join(' or ')})`
          });
        }
      }
    }

    return issues;
  }

  private async checkConfig(): Promise<VerifyIssue[]> {
    this.configService.clearCache();
    try {
      await this.configService.load();
      return [];
    } catch (error) {
      return [{
        kind: 'unparseable-file',
        severity: 'error',
        path: this.configService.getConfigPath(),
        message: errorMessage(error)
      }];
    }
  }
}
