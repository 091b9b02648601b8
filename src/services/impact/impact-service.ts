/**
 * Impact Analysis Service
 *
 * Analyzes the impact of superseding or deprecating an artifact by
 * walking everything that derives from it or traces to it, and scores
 * the risk.
 */

import type { AnyArtifact } from '../../models/any-artifact.js';
import type { ArtifactType, ArtifactStatus, LinkType } from '../../models/types.js';
import { FileStore } from '../storage/file-store.js';
import { validateId } from '../../core/validation.js';
import { NotFoundError } from '../../core/errors.js';

/**
 * Impact analysis report
 */
export interface ImpactReport {
  artifactId: string;
  directDependents: string[];
  transitiveDependents: string[];
  /** Post-mortems among the dependents */
  postmortems: string[];
  riskScore: number;
  maxDepth: number;
}

/**
 * Follow-up task for superseding or deprecating an artifact
 */
export interface ImpactTask {
  artifactId: string;
  action: string;
  priority: 'high' | 'medium' | 'low';
}

export interface ImpactChecklist {
  artifactId: string;
  tasks: ImpactTask[];
}

/**
 * Internal structure for tracking dependent with depth
 */
interface DependentInfo {
  artifact: AnyArtifact;
  depth: number;
  /** Link from the dependent to the artifact it was reached from */
  via: LinkType;
}

/**
 * Links that make the source depend on the target
 */
const DEPENDENCY_LINK_TYPES: readonly LinkType[] = ['derives-from', 'traces-to'];

/**
 * Criticality weights for artifact types
 */
const TYPE_CRITICALITY: Record<ArtifactType, number> = {
  prd: 3,
  daa: 3,
  rfc: 3,
  tip: 2,
  adr: 2,
  bolt: 1,
  postmortem: 1
};

/**
 * Status criticality weights
 */
const STATUS_CRITICALITY: Record<ArtifactStatus, number> = {
  approved: 3,
  accepted: 3,
  validated: 3,
  locked: 3,
  published: 3,
  'in-progress': 3,
  done: 3,
  review: 2,
  proposed: 2,
  draft: 1,
  todo: 1,
  deprecated: 0,
  superseded: 0,
  rejected: 0
};

/**
 * Impact Analysis Service Interface
 */
export interface IImpactService {
  analyzeImpact(artifactId: string): Promise<ImpactReport>;
  generateChecklist(artifactId: string): Promise<ImpactChecklist>;
}

/**
 * Impact Analysis Service Implementation
 */
export class ImpactService implements IImpactService {
  private readonly fileStore: FileStore;

  constructor(fileStore: FileStore) {
    this.fileStore = fileStore;
  }

  /**
   * Analyzes the impact of changing or retiring an artifact, classifying
   * its dependents as direct or transitive
   *
   * @throws NotFoundError if the artifact does not exist
   */
  async analyzeImpact(artifactId: string): Promise<ImpactReport> {
    const { id, dependents } = await this.traverseDependents(artifactId);

    const directDependents: string[] = [];
    const transitiveDependents: string[] = [];
    let maxDepth = 0;

    for (const dep of dependents) {
      if (dep.depth === 1) {
        directDependents.push(dep.artifact.id);
      } else {
        transitiveDependents.push(dep.artifact.id);
      }
      maxDepth = Math.max(maxDepth, dep.depth);
    }

    return {
      artifactId: id,
      directDependents,
      transitiveDependents,
      postmortems: dependents.filter(dep => dep.artifact.type === 'postmortem').map(dep => dep.artifact.id),
      riskScore: this.calculateRiskScoreFromDependents(dependents),
      maxDepth
    };
  }

  /**
   * Finds every dependent of an artifact breadth first, so each one is
   * recorded at its shortest depth
   */
  private async traverseDependents(artifactId: string): Promise<{ id: string; dependents: DependentInfo[] }> {
    const id = validateId(artifactId);
    const artifacts = await this.fileStore.list();
    if (!artifacts.some(a => a.id === id)) {
      throw new NotFoundError('Artifact', id);
    }

    const incoming = new Map<string, Array<{ artifact: AnyArtifact; via: LinkType }>>();
    for (const artifact of artifacts) {
      for (const ref of artifact.references) {
        if (DEPENDENCY_LINK_TYPES.includes(ref.linkType)) {
          incoming.set(ref.targetId, [...(incoming.get(ref.targetId) ?? []), { artifact, via: ref.linkType }]);
        }
      }
    }

    const visited = new Set<string>([id]);
    const dependents: DependentInfo[] = [];
    const queue: Array<{ id: string; depth: number }> = [{ id, depth: 0 }];

    let current = queue.shift();
    while (current) {
      const sources = [...(incoming.get(current.id) ?? [])].sort((a, b) => a.artifact.id.localeCompare(b.artifact.id));
      for (const source of sources) {
        if (visited.has(source.artifact.id)) continue;

        visited.add(source.artifact.id);
        dependents.push({ artifact: source.artifact, depth: current.depth + 1, via: source.via });
        queue.push({ id: source.artifact.id, depth: current.depth + 1 });
      }
      current = queue.shift();
    }

    return { id, dependents };
  }

  /**
   * Risk score formula:
   * - 10 per direct dependent, 5 per transitive one
   * - plus type weight times status weight for each dependent
   * - plus twice the maximum depth
   *
   * Score is capped at 100
   */
  private calculateRiskScoreFromDependents(dependents: readonly DependentInfo[]): number {
    if (dependents.length === 0) {
      return 0;
    }

    let score = 0;
    let maxDepth = 0;

    for (const dep of dependents) {
      score += dep.depth === 1 ? 10 : 5;
      score += this.getArtifactCriticality(dep.artifact);
      maxDepth = Math.max(maxDepth, dep.depth);
    }

    score += maxDepth * 2;

    return Math.min(100, score);
  }

  /**
   * Generates the follow-up tasks for superseding or deprecating an
   * artifact, most critical dependents first
   */
  async generateChecklist(artifactId: string): Promise<ImpactChecklist> {
    const { id, dependents } = await this.traverseDependents(artifactId);

    const sortedDependents = [...dependents].sort(
      (a, b) => this.getArtifactCriticality(b.artifact) - this.getArtifactCriticality(a.artifact)
    );

    const tasks = sortedDependents.map(dep => ({
      artifactId: dep.artifact.id,
      action: this.describeTask(id, dep),
      priority: this.getPriorityFromCriticality(this.getArtifactCriticality(dep.artifact))
    }));

    return { artifactId: id, tasks };
  }

  private describeTask(artifactId: string, dep: DependentInfo): string {
    const dependentId = dep.artifact.id;
    if (dep.depth > 1) {
      return `Review ${dependentId} for transitive dependency on ${artifactId} (depth: ${dep.depth})`;
    }
    if (dep.via === 'traces-to') {
      return `Check that the action items of ${dependentId} still apply after ${artifactId} is retired`;
    }
    return `Re-derive ${dependentId} from the successor of ${artifactId} or confirm it still holds`;
  }

  private getArtifactCriticality(artifact: AnyArtifact): number {
    return TYPE_CRITICALITY[artifact.type] * STATUS_CRITICALITY[artifact.status];
  }

  /**
   * Converts criticality score to priority level
   */
  private getPriorityFromCriticality(criticality: number): 'high' | 'medium' | 'low' {
    if (criticality >= 6) return 'high';
    if (criticality >= 3) return 'medium';
    return 'low';
  }
}
