// Playbook pattern model

/**
 * A reusable architectural pattern. Playbook entries are a separate
 * collection, not part of the artifact lineage.
 */
export interface PlaybookPattern {
  /** Unique identifier (e.g., PLAY-0001) */
  id: string;
  name: string;
  problem: string;
  solution: string;
  /** Published post-mortems this pattern was learned from */
  sourcePostmortems: string[];
  tags: string[];
  createdAt: Date;
  owner: string;
}
