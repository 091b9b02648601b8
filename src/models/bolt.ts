// Bolt model

import { Artifact } from './artifact.js';

/**
 * Small, discrete unit of implementation work derived from an ADR
 */
export interface Bolt extends Artifact<'bolt'> {
  description: string;
  acceptanceCriteria: string[];
  assignee?: string;
  /** Free-form estimate (e.g., "2d", "4h") */
  estimate?: string;
  /** Set when the bolt first moves to in-progress */
  startedAt?: Date;
  /** Set when the bolt moves to done */
  completedAt?: Date;
}
