// PRD (Product Requirements Document) model

import { Artifact } from './artifact.js';

/**
 * Business requirements produced by product stakeholders.
 * Immutable once approved.
 */
export interface PRD extends Artifact<'prd'> {
  problem: string;
  goals: string[];
  userStories: string[];
  acceptanceCriteria: string[];
  nonGoals: string[];
}
