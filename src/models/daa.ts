// DAA (Domain Architecture Analysis) model

import { Artifact } from './artifact.js';

/**
 * A bounded context identified by the domain analysis
 */
export interface BoundedContext {
  name: string;
  responsibility: string;
  /** Aggregate roots owned by the context */
  aggregates: string[];
}

/**
 * Technology-agnostic domain model. Drafted by AI, validated by humans,
 * locked once validated.
 */
export interface DAA extends Artifact<'daa'> {
  domainOverview: string;
  boundedContexts: BoundedContext[];
  invariants: string[];
  operations: string[];
  openQuestions: string[];
}
