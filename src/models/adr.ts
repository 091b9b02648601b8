// ADR (Architecture Decision Record) model

import { Artifact } from './artifact.js';

/**
 * Finalized architectural decision. Immutable once accepted;
 * amended only by superseding it with a newer ADR.
 */
export interface ADR extends Artifact<'adr'> {
  context: string;
  decision: string;
  consequences: string[];
  alternativesConsidered: string[];
}
