// Base artifact interface

import { ArtifactType, StatusOf } from './types.js';
import { Reference } from './reference.js';

/**
 * Fields shared by every AirSDLC artifact
 */
export interface Artifact<T extends ArtifactType = ArtifactType> {
  /** Unique identifier (e.g., PRD-0001, ADR-0003) */
  id: string;
  type: T;
  title: string;
  status: StatusOf<T>;
  createdAt: Date;
  updatedAt: Date;
  /** Owner/author of the artifact */
  owner: string;
  tags: string[];
  /** Outgoing links to other artifacts */
  references: Reference[];
  /** ID of the artifact that supersedes this one */
  supersededBy?: string;
  /** SHA-256 of the content, recorded when the artifact enters a sealed status */
  checksum?: string;
  sealedAt?: Date;
}
