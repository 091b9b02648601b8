// Reference model for links between artifacts

import { ArtifactType, LinkType } from './types.js';

/**
 * An outgoing link stored on the source artifact
 */
export interface Reference {
  /** ID of the target artifact */
  targetId: string;
  /** Type of the target artifact */
  targetType: ArtifactType;
  /** Kind of relationship */
  linkType: LinkType;
}
