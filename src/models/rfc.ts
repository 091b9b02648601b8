// RFC (Request for Comments) model

import { Artifact } from './artifact.js';

/**
 * Sign-off from a reviewer
 */
export interface Signoff {
  name: string;
  role: string;
  approved: boolean;
  date: Date;
}

/**
 * Design discussion document. Mutable while in draft or review.
 */
export interface RFC extends Artifact<'rfc'> {
  problemStatement: string;
  proposedDesign: string;
  alternatives: string[];
  openQuestions: string[];
  signoffs: Signoff[];
}
