// TIP (Technical Implementation Proposal) model

import { Artifact } from './artifact.js';

/**
 * Lightweight, technology-specific alternative to a DAA for simple features
 */
export interface TIP extends Artifact<'tip'> {
  summary: string;
  technicalApproach: string;
  technologies: string[];
  risks: string[];
}
