// Post-mortem model

import { Artifact } from './artifact.js';
import { Severity } from './types.js';

/**
 * Incident retrospective. Traces back to the ADRs, Bolts or PRDs involved
 * and feeds patterns into the playbook.
 */
export interface Postmortem extends Artifact<'postmortem'> {
  incidentDate: Date;
  severity: Severity;
  /** Label of the deployment during which the incident occurred */
  deployment?: string;
  summary: string;
  timeline: string[];
  rootCause: string;
  actionItems: string[];
  lessonsLearned: string[];
}
