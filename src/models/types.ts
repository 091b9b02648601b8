// Core type definitions for the AirSDLC artifact tracker

// Artifact Types
export type ArtifactType = 'prd' | 'daa' | 'tip' | 'rfc' | 'adr' | 'bolt' | 'postmortem';

export const ARTIFACT_TYPES: readonly ArtifactType[] = ['prd', 'daa', 'tip', 'rfc', 'adr', 'bolt', 'postmortem'];

// Status Types
export type PRDStatus = 'draft' | 'approved' | 'superseded';
export type DAAStatus = 'draft' | 'validated' | 'locked' | 'superseded';
export type TIPStatus = DAAStatus;
export type RFCStatus = 'draft' | 'review' | 'approved' | 'rejected' | 'superseded';
export type ADRStatus = 'proposed' | 'accepted' | 'rejected' | 'deprecated' | 'superseded';
export type BoltStatus = 'todo' | 'in-progress' | 'done';
export type PostmortemStatus = 'draft' | 'published';

/**
 * Maps each artifact type to its status union
 */
export interface ArtifactStatusMap {
  prd: PRDStatus;
  daa: DAAStatus;
  tip: TIPStatus;
  rfc: RFCStatus;
  adr: ADRStatus;
  bolt: BoltStatus;
  postmortem: PostmortemStatus;
}

export type StatusOf<T extends ArtifactType> = ArtifactStatusMap[T];

// Union type for all artifact statuses
export type ArtifactStatus = StatusOf<ArtifactType>;

/**
 * Every status a given artifact type can hold, in lifecycle order
 */
export const STATUSES: { readonly [T in ArtifactType]: readonly StatusOf<T>[] } = {
  prd: ['draft', 'approved', 'superseded'],
  daa: ['draft', 'validated', 'locked', 'superseded'],
  tip: ['draft', 'validated', 'locked', 'superseded'],
  rfc: ['draft', 'review', 'approved', 'rejected', 'superseded'],
  adr: ['proposed', 'accepted', 'rejected', 'deprecated', 'superseded'],
  bolt: ['todo', 'in-progress', 'done'],
  postmortem: ['draft', 'published']
};

/**
 * Statuses that retire an artifact: nothing new may derive from it
 */
export const RETIRED_STATUSES: readonly ArtifactStatus[] = ['superseded', 'rejected', 'deprecated'];

// Link Types
export type LinkType = 'derives-from' | 'supersedes' | 'traces-to' | 'relates-to';

export const LINK_TYPES: readonly LinkType[] = ['derives-from', 'supersedes', 'traces-to', 'relates-to'];

/**
 * Incident severity for post-mortems
 */
export type Severity = 'sev1' | 'sev2' | 'sev3' | 'sev4';

export const SEVERITIES: readonly Severity[] = ['sev1', 'sev2', 'sev3', 'sev4'];

/**
 * Type guard: is `status` a legal status for artifacts of `type`
 */
export function isStatusOf<T extends ArtifactType>(type: T, status: string): status is StatusOf<T> {
  const allowed: readonly string[] = STATUSES[type];
  return allowed.includes(status);
}

export function isArtifactType(value: string): value is ArtifactType {
  const types: readonly string[] = ARTIFACT_TYPES;
  return types.includes(value);
}

export function isLinkType(value: string): value is LinkType {
  const types: readonly string[] = LINK_TYPES;
  return types.includes(value);
}
