// Input validation and sanitization utilities

import { ValidationError, SecurityError } from './errors.js';
import {
  ArtifactType,
  ArtifactStatus,
  LinkType,
  STATUSES,
  LINK_TYPES,
  isArtifactType,
  isStatusOf,
  isLinkType
} from '../models/types.js';

/**
 * ID prefix for each artifact type
 */
export const TYPE_PREFIXES: Record<ArtifactType, string> = {
  prd: 'PRD',
  daa: 'DAA',
  tip: 'TIP',
  rfc: 'RFC',
  adr: 'ADR',
  bolt: 'BOLT',
  postmortem: 'PM'
};

export const PLAYBOOK_PREFIX = 'PLAY';

/**
 * Any artifact ID: PREFIX-NNNN (at least four digits)
 */
export const ARTIFACT_ID_PATTERN = /^(PRD|DAA|TIP|RFC|ADR|BOLT|PM)-\d{4,}$/;

export const PLAYBOOK_ID_PATTERN = /^PLAY-\d{4,}$/;

/**
 * Characters not allowed in filenames (Windows + Unix)
 */
// eslint-disable-next-line no-control-regex
const ILLEGAL_FILENAME_CHARS = /[<>:"/\\|?*\x00-\x1f]/g;

const PATH_TRAVERSAL_PATTERNS = [
  /\.\./,           // Parent directory
  /^[/\\]/,         // Absolute path
  /^[a-zA-Z]:/,     // Windows drive letter
  /\0/,             // Null byte
];

/**
 * Maximum lengths for various fields
 */
export const MAX_LENGTHS = {
  id: 20,
  title: 200,
  owner: 100,
  tag: 50,
  tags: 20,        // Max number of tags
  section: 100000
};

function assertNoTraversal(value: string, label: string): void {
  for (const pattern of PATH_TRAVERSAL_PATTERNS) {
    if (pattern.test(value)) {
      throw new SecurityError(`Invalid ${label}: potential path traversal detected`, { value });
    }
  }
}

/**
 * Extracts the artifact type from an ID prefix
 */
export function typeFromId(id: string): ArtifactType | null {
  const prefix = id.split('-')[0]?.toUpperCase();
  for (const [type, typePrefix] of Object.entries(TYPE_PREFIXES)) {
    if (typePrefix === prefix && isArtifactType(type)) {
      return type;
    }
  }
  return null;
}

/**
 * Validates and normalizes an artifact ID
 */
export function validateId(id: string, type?: ArtifactType): string {
  if (!id || typeof id !== 'string') {
    throw new ValidationError('ID is required', 'id');
  }

  const trimmed = id.trim().toUpperCase();

  if (trimmed.length > MAX_LENGTHS.id) {
    throw new ValidationError(`ID exceeds maximum length of ${MAX_LENGTHS.id}`, 'id');
  }

  assertNoTraversal(trimmed, 'ID');

  if (!ARTIFACT_ID_PATTERN.test(trimmed)) {
    const expected = Object.values(TYPE_PREFIXES).map(p => `${p}-NNNN`).join(', ');
    throw new ValidationError(`Invalid ID format "${id}". Expected one of: ${expected}`, 'id');
  }

  if (type && typeFromId(trimmed) !== type) {
    throw new ValidationError(
      `Invalid ${type.toUpperCase()} ID "${id}". Expected: ${TYPE_PREFIXES[type]}-NNNN`,
      'id'
    );
  }

  return trimmed;
}

/**
 * Validates and normalizes a playbook pattern ID
 */
export function validatePlaybookId(id: string): string {
  if (!id || typeof id !== 'string') {
    throw new ValidationError('Pattern ID is required', 'id');
  }
  const trimmed = id.trim().toUpperCase();
  assertNoTraversal(trimmed, 'pattern ID');
  if (!PLAYBOOK_ID_PATTERN.test(trimmed)) {
    throw new ValidationError(`Invalid pattern ID "${id}". Expected: ${PLAYBOOK_PREFIX}-NNNN`, 'id');
  }
  return trimmed;
}

/**
 * Validates and trims a title
 */
export function validateTitle(title: string): string {
  if (!title || typeof title !== 'string') {
    throw new ValidationError('Title is required', 'title');
  }

  const trimmed = title.trim();

  if (trimmed.length === 0) {
    throw new ValidationError('Title cannot be empty', 'title');
  }

  if (trimmed.length > MAX_LENGTHS.title) {
    throw new ValidationError(`Title exceeds maximum length of ${MAX_LENGTHS.title}`, 'title');
  }

  return trimmed;
}

/**
 * Validates and sanitizes an owner name
 */
export function validateOwner(owner: string): string {
  if (!owner || typeof owner !== 'string') {
    throw new ValidationError('Owner is required', 'owner');
  }

  const trimmed = owner.trim();

  if (trimmed.length === 0) {
    throw new ValidationError('Owner cannot be empty', 'owner');
  }

  if (trimmed.length > MAX_LENGTHS.owner) {
    throw new ValidationError(`Owner exceeds maximum length of ${MAX_LENGTHS.owner}`, 'owner');
  }

  return trimmed.replace(ILLEGAL_FILENAME_CHARS, '_');
}

/**
 * Validates and normalizes tags (lower-case, alphanumerics and hyphens, deduplicated)
 */
export function validateTags(tags: string[]): string[] {
  if (!Array.isArray(tags)) {
    throw new ValidationError('Tags must be an array', 'tags');
  }

  if (tags.length > MAX_LENGTHS.tags) {
    throw new ValidationError(`Maximum ${MAX_LENGTHS.tags} tags allowed`, 'tags');
  }

  const normalized = tags.map((tag, index) => {
    if (typeof tag !== 'string') {
      throw new ValidationError(`Tag at index ${index} must be a string`, 'tags');
    }

    const trimmed = tag.trim().toLowerCase();

    if (trimmed.length === 0) {
      throw new ValidationError(`Tag at index ${index} cannot be empty`, 'tags');
    }

    if (trimmed.length > MAX_LENGTHS.tag) {
      throw new ValidationError(`Tag "${trimmed}" exceeds maximum length of ${MAX_LENGTHS.tag}`, 'tags');
    }

    return trimmed.replace(/[^a-z0-9-]/g, '-').replace(/-+/g, '-');
  });

  return [...new Set(normalized)];
}

/**
 * Validates an artifact type name
 */
export function validateArtifactType(type: string): ArtifactType {
  const normalized = type?.trim().toLowerCase() ?? '';

  if (!isArtifactType(normalized)) {
    throw new ValidationError(
      `Invalid artifact type "${type}". Must be one of: ${Object.keys(TYPE_PREFIXES).join(', ')}`,
      'type'
    );
  }

  return normalized;
}

/**
 * Validates a status for a given artifact type
 */
export function validateStatus(status: string, artifactType: ArtifactType): ArtifactStatus {
  const normalized = status?.trim().toLowerCase() ?? '';

  if (!isStatusOf(artifactType, normalized)) {
    throw new ValidationError(
      `Invalid status "${status}" for ${artifactType}. Allowed: ${STATUSES[artifactType].join(', ')}`,
      'status'
    );
  }

  return normalized;
}

/**
 * Validates a link type name
 */
export function validateLinkType(type: string): LinkType {
  const normalized = type?.trim().toLowerCase() ?? '';

  if (!isLinkType(normalized)) {
    throw new ValidationError(
      `Invalid link type "${type}". Must be one of: ${LINK_TYPES.join(', ')}`,
      'linkType'
    );
  }

  return normalized;
}
