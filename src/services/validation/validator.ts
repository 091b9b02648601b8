// Structural validation of AirSDLC artifacts

import type { AnyArtifact } from '../../models/any-artifact.js';
import type { DAA } from '../../models/daa.js';
import type { RFC } from '../../models/rfc.js';
import type { Bolt } from '../../models/bolt.js';
import { ValidationIssue, ValidationResult } from '../../models/validation.js';
import { isStatusOf, STATUSES } from '../../models/types.js';
import { MAX_LENGTHS, TYPE_PREFIXES, typeFromId } from '../../core/validation.js';
import { IdGenerator } from '../id-generator.js';
import { getSectionValues } from '../serialization/sections.js';
import {
  PARENT_TYPES,
  TRACE_TARGET_TYPES,
  isSealedStatus
} from '../lifecycle/state-machine.js';

/**
 * Checks if a string value is non-empty (not undefined or whitespace-only)
 */
function isNonEmpty(value: string | undefined): boolean {
  return value !== undefined && value.trim().length > 0;
}

function isValidDate(value: Date | undefined): boolean {
  return value instanceof Date && !isNaN(value.getTime());
}

/**
 * Validates fields every artifact carries
 */
function validateCommonFields(artifact: AnyArtifact): ValidationIssue[] {
  const errors: ValidationIssue[] = [];

  if (!IdGenerator.validateIdFormat(artifact.id, artifact.type)) {
    errors.push({
      field: 'id',
      message: `Invalid ID format: ${artifact.id}. Expected format: ${TYPE_PREFIXES[artifact.type]}-NNNN`
    });
  }

  if (!isNonEmpty(artifact.title)) {
    errors.push({ field: 'title', message: 'Title is required and cannot be empty' });
  } else if (artifact.title.length > MAX_LENGTHS.title) {
    errors.push({ field: 'title', message: `Title exceeds maximum length of ${MAX_LENGTHS.title}` });
  }

  if (!isNonEmpty(artifact.owner)) {
    errors.push({ field: 'owner', message: 'Owner is required and cannot be empty' });
  }

  if (!isStatusOf(artifact.type, artifact.status)) {
    errors.push({
      field: 'status',
      message: `Invalid ${artifact.type} status: ${artifact.status}. Valid values are: ${STATUSES[artifact.type].join(', ')}`
    });
  }

  const createdValid = isValidDate(artifact.createdAt);
  const updatedValid = isValidDate(artifact.updatedAt);
  if (!createdValid) {
    errors.push({ field: 'createdAt', message: 'Valid creation date is required' });
  }
  if (!updatedValid) {
    errors.push({ field: 'updatedAt', message: 'Valid update date is required' });
  }
  if (createdValid && updatedValid && artifact.updatedAt < artifact.createdAt) {
    errors.push({ field: 'updatedAt', message: 'Update date is earlier than creation date' });
  }

  if (artifact.tags.length > MAX_LENGTHS.tags) {
    errors.push({ field: 'tags', message: `Maximum ${MAX_LENGTHS.tags} tags allowed` });
  }

  return errors;
}

/**
 * Supersession and seal bookkeeping
 */
function validateLifecycleFields(artifact: AnyArtifact): ValidationIssue[] {
  const errors: ValidationIssue[] = [];

  if (artifact.status === 'superseded' && !isNonEmpty(artifact.supersededBy)) {
    errors.push({ field: 'supersededBy', message: 'Reference to the superseding artifact is required when status is superseded' });
  }
  if (artifact.status !== 'superseded' && artifact.supersededBy !== undefined) {
    errors.push({ field: 'supersededBy', message: `supersededBy is only allowed when status is superseded (is ${artifact.status})` });
  }
  if (artifact.supersededBy !== undefined && typeFromId(artifact.supersededBy) !== artifact.type) {
    errors.push({ field: 'supersededBy', message: `${artifact.supersededBy} is not a ${artifact.type}` });
  }

  if (isSealedStatus(artifact.type, artifact.status) && !artifact.checksum) {
    errors.push({ field: 'checksum', message: `A ${artifact.status} ${artifact.type} must carry a checksum` });
  }
  if (artifact.checksum !== undefined && !isValidDate(artifact.sealedAt)) {
    errors.push({ field: 'sealedAt', message: 'Sealed artifacts need a valid seal date' });
  }

  return errors;
}

/**
 * Outgoing links: shape, duplicates and the link-type rules
 */
function validateReferences(artifact: AnyArtifact): ValidationIssue[] {
  const errors: ValidationIssue[] = [];
  const seen = new Set<string>();
  let parents = 0;

  for (const [index, ref] of artifact.references.entries()) {
    const field = `references[${index}]`;

    if (ref.targetId === artifact.id) {
      errors.push({ field, message: 'An artifact cannot link to itself' });
    }
    if (seen.has(ref.targetId)) {
      errors.push({ field, message: `Duplicate link to ${ref.targetId}` });
    }
    seen.add(ref.targetId);

    const actualType = typeFromId(ref.targetId);
    if (actualType !== ref.targetType) {
      errors.push({ field, message: `${ref.targetId} is not a ${ref.targetType}` });
    }

    switch (ref.linkType) {
      case 'derives-from':
        parents++;
        if (!PARENT_TYPES[artifact.type].includes(ref.targetType)) {
          errors.push({ field, message: `A ${artifact.type} cannot derive from a ${ref.targetType}` });
        }
        break;
      case 'supersedes':
        if (ref.targetType !== artifact.type) {
          errors.push({ field, message: `A ${artifact.type} can only supersede another ${artifact.type}` });
        }
        break;
      case 'traces-to':
        if (artifact.type !== 'postmortem') {
          errors.push({ field, message: 'Only post-mortems can trace to other artifacts' });
        } else if (!TRACE_TARGET_TYPES.includes(ref.targetType)) {
          errors.push({ field, message: `A post-mortem cannot trace to a ${ref.targetType}` });
        }
        break;
      case 'relates-to':
        break;
    }
  }

  if (parents > 1) {
    errors.push({ field: 'references', message: `Expected at most one parent, found ${parents}` });
  }

  return errors;
}

function validateSections(artifact: AnyArtifact): ValidationIssue[] {
  const errors: ValidationIssue[] = [];
  for (const [field, value] of Object.entries(getSectionValues(artifact))) {
    const length = typeof value === 'string' ? value.length : value.join('\n').length;
    if (length > MAX_LENGTHS.section) {
      errors.push({ field, message: `Section exceeds maximum length of ${MAX_LENGTHS.section}` });
    }
  }
  return errors;
}

function validateDAA(daa: DAA): ValidationIssue[] {
  const errors: ValidationIssue[] = [];
  const names = new Set<string>();
  daa.boundedContexts.forEach((context, index) => {
    if (!isNonEmpty(context.name)) {
      errors.push({ field: `boundedContexts[${index}].name`, message: `Bounded context ${index + 1} name is required` });
      return;
    }
    const key = context.name.trim().toLowerCase();
    if (names.has(key)) {
      errors.push({ field: `boundedContexts[${index}].name`, message: `Duplicate bounded context "${context.name}"` });
    }
    names.add(key);
  });
  return errors;
}

function validateRFC(rfc: RFC): ValidationIssue[] {
  const errors: ValidationIssue[] = [];
  rfc.signoffs.forEach((signoff, index) => {
    if (!isNonEmpty(signoff.name)) {
      errors.push({ field: `signoffs[${index}].name`, message: `Sign-off ${index + 1} needs a reviewer name` });
    }
    if (!isNonEmpty(signoff.role)) {
      errors.push({ field: `signoffs[${index}].role`, message: `Sign-off ${index + 1} needs a reviewer role` });
    }
    if (!isValidDate(signoff.date)) {
      errors.push({ field: `signoffs[${index}].date`, message: `Sign-off ${index + 1} needs a valid date` });
    }
  });
  return errors;
}

function validateBolt(bolt: Bolt): ValidationIssue[] {
  const errors: ValidationIssue[] = [];
  if (bolt.completedAt !== undefined && bolt.status !== 'done') {
    errors.push({ field: 'completedAt', message: 'Only done bolts have a completion date' });
  }
  if (bolt.status === 'done' && !isValidDate(bolt.completedAt)) {
    errors.push({ field: 'completedAt', message: 'Done bolts need a completion date' });
  }
  if (bolt.startedAt && bolt.completedAt && bolt.completedAt < bolt.startedAt) {
    errors.push({ field: 'completedAt', message: 'Completion date is earlier than start date' });
  }
  return errors;
}

/**
 * ArtifactValidator checks that a single artifact is internally consistent.
 * Cross-artifact checks (missing targets, cycles) belong to VerifyService.
 */
export class ArtifactValidator {
  validate(artifact: AnyArtifact): ValidationResult {
    const errors: ValidationIssue[] = [
      ...validateCommonFields(artifact),
      ...validateLifecycleFields(artifact),
      ...validateReferences(artifact),
      ...validateSections(artifact)
    ];

    switch (artifact.type) {
      case 'daa':
        errors.push(...validateDAA(artifact));
        break;
      case 'rfc':
        errors.push(...validateRFC(artifact));
        break;
      case 'bolt':
        errors.push(...validateBolt(artifact));
        break;
      case 'postmortem':
        if (!isValidDate(artifact.incidentDate)) {
          errors.push({ field: 'incidentDate', message: 'Valid incident date is required' });
        }
        break;
      default:
        break;
    }

    return {
      valid: errors.length === 0,
      errors
    };
  }
}
