// Zod schemas for artifact frontmatter and playbook entries

import { z } from 'zod';
import { ARTIFACT_ID_PATTERN, PLAYBOOK_ID_PATTERN } from './validation.js';

export const ArtifactTypeSchema = z.enum(['prd', 'daa', 'tip', 'rfc', 'adr', 'bolt', 'postmortem']);

export const PRDStatusSchema = z.enum(['draft', 'approved', 'superseded']);
export const DAAStatusSchema = z.enum(['draft', 'validated', 'locked', 'superseded']);
export const RFCStatusSchema = z.enum(['draft', 'review', 'approved', 'rejected', 'superseded']);
export const ADRStatusSchema = z.enum(['proposed', 'accepted', 'rejected', 'deprecated', 'superseded']);
export const BoltStatusSchema = z.enum(['todo', 'in-progress', 'done']);
export const PostmortemStatusSchema = z.enum(['draft', 'published']);

export const LinkTypeSchema = z.enum(['derives-from', 'supersedes', 'traces-to', 'relates-to']);

export const SeveritySchema = z.enum(['sev1', 'sev2', 'sev3', 'sev4']);

const ArtifactIdSchema = z.string().regex(ARTIFACT_ID_PATTERN, 'Invalid artifact ID format');

export const ReferenceSchema = z.object({
  targetId: ArtifactIdSchema,
  targetType: ArtifactTypeSchema,
  linkType: LinkTypeSchema
});

/**
 * Frontmatter fields common to every artifact
 */
export const BaseFrontmatterSchema = z.object({
  id: ArtifactIdSchema,
  title: z.string().min(1, 'Title is required').max(200, 'Title too long'),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
  owner: z.string().min(1, 'Owner is required').max(100, 'Owner too long'),
  tags: z.array(z.string().max(50)).max(20, 'Too many tags').default([]),
  references: z.array(ReferenceSchema).default([]),
  supersededBy: ArtifactIdSchema.optional(),
  checksum: z.string().regex(/^[a-f0-9]{64}$/, 'Invalid checksum').optional(),
  sealedAt: z.coerce.date().optional()
});

export const BoundedContextSchema = z.object({
  name: z.string().min(1),
  responsibility: z.string().default(''),
  aggregates: z.array(z.string()).default([])
});

export const SignoffSchema = z.object({
  name: z.string().min(1),
  role: z.string().min(1),
  approved: z.boolean(),
  date: z.coerce.date()
});

export const PRDFrontmatterSchema = BaseFrontmatterSchema.extend({
  type: z.literal('prd'),
  status: PRDStatusSchema
});

export const DAAFrontmatterSchema = BaseFrontmatterSchema.extend({
  type: z.literal('daa'),
  status: DAAStatusSchema,
  boundedContexts: z.array(BoundedContextSchema).default([])
});

export const TIPFrontmatterSchema = BaseFrontmatterSchema.extend({
  type: z.literal('tip'),
  status: DAAStatusSchema
});

export const RFCFrontmatterSchema = BaseFrontmatterSchema.extend({
  type: z.literal('rfc'),
  status: RFCStatusSchema,
  signoffs: z.array(SignoffSchema).default([])
});

export const ADRFrontmatterSchema = BaseFrontmatterSchema.extend({
  type: z.literal('adr'),
  status: ADRStatusSchema
});

export const BoltFrontmatterSchema = BaseFrontmatterSchema.extend({
  type: z.literal('bolt'),
  status: BoltStatusSchema,
  assignee: z.string().min(1).optional(),
  estimate: z.string().min(1).optional(),
  startedAt: z.coerce.date().optional(),
  completedAt: z.coerce.date().optional()
});

export const PostmortemFrontmatterSchema = BaseFrontmatterSchema.extend({
  type: z.literal('postmortem'),
  status: PostmortemStatusSchema,
  incidentDate: z.coerce.date(),
  severity: SeveritySchema,
  deployment: z.string().min(1).optional()
});

/**
 * Frontmatter of any artifact, discriminated by `type`
 */
export const FrontmatterSchema = z.discriminatedUnion('type', [
  PRDFrontmatterSchema,
  DAAFrontmatterSchema,
  TIPFrontmatterSchema,
  RFCFrontmatterSchema,
  ADRFrontmatterSchema,
  BoltFrontmatterSchema,
  PostmortemFrontmatterSchema
]);

export type Frontmatter = z.infer<typeof FrontmatterSchema>;

/**
 * Playbook pattern stored as YAML
 */
export const PlaybookPatternSchema = z.object({
  id: z.string().regex(PLAYBOOK_ID_PATTERN, 'Invalid pattern ID format'),
  name: z.string().min(1, 'Name is required').max(200, 'Name too long'),
  problem: z.string().min(1, 'Problem is required'),
  solution: z.string().min(1, 'Solution is required'),
  sourcePostmortems: z.array(ArtifactIdSchema).default([]),
  tags: z.array(z.string().max(50)).max(20).default([]),
  createdAt: z.coerce.date(),
  owner: z.string().min(1, 'Owner is required')
});

export type ValidatedPlaybookPattern = z.infer<typeof PlaybookPatternSchema>;

/**
 * Formats zod issues as "path: message" strings
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}
