/**
 * Audit Service
 *
 * Append-only history of artifact operations, one JSON object per line
 * in `.air/audit/audit.jsonl`.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import { isErrnoException } from '../../core/errors.js';
import { logger } from '../../core/logger.js';

export const AUDIT_ACTIONS = [
  'create',
  'update',
  'delete',
  'transition',
  'supersede',
  'link',
  'unlink'
] as const;

export type AuditActionType = typeof AUDIT_ACTIONS[number];

/**
 * Actor recorded when no user is known
 */
export const SYSTEM_ACTOR = 'system';

const FieldChangeSchema = z.object({ old: z.unknown(), new: z.unknown() });

/**
 * Old and new value of one changed field
 */
export type FieldChange = z.infer<typeof FieldChangeSchema>;

/**
 * Audit action to be logged
 */
export interface AuditAction {
  artifactId: string;
  action: AuditActionType;
  actor: string;
  /** Defaults to now */
  timestamp?: Date;
  changes?: Record<string, FieldChange>;
}

/**
 * Stored audit entry
 */
export interface AuditEntry {
  id: string;
  artifactId: string;
  action: AuditActionType;
  actor: string;
  timestamp: Date;
  changes?: Record<string, FieldChange>;
}

const AuditEntrySchema = z.object({
  id: z.string().min(1),
  artifactId: z.string().min(1),
  action: z.enum(AUDIT_ACTIONS),
  actor: z.string(),
  timestamp: z.coerce.date(),
  changes: z.record(FieldChangeSchema).optional()
});

/**
 * Audit Service Interface
 */
export interface IAuditService {
  logAction(action: AuditAction): Promise<AuditEntry>;
  getHistory(artifactId: string): Promise<AuditEntry[]>;
  getAllEntries(): Promise<AuditEntry[]>;
}

export class AuditService implements IAuditService {
  private auditDir: string;
  private auditLogPath: string;

  constructor(options: { baseDir?: string } = {}) {
    const baseDir = options.baseDir || '.air';
    this.auditDir = path.join(baseDir, 'audit');
    this.auditLogPath = path.join(this.auditDir, 'audit.jsonl');
  }

  /**
   * Appends an operation to the log
   */
  async logAction(action: AuditAction): Promise<AuditEntry> {
    await fs.mkdir(this.auditDir, { recursive: true });

    const entry: AuditEntry = {
      id: randomUUID(),
      artifactId: action.artifactId,
      action: action.action,
      actor: action.actor,
      timestamp: action.timestamp ?? new Date(),
      changes: action.changes
    };

    await fs.appendFile(this.auditLogPath, JSON.stringify(entry) + '\n', 'utf-8');
    logger.debug(`Audit: ${entry.action} ${entry.artifactId}`, { actor: entry.actor });
    return entry;
  }

  /**
   * Entries for one artifact, oldest first
   */
  async getHistory(artifactId: string): Promise<AuditEntry[]> {
    const allEntries = await this.getAllEntries();
    const wanted = artifactId.toUpperCase();

    return allEntries
      .filter(entry => entry.artifactId === wanted)
      .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
  }

  /**
   * Every entry in file order. Lines that do not parse are skipped with a warning.
   */
  async getAllEntries(): Promise<AuditEntry[]> {
    let content: string;
    try {
      content = await fs.readFile(this.auditLogPath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const entries: AuditEntry[] = [];
    const lines = content.split('\n');
    lines.forEach((line, index) => {
      if (!line.trim()) return;

      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch {
        logger.warn(`Skipping malformed audit line ${index + 1}`);
        return;
      }

      const parsed = AuditEntrySchema.safeParse(raw);
      if (parsed.success) {
        entries.push(parsed.data);
      } else {
        logger.warn(`Skipping invalid audit entry on line ${index + 1}`);
      }
    });

    return entries;
  }
}
