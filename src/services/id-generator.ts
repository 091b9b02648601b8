// ID Generator Service for the AirSDLC artifact tracker

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ArtifactType, ARTIFACT_TYPES } from '../models/types.js';
import { TYPE_PREFIXES, PLAYBOOK_PREFIX } from '../core/validation.js';
import { StorageError } from '../core/errors.js';
import { logger } from '../core/logger.js';

/**
 * Anything that receives a sequential ID
 */
export type IdKind = ArtifactType | 'playbook';

export const ID_KINDS: readonly IdKind[] = [...ARTIFACT_TYPES, 'playbook'];

type IdCounters = Record<IdKind, number>;

const CountersFileSchema = z.object({
  idCounters: z.record(z.number().int().nonnegative())
});

function defaultCounters(): IdCounters {
  return {
    prd: 0,
    daa: 0,
    tip: 0,
    rfc: 0,
    adr: 0,
    bolt: 0,
    postmortem: 0,
    playbook: 0
  };
}

function prefixFor(kind: IdKind): string {
  return kind === 'playbook' ? PLAYBOOK_PREFIX : TYPE_PREFIXES[kind];
}

/**
 * Tracks and generates unique sequential IDs for each artifact type.
 * Counters persist to `.air/counters.json`.
 */
export class IdGenerator {
  private counters: IdCounters;
  private countersPath: string;
  private airDir: string;

  /**
   * @param basePath - Directory containing `.air` (defaults to cwd)
   */
  constructor(basePath: string = process.cwd()) {
    this.airDir = path.join(basePath, '.air');
    this.countersPath = path.join(this.airDir, 'counters.json');
    this.counters = defaultCounters();
    this.loadCounters();
  }

  private loadCounters(): void {
    if (!fs.existsSync(this.countersPath)) {
      return;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.countersPath, 'utf-8'));
    } catch (error) {
      logger.warn(`Ignoring unreadable ID counters at ${this.countersPath}: ${String(error)}`);
      return;
    }

    const parsed = CountersFileSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn(`Ignoring malformed ID counters at ${this.countersPath}`);
      return;
    }

    for (const kind of ID_KINDS) {
      this.counters[kind] = parsed.data.idCounters[kind] ?? 0;
    }
  }

  private saveCounters(): void {
    try {
      if (!fs.existsSync(this.airDir)) {
        fs.mkdirSync(this.airDir, { recursive: true });
      }
      fs.writeFileSync(
        this.countersPath,
        JSON.stringify({ idCounters: this.counters }, null, 2),
        'utf-8'
      );
    } catch (error) {
      throw new StorageError(`Failed to save ID counters: ${String(error)}`, { path: this.countersPath });
    }
  }

  /**
   * Generates the next unique ID, e.g. PRD-0001 or PLAY-0003
   */
  generateId(kind: IdKind): string {
    this.counters[kind]++;
    this.saveCounters();
    return IdGenerator.formatId(kind, this.counters[kind]);
  }

  static formatId(kind: IdKind, value: number): string {
    return `${prefixFor(kind)}-${value.toString().padStart(4, '0')}`;
  }

  static validateIdFormat(id: string, kind: IdKind): boolean {
    const pattern = new RegExp(`^${prefixFor(kind)}-\\d{4,}$`);
    return pattern.test(id);
  }
}
