/**
 * Playbook Service
 *
 * Reusable patterns learned from published post-mortems. Patterns are
 * kept apart from the artifact lineage, one YAML file each under
 * `.air/playbook/PLAY-NNNN.yaml`.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'yaml';
import type { PlaybookPattern } from '../../models/playbook.js';
import { FileStore, PLAYBOOK_DIRECTORY, UnreadableFile } from '../storage/file-store.js';
import { IdGenerator } from '../id-generator.js';
import { AuditService, SYSTEM_ACTOR } from '../audit/audit-service.js';
import { PlaybookPatternSchema, formatIssues } from '../../core/schemas.js';
import {
  MAX_LENGTHS,
  validateId,
  validatePlaybookId,
  validateOwner,
  validateTags,
  validateTitle
} from '../../core/validation.js';
import {
  NotFoundError,
  ValidationError,
  SerializationError,
  StorageError,
  isErrnoException,
  errorMessage
} from '../../core/errors.js';
import { logger } from '../../core/logger.js';

export interface NewPattern {
  name: string;
  problem: string;
  solution: string;
  /** IDs of published post-mortems */
  sourcePostmortems: string[];
  tags?: string[];
  owner: string;
}

export interface PlaybookScan {
  patterns: PlaybookPattern[];
  failures: UnreadableFile[];
}

export interface PlaybookDependencies {
  fileStore: FileStore;
  idGenerator: IdGenerator;
  auditService: AuditService;
}

function requireText(value: string, field: string, label: string): string {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new ValidationError(`${label} is required`, field);
  }
  if (trimmed.length > MAX_LENGTHS.section) {
    throw new ValidationError(`${label} exceeds maximum length of ${MAX_LENGTHS.section}`, field);
  }
  return trimmed;
}

/**
 * Parses one pattern file
 *
 * @throws SerializationError if the YAML or its shape is invalid
 */
export function parsePattern(content: string): PlaybookPattern {
  let raw: unknown;
  try {
    raw = yaml.parse(content);
  } catch (error) {
    throw new SerializationError(`Invalid YAML: ${errorMessage(error)}`);
  }

  const result = PlaybookPatternSchema.safeParse(raw);
  if (!result.success) {
    throw new SerializationError(`Invalid pattern: ${formatIssues(result.error).join('; ')}`);
  }
  return result.data;
}

export function stringifyPattern(pattern: PlaybookPattern): string {
  return yaml.stringify({ ...pattern, createdAt: pattern.createdAt.toISOString() });
}

export class PlaybookService {
  private readonly fileStore: FileStore;
  private readonly idGenerator: IdGenerator;
  private readonly auditService: AuditService;
  private readonly playbookDir: string;

  constructor(deps: PlaybookDependencies) {
    this.fileStore = deps.fileStore;
    this.idGenerator = deps.idGenerator;
    this.auditService = deps.auditService;
    this.playbookDir = path.join(deps.fileStore.getBaseDir(), PLAYBOOK_DIRECTORY);
  }

  private patternPath(id: string): string {
    return path.join(this.playbookDir, `${id}.yaml`);
  }

  /**
   * Records a new pattern
   *
   * @throws ValidationError if a source is missing, not a post-mortem or not published
   */
  async addPattern(input: NewPattern, actor: string = SYSTEM_ACTOR): Promise<PlaybookPattern> {
    const name = validateTitle(input.name);
    const problem = requireText(input.problem, 'problem', 'Problem');
    const solution = requireText(input.solution, 'solution', 'Solution');
    const owner = validateOwner(input.owner);
    const tags = validateTags(input.tags ?? []);
    const sourcePostmortems = await this.resolveSources(input.sourcePostmortems);

    await fs.mkdir(this.playbookDir, { recursive: true });

    let id = this.idGenerator.generateId('playbook');
    while (await this.patternExists(id)) {
      logger.warn(`${id} already exists on disk, skipping`);
      id = this.idGenerator.generateId('playbook');
    }

    const pattern: PlaybookPattern = {
      id,
      name,
      problem,
      solution,
      sourcePostmortems,
      tags,
      createdAt: new Date(),
      owner
    };

    try {
      await fs.writeFile(this.patternPath(id), stringifyPattern(pattern), { encoding: 'utf-8', flag: 'wx' });
    } catch (error) {
      throw new StorageError(`Failed to write ${this.patternPath(id)}: ${errorMessage(error)}`, { id });
    }

    await this.auditService.logAction({ artifactId: id, action: 'create', actor, timestamp: pattern.createdAt });
    logger.info(`Added ${id}: ${name}`);
    return pattern;
  }

  private async resolveSources(sourceIds: readonly string[]): Promise<string[]> {
    const ids = [...new Set(sourceIds.map(sourceId => validateId(sourceId)))];
    if (ids.length === 0) {
      throw new ValidationError('A pattern needs at least one source post-mortem', 'sourcePostmortems');
    }

    for (const id of ids) {
      const source = await this.fileStore.load(id);
      if (!source) {
        throw new NotFoundError('Artifact', id);
      }
      if (source.type !== 'postmortem') {
        throw new ValidationError(`${id} is not a post-mortem`, 'sourcePostmortems');
      }
      if (source.status !== 'published') {
        throw new ValidationError(
          `${id} must be published before it can feed the playbook (is ${source.status})`,
          'sourcePostmortems'
        );
      }
    }
    return ids;
  }

  private async patternExists(id: string): Promise<boolean> {
    try {
      await fs.access(this.patternPath(id));
      return true;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return false;
      }
      throw new StorageError(`Failed to check ${this.patternPath(id)}: ${errorMessage(error)}`);
    }
  }

  /**
   * @throws NotFoundError if no such pattern exists
   */
  async getPattern(id: string): Promise<PlaybookPattern> {
    const normalized = validatePlaybookId(id);

    let content: string;
    try {
      content = await fs.readFile(this.patternPath(normalized), 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new NotFoundError('Pattern', normalized);
      }
      throw new StorageError(`Failed to read ${this.patternPath(normalized)}: ${errorMessage(error)}`);
    }

    return parsePattern(content);
  }

  /**
   * Reads every pattern file, collecting the ones that fail to parse
   */
  async scan(): Promise<PlaybookScan> {
    let files: string[];
    try {
      files = await fs.readdir(this.playbookDir);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return { patterns: [], failures: [] };
      }
      throw new StorageError(`Failed to read ${this.playbookDir}: ${errorMessage(error)}`);
    }

    const patterns: PlaybookPattern[] = [];
    const failures: UnreadableFile[] = [];
    for (const file of files.sort()) {
      if (!file.endsWith('.yaml')) continue;

      const filePath = path.join(this.playbookDir, file);
      try {
        const pattern = parsePattern(await fs.readFile(filePath, 'utf-8'));
        if (`${pattern.id}.yaml` !== file) {
          failures.push({ path: filePath, error: `File name does not match ${pattern.id}` });
          continue;
        }
        patterns.push(pattern);
      } catch (error) {
        failures.push({ path: filePath, error: errorMessage(error) });
      }
    }

    return { patterns, failures };
  }

  /**
   * Patterns by ID, optionally only those carrying `tag`.
   * Unreadable files are skipped with a warning.
   */
  async listPatterns(tag?: string): Promise<PlaybookPattern[]> {
    const { patterns, failures } = await this.scan();
    for (const failure of failures) {
      logger.warn(`Skipping ${failure.path}: ${failure.error}`);
    }

    const wanted = tag?.trim().toLowerCase();
    return wanted ? patterns.filter(p => p.tags.includes(wanted)) : patterns;
  }

  /**
   * Patterns learned from a given post-mortem
   */
  async findByPostmortem(postmortemId: string): Promise<PlaybookPattern[]> {
    const id = validateId(postmortemId, 'postmortem');
    const patterns = await this.listPatterns();
    return patterns.filter(p => p.sourcePostmortems.includes(id));
  }
}
