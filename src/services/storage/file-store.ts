// File store service for artifact persistence

import * as fs from 'fs/promises';
import * as path from 'path';
import type { AnyArtifact } from '../../models/any-artifact.js';
import { ArtifactType, ARTIFACT_TYPES } from '../../models/types.js';
import { serialize } from '../serialization/serializer.js';
import { deserialize } from '../serialization/deserializer.js';
import { ListCache } from './cache.js';
import { validateId, typeFromId } from '../../core/validation.js';
import {
  SerializationError,
  StorageError,
  ValidationError,
  isErrnoException,
  errorMessage
} from '../../core/errors.js';
import { logger } from '../../core/logger.js';

/**
 * Configuration for the file store
 */
export interface FileStoreConfig {
  /** Store directory (default: .air) */
  baseDir: string;
  /** How long list results are reused, in ms; 0 disables the cache */
  listCacheTtlMs?: number;
}

/**
 * Filters for listing artifacts
 */
export interface ArtifactFilters {
  type?: ArtifactType;
  status?: string;
  owner?: string;
  /** Filter by creation date (from) */
  dateFrom?: Date;
  /** Filter by creation date (to) */
  dateTo?: Date;
  /** Artifact must have all of these tags */
  tags?: string[];
}

/**
 * A file under the store that could not be read as an artifact
 */
export interface UnreadableFile {
  path: string;
  error: string;
}

/**
 * Everything found by a full directory scan
 */
export interface ScanResult {
  artifacts: AnyArtifact[];
  failures: UnreadableFile[];
}

const DEFAULT_CONFIG: FileStoreConfig = {
  baseDir: '.air'
};

/**
 * Subdirectory names for each artifact type
 */
export const TYPE_DIRECTORIES: Record<ArtifactType, string> = {
  prd: 'prd',
  daa: 'daa',
  tip: 'tip',
  rfc: 'rfc',
  adr: 'adr',
  bolt: 'bolt',
  postmortem: 'postmortem'
};

export const PLAYBOOK_DIRECTORY = 'playbook';
export const AUDIT_DIRECTORY = 'audit';

const CONFIG_STUB = `# AirSDLC tracker configuration
#
# defaults:
#   owner: your-name
#   tags:
#     adr: [architecture]
# gates:
#   requiredApprovals: 1
# git:
#   tagOnSeal: false
#   tagPrefix: air
# logging:
#   level: info
`;

/**
 * Persists artifacts as Markdown files under `<baseDir>/<type>/<ID>.md`
 */
export class FileStore {
  private config: FileStoreConfig;
  private cache: ListCache;

  constructor(config: Partial<FileStoreConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.cache = new ListCache(config.listCacheTtlMs);
  }

  /**
   * Creates the store directory layout and a commented config file
   */
  async initialize(): Promise<void> {
    await fs.mkdir(this.config.baseDir, { recursive: true });

    const subdirs = [...Object.values(TYPE_DIRECTORIES), PLAYBOOK_DIRECTORY, AUDIT_DIRECTORY];
    for (const subdir of subdirs) {
      await fs.mkdir(path.join(this.config.baseDir, subdir), { recursive: true });
    }

    const configPath = path.join(this.config.baseDir, 'config.yaml');
    try {
      await fs.writeFile(configPath, CONFIG_STUB, { encoding: 'utf-8', flag: 'wx' });
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'EEXIST') {
        throw new StorageError(`Failed to create ${configPath}: ${errorMessage(error)}`);
      }
    }
  }

  /**
   * True once `initialize` has run for this base directory
   */
  async isInitialized(): Promise<boolean> {
    try {
      const stat = await fs.stat(this.config.baseDir);
      return stat.isDirectory();
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return false;
      }
      throw error;
    }
  }

  getArtifactPath(id: string, type: ArtifactType): string {
    return path.join(this.config.baseDir, TYPE_DIRECTORIES[type], `${id}.md`);
  }

  /**
   * Resolves an ID to its file path, or null when the ID is not an artifact ID.
   * Throws SecurityError for IDs that try to escape the store.
   */
  private resolve(id: string): string | null {
    let normalized: string;
    try {
      normalized = validateId(id);
    } catch (error) {
      if (error instanceof ValidationError) {
        return null;
      }
      throw error;
    }
    const type = typeFromId(normalized);
    return type ? this.getArtifactPath(normalized, type) : null;
  }

  /**
   * Writes an artifact, replacing any previous version
   */
  async save(artifact: AnyArtifact): Promise<void> {
    const id = validateId(artifact.id, artifact.type);
    const filePath = this.getArtifactPath(id, artifact.type);

    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, serialize(artifact), 'utf-8');
    } catch (error) {
      throw new StorageError(`Failed to save ${id}: ${errorMessage(error)}`, { path: filePath });
    } finally {
      this.cache.invalidate();
    }

    logger.debug(`Saved ${id}`, { path: filePath });
  }

  /**
   * Loads an artifact by ID
   *
   * @returns The artifact, or null if no such file exists
   * @throws SerializationError if the file exists but cannot be parsed
   */
  async load(id: string): Promise<AnyArtifact | null> {
    const filePath = this.resolve(id);
    if (!filePath) {
      return null;
    }

    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      throw new StorageError(`Failed to read ${filePath}: ${errorMessage(error)}`);
    }

    try {
      return deserialize(content);
    } catch (error) {
      if (error instanceof SerializationError) {
        throw new SerializationError(`${filePath}: ${error.message}`, error.line, error.column);
      }
      throw error;
    }
  }

  /**
   * Deletes an artifact by ID
   *
   * @returns true if deleted, false if not found
   */
  async delete(id: string): Promise<boolean> {
    const filePath = this.resolve(id);
    if (!filePath) {
      return false;
    }

    try {
      await fs.unlink(filePath);
      this.cache.invalidate();
      return true;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return false;
      }
      throw new StorageError(`Failed to delete ${id}: ${errorMessage(error)}`);
    }
  }

  async exists(id: string): Promise<boolean> {
    const filePath = this.resolve(id);
    if (!filePath) {
      return false;
    }

    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Reads every artifact file, collecting the ones that fail to parse
   */
  async scan(types: readonly ArtifactType[] = ARTIFACT_TYPES): Promise<ScanResult> {
    const artifacts: AnyArtifact[] = [];
    const failures: UnreadableFile[] = [];

    for (const type of types) {
      const dirPath = path.join(this.config.baseDir, TYPE_DIRECTORIES[type]);

      let files: string[];
      try {
        files = await fs.readdir(dirPath);
      } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') {
          continue;
        }
        throw new StorageError(`Failed to read ${dirPath}: ${errorMessage(error)}`);
      }

      for (const file of files.sort()) {
        if (!file.endsWith('.md')) continue;

        const filePath = path.join(dirPath, file);
        try {
          const artifact = deserialize(await fs.readFile(filePath, 'utf-8'));
          if (artifact.type !== type || `${artifact.id}.md` !== file) {
            failures.push({ path: filePath, error: `File name does not match ${artifact.id}` });
            continue;
          }
          artifacts.push(artifact);
        } catch (error) {
          failures.push({ path: filePath, error: errorMessage(error) });
        }
      }
    }

    return { artifacts, failures };
  }

  /**
   * Lists artifacts, optionally filtered, newest first.
   * Files that cannot be parsed are skipped with a warning.
   */
  async list(filters?: ArtifactFilters): Promise<AnyArtifact[]> {
    const cached = this.cache.get(filters);
    if (cached) {
      return cached;
    }

    const { artifacts, failures } = await this.scan(filters?.type ? [filters.type] : ARTIFACT_TYPES);
    for (const failure of failures) {
      logger.warn(`Skipping unreadable artifact ${failure.path}: ${failure.error}`);
    }

    const matching = artifacts.filter(artifact => this.matchesFilters(artifact, filters));
    matching.sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id.localeCompare(a.id));

    this.cache.set(matching, filters);

    return matching;
  }

  private matchesFilters(artifact: AnyArtifact, filters?: ArtifactFilters): boolean {
    if (!filters) return true;

    if (filters.type && artifact.type !== filters.type) {
      return false;
    }

    if (filters.status && artifact.status !== filters.status) {
      return false;
    }

    if (filters.owner && artifact.owner !== filters.owner) {
      return false;
    }

    if (filters.dateFrom && artifact.createdAt < filters.dateFrom) {
      return false;
    }
    if (filters.dateTo && artifact.createdAt > filters.dateTo) {
      return false;
    }

    if (filters.tags && filters.tags.length > 0) {
      const artifactTags = new Set(artifact.tags);
      for (const tag of filters.tags) {
        if (!artifactTags.has(tag)) {
          return false;
        }
      }
    }

    return true;
  }

  getBaseDir(): string {
    return this.config.baseDir;
  }
}
