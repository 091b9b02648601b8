/**
 * Configuration Service
 *
 * Loads `.air/config.yaml`: creation defaults (owner, tags per artifact
 * type), gate settings, git tagging and the log level. A missing file
 * means all defaults; a malformed one is an error.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'yaml';
import { z } from 'zod';
import { ArtifactType, ARTIFACT_TYPES } from '../../models/types.js';
import { ArtifactTypeSchema, formatIssues } from '../../core/schemas.js';
import { ConfigError, isErrnoException, errorMessage } from '../../core/errors.js';
import { LogLevel, parseLogLevel } from '../../core/logger.js';
import { findSection } from '../serialization/sections.js';
import {
  DEFAULT_REQUIRED_SECTIONS,
  DEFAULT_GATE_SETTINGS,
  GateSettings
} from '../lifecycle/state-machine.js';

const SectionListSchema = z.record(ArtifactTypeSchema, z.array(z.string().min(1)));

/**
 * Schema of `.air/config.yaml`
 */
export const TrackerConfigSchema = z
  .object({
    defaults: z
      .object({
        owner: z.string().min(1).optional(),
        tags: z.record(ArtifactTypeSchema, z.array(z.string().min(1))).default({})
      })
      .default({}),
    gates: z
      .object({
        requiredApprovals: z.number().int().min(0).default(DEFAULT_GATE_SETTINGS.requiredApprovals),
        requiredSections: SectionListSchema.default({})
      })
      .default({}),
    git: z
      .object({
        tagOnSeal: z.boolean().default(false),
        tagPrefix: z
          .string()
          .regex(/^[A-Za-z0-9._-]+$/, 'Tag prefix may only contain letters, digits, dot, underscore and hyphen')
          .default('air')
      })
      .default({}),
    logging: z
      .object({
        level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info')
      })
      .default({})
  })
  .superRefine((config, ctx) => {
    for (const type of ARTIFACT_TYPES) {
      for (const name of config.gates.requiredSections[type] ?? []) {
        if (!findSection(type, name)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['gates', 'requiredSections', type],
            message: `Unknown ${type} section "${name}"`
          });
        }
      }
    }
  });

export type TrackerConfig = z.infer<typeof TrackerConfigSchema>;

export interface ConfigDefaults {
  owner?: string;
  tags: Partial<Record<ArtifactType, string[]>>;
}

export interface GitConfig {
  tagOnSeal: boolean;
  tagPrefix: string;
}

/**
 * Provides access to `.air/config.yaml` with defaults for anything unset
 */
export class ConfigService {
  private baseDir: string;
  private configPath: string;
  private cachedConfig: TrackerConfig | null = null;

  constructor(options: { baseDir?: string } = {}) {
    this.baseDir = options.baseDir || '.air';
    this.configPath = path.join(this.baseDir, 'config.yaml');
  }

  /**
   * Loads and validates the configuration, with caching
   *
   * @throws ConfigError if the file is not valid YAML or violates the schema
   */
  async load(): Promise<TrackerConfig> {
    if (this.cachedConfig !== null) {
      return this.cachedConfig;
    }

    let content = '';
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'ENOENT') {
        throw new ConfigError(`Cannot read ${this.configPath}: ${errorMessage(error)}`, { path: this.configPath });
      }
    }

    let raw: unknown;
    try {
      raw = yaml.parse(content) ?? {};
    } catch (error) {
      throw new ConfigError(`Invalid YAML in ${this.configPath}: ${errorMessage(error)}`, { path: this.configPath });
    }

    const result = TrackerConfigSchema.safeParse(raw);
    if (!result.success) {
      throw new ConfigError(
        `Invalid ${this.configPath}: ${formatIssues(result.error).join('; ')}`,
        { path: this.configPath }
      );
    }

    this.cachedConfig = result.data;
    return result.data;
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Clear the cached configuration (after editing the file)
   */
  clearCache(): void {
    this.cachedConfig = null;
  }

  async getDefaults(): Promise<ConfigDefaults> {
    const config = await this.load();
    return config.defaults;
  }

  async getDefaultOwner(): Promise<string | undefined> {
    const defaults = await this.getDefaults();
    return defaults.owner;
  }

  async getDefaultTags(artifactType: ArtifactType): Promise<string[]> {
    const defaults = await this.getDefaults();
    return defaults.tags[artifactType] ?? [];
  }

  /**
   * Gate settings, with configured required sections replacing the
   * defaults type by type. Headings are accepted and mapped to fields.
   */
  async getGateSettings(): Promise<GateSettings> {
    const config = await this.load();
    const requiredSections: Record<ArtifactType, readonly string[]> = { ...DEFAULT_REQUIRED_SECTIONS };

    for (const type of ARTIFACT_TYPES) {
      const configured = config.gates.requiredSections[type];
      if (configured) {
        requiredSections[type] = configured.flatMap(name => findSection(type, name)?.field ?? []);
      }
    }

    return {
      requiredApprovals: config.gates.requiredApprovals,
      requiredSections
    };
  }

  async getGitConfig(): Promise<GitConfig> {
    const config = await this.load();
    return config.git;
  }

  async getLogLevel(): Promise<LogLevel> {
    const config = await this.load();
    return parseLogLevel(config.logging.level) ?? LogLevel.INFO;
  }
}
