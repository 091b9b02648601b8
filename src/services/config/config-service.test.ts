/**
 * Tests for the configuration service
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fc from 'fast-check';
import * as fs from 'fs/promises';
import * as yaml from 'yaml';
import { ConfigService } from './config-service.js';
import { ConfigError } from '../../core/errors.js';
import { LogLevel } from '../../core/logger.js';
import { DEFAULT_REQUIRED_SECTIONS } from '../lifecycle/state-machine.js';

const TEST_DIR = '.air-test-config';

async function writeConfig(content: unknown): Promise<void> {
  const text = typeof content === 'string' ? content : yaml.stringify(content);
  await fs.writeFile(`${TEST_DIR}/config.yaml`, text);
}

describe('ConfigService', () => {
  let configService: ConfigService;

  beforeEach(async () => {
    await fs.rm(TEST_DIR, { recursive: true, force: true });
    await fs.mkdir(TEST_DIR, { recursive: true });
    configService = new ConfigService({ baseDir: TEST_DIR });
  });

  afterEach(async () => {
    await fs.rm(TEST_DIR, { recursive: true, force: true });
  });

  describe('defaults', () => {
    it('should return defaults when no config file exists', async () => {
      expect(await configService.getDefaults()).toEqual({ tags: {} });
      expect(await configService.getGitConfig()).toEqual({ tagOnSeal: false, tagPrefix: 'air' });
      expect(await configService.getLogLevel()).toBe(LogLevel.INFO);
    });

    it('should treat a comment-only file as empty', async () => {
      await writeConfig('# nothing configured\n');
      const settings = await configService.getGateSettings();
      expect(settings.requiredApprovals).toBe(1);
      expect(settings.requiredSections).toEqual(DEFAULT_REQUIRED_SECTIONS);
    });

    it('should return configured owner and tags per artifact type', async () => {
      await writeConfig({ defaults: { owner: 'test-owner', tags: { adr: ['architecture'] } } });

      expect(await configService.getDefaultOwner()).toBe('test-owner');
      expect(await configService.getDefaultTags('adr')).toEqual(['architecture']);
      expect(await configService.getDefaultTags('prd')).toEqual([]);
    });
  });

  describe('gate settings', () => {
    it('should replace required sections for configured types only', async () => {
      await writeConfig({ gates: { requiredApprovals: 2, requiredSections: { prd: ['problem'] } } });

      const settings = await configService.getGateSettings();

      expect(settings.requiredApprovals).toBe(2);
      expect(settings.requiredSections.prd).toEqual(['problem']);
      expect(settings.requiredSections.adr).toEqual(['context', 'decision', 'consequences']);
    });

    it('should map section headings to field names', async () => {
      await writeConfig({ gates: { requiredSections: { rfc: ['Proposed Design', 'alternatives'] } } });
      expect((await configService.getGateSettings()).requiredSections.rfc).toEqual(['proposedDesign', 'alternatives']);
    });

    it('should reject unknown section names', async () => {
      await writeConfig({ gates: { requiredSections: { adr: ['budget'] } } });
      await expect(configService.getGateSettings()).rejects.toThrow('Unknown adr section "budget"');
    });

    it('should accept any non-negative approval count', async () => {
      await fc.assert(
        fc.asyncProperty(fc.integer({ min: 0, max: 50 }), async (approvals) => {
          await writeConfig({ gates: { requiredApprovals: approvals } });
          configService.clearCache();
          const settings = await configService.getGateSettings();
          return settings.requiredApprovals === approvals;
        }),
        { numRuns: 20 }
      );
    });
  });

  describe('errors', () => {
    it('should raise ConfigError for malformed YAML', async () => {
      await writeConfig('gates: [unclosed\n');
      await expect(configService.load()).rejects.toThrow(ConfigError);
    });

    it('should raise ConfigError for schema violations', async () => {
      await writeConfig({ gates: { requiredApprovals: -1 } });
      await expect(configService.load()).rejects.toThrow(/gates\.requiredApprovals/);
    });

    it('should reject an unknown artifact type in defaults', async () => {
      await writeConfig({ defaults: { tags: { epic: ['x'] } } });
      await expect(configService.load()).rejects.toThrow(ConfigError);
    });

    it('should reject an unsafe tag prefix', async () => {
      await writeConfig({ git: { tagPrefix: 'bad prefix' } });
      await expect(configService.getGitConfig()).rejects.toThrow(ConfigError);
    });
  });

  describe('caching', () => {
    it('should serve the cached config until cleared', async () => {
      await writeConfig({ logging: { level: 'debug' } });
      expect(await configService.getLogLevel()).toBe(LogLevel.DEBUG);

      await writeConfig({ logging: { level: 'error' } });
      expect(await configService.getLogLevel()).toBe(LogLevel.DEBUG);

      configService.clearCache();
      expect(await configService.getLogLevel()).toBe(LogLevel.ERROR);
    });
  });
});
