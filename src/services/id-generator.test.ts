// Tests for ID Generator service

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { IdGenerator } from './id-generator.js';

describe('IdGenerator', () => {
  const testDir = './.air-test-id-generator';
  const countersPath = path.join(testDir, '.air', 'counters.json');
  let generator: IdGenerator;

  beforeEach(() => {
    if (fs.existsSync(testDir)) {
      fs.rmSync(testDir, { recursive: true });
    }
    fs.mkdirSync(testDir, { recursive: true });
    generator = new IdGenerator(testDir);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    if (fs.existsSync(testDir)) {
      fs.rmSync(testDir, { recursive: true });
    }
  });

  describe('generateId', () => {
    it('should generate sequential PRD IDs', () => {
      expect(generator.generateId('prd')).toBe('PRD-0001');
      expect(generator.generateId('prd')).toBe('PRD-0002');
      expect(generator.generateId('prd')).toBe('PRD-0003');
    });

    it('should use the short prefixes for bolts, post-mortems and playbook entries', () => {
      expect(generator.generateId('bolt')).toBe('BOLT-0001');
      expect(generator.generateId('postmortem')).toBe('PM-0001');
      expect(generator.generateId('playbook')).toBe('PLAY-0001');
    });

    it('should maintain separate counters per type', () => {
      const rfc1 = generator.generateId('rfc');
      const adr1 = generator.generateId('adr');
      const rfc2 = generator.generateId('rfc');

      expect(rfc1).toBe('RFC-0001');
      expect(adr1).toBe('ADR-0001');
      expect(rfc2).toBe('RFC-0002');
    });

    it('should persist counters across instances', () => {
      generator.generateId('daa');
      generator.generateId('daa');

      const reloaded = new IdGenerator(testDir);
      expect(reloaded.generateId('daa')).toBe('DAA-0003');
    });

    it('should write counters as JSON under .air', () => {
      generator.generateId('tip');
      const saved = JSON.parse(fs.readFileSync(countersPath, 'utf-8'));
      expect(saved.idCounters.tip).toBe(1);
      expect(saved.idCounters.prd).toBe(0);
    });

    it('should grow past four digits', () => {
      fs.mkdirSync(path.dirname(countersPath), { recursive: true });
      fs.writeFileSync(countersPath, JSON.stringify({ idCounters: { adr: 9999 } }), 'utf-8');

      expect(new IdGenerator(testDir).generateId('adr')).toBe('ADR-10000');
    });
  });

  describe('counter file problems', () => {
    it('should start from zero when the file is not JSON', () => {
      vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      fs.mkdirSync(path.dirname(countersPath), { recursive: true });
      fs.writeFileSync(countersPath, '{ not json', 'utf-8');

      const fresh = new IdGenerator(testDir);
      expect(fresh.generateId('prd')).toBe('PRD-0001');
      expect(console.warn).toHaveBeenCalledTimes(1);
    });

    it('should start from zero when counters are malformed', () => {
      vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      fs.mkdirSync(path.dirname(countersPath), { recursive: true });
      fs.writeFileSync(countersPath, JSON.stringify({ idCounters: { prd: -3 } }), 'utf-8');

      const fresh = new IdGenerator(testDir);
      expect(fresh.generateId('prd')).toBe('PRD-0001');
    });

    it('should keep known counters and default missing ones', () => {
      fs.mkdirSync(path.dirname(countersPath), { recursive: true });
      fs.writeFileSync(countersPath, JSON.stringify({ idCounters: { bolt: 7 } }), 'utf-8');

      const fresh = new IdGenerator(testDir);
      expect(fresh.generateId('bolt')).toBe('BOLT-0008');
      expect(fresh.generateId('adr')).toBe('ADR-0001');
    });
  });

  describe('static helpers', () => {
    it('should validate ID formats per type', () => {
      expect(IdGenerator.validateIdFormat('PRD-0001', 'prd')).toBe(true);
      expect(IdGenerator.validateIdFormat('PM-0042', 'postmortem')).toBe(true);
      expect(IdGenerator.validateIdFormat('PLAY-0001', 'playbook')).toBe(true);
      expect(IdGenerator.validateIdFormat('PRD-001', 'prd')).toBe(false);
      expect(IdGenerator.validateIdFormat('ADR-0001', 'prd')).toBe(false);
    });
  });
});
