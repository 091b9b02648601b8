// Tests for artifact creation and editing

import { describe, it, expect, beforeEach, afterEach, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { openWorkspace, Workspace } from '../workspace.js';
import { toListItems } from './artifact-service.js';
import {
  LineageError,
  NotFoundError,
  ValidationError,
  ImmutableArtifactError
} from '../../core/errors.js';
import { Logger, LogLevel } from '../../core/logger.js';

describe('ArtifactService', () => {
  const testDir = './.air-test-artifact-service';
  let ws: Workspace;

  beforeAll(() => {
    Logger.configure({ level: LogLevel.SILENT });
  });

  afterAll(() => {
    Logger.configure({ level: LogLevel.INFO });
  });

  beforeEach(async () => {
    if (fs.existsSync(testDir)) {
      fs.rmSync(testDir, { recursive: true });
    }
    ws = openWorkspace(testDir);
    await ws.fileStore.initialize();
  });

  afterEach(() => {
    if (fs.existsSync(testDir)) {
      fs.rmSync(testDir, { recursive: true });
    }
  });

  describe('create', () => {
    it('should create a PRD from its template', async () => {
      const prd = await ws.artifacts.create({ type: 'prd', title: '  Reorder  ', owner: 'pm', tags: ['Checkout'] });

      expect(prd.id).toBe('PRD-0001');
      expect(prd.title).toBe('Reorder');
      expect(prd.status).toBe('draft');
      expect(prd.tags).toEqual(['checkout']);
      expect(prd.type === 'prd' && prd.problem).toBe('[Describe the problem to be solved]');
      expect(prd.type === 'prd' && prd.goals).toEqual(['[List the business goals]']);

      expect(await ws.artifacts.get('prd-0001')).toEqual(prd);
    });

    it('should start ADRs as proposed and Bolts as todo', async () => {
      const prd = await ws.artifacts.create({ type: 'prd', title: 'Reorder', owner: 'pm' });
      const tip = await ws.artifacts.create({ type: 'tip', title: 'Small change', owner: 'eng', parentId: prd.id });
      const rfc = await ws.artifacts.create({ type: 'rfc', title: 'Design', owner: 'eng', parentId: tip.id });
      const adr = await ws.artifacts.create({ type: 'adr', title: 'Decision', owner: 'eng', parentId: rfc.id });
      const bolt = await ws.artifacts.create({ type: 'bolt', title: 'Work', owner: 'eng', parentId: adr.id });

      expect([tip.status, rfc.status, adr.status, bolt.status]).toEqual(['draft', 'draft', 'proposed', 'todo']);
      expect(bolt.references).toEqual([{ targetId: 'ADR-0001', targetType: 'adr', linkType: 'derives-from' }]);
    });

    it('should fill the given sections', async () => {
      const prd = await ws.artifacts.create({
        type: 'prd',
        title: 'Reorder',
        owner: 'pm',
        sections: { Problem: ' Buyers cannot reorder ', goals: '- One step\n- Fast\n\n' }
      });

      expect(prd.type === 'prd' && prd.problem).toBe('Buyers cannot reorder');
      expect(prd.type === 'prd' && prd.goals).toEqual(['One step', 'Fast']);
    });

    it('should apply configured defaults', async () => {
      fs.writeFileSync(
        path.join(ws.storeDir, 'config.yaml'),
        'defaults:\n  owner: default-owner\n  tags:\n    adr: [architecture]\n    prd: [product]\n',
        'utf-8'
      );

      const prd = await ws.artifacts.create({ type: 'prd', title: 'Reorder', tags: ['checkout'] });

      expect(prd.owner).toBe('default-owner');
      expect(prd.tags).toEqual(['product', 'checkout']);
    });

    it('should require an owner', async () => {
      await expect(ws.artifacts.create({ type: 'prd', title: 'Reorder' })).rejects.toThrow('Owner is required');
    });

    it('should require a parent for derived types', async () => {
      await expect(ws.artifacts.create({ type: 'daa', title: 'Domain', owner: 'a' })).rejects.toThrow(
        'A daa must derive from a prd; pass its ID as the parent'
      );
      await expect(ws.artifacts.create({ type: 'rfc', title: 'Design', owner: 'a' })).rejects.toThrow(
        'A rfc must derive from a daa or tip; pass its ID as the parent'
      );
    });

    it('should reject parents of the wrong type', async () => {
      const prd = await ws.artifacts.create({ type: 'prd', title: 'Reorder', owner: 'pm' });

      await expect(ws.artifacts.create({ type: 'adr', title: 'Decision', owner: 'a', parentId: prd.id })).rejects.toThrow(
        'A adr cannot derive from PRD-0001: expected a rfc'
      );
    });

    it('should reject a missing parent', async () => {
      await expect(
        ws.artifacts.create({ type: 'daa', title: 'Domain', owner: 'a', parentId: 'PRD-0042' })
      ).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should reject parents on root types', async () => {
      const prd = await ws.artifacts.create({ type: 'prd', title: 'Reorder', owner: 'pm' });
      await expect(
        ws.artifacts.create({ type: 'prd', title: 'Child', owner: 'pm', parentId: prd.id })
      ).rejects.toBeInstanceOf(LineageError);
    });

    it('should create post-mortems with traces', async () => {
      const prd = await ws.artifacts.create({ type: 'prd', title: 'Reorder', owner: 'pm' });

      const pm = await ws.artifacts.create({
        type: 'postmortem',
        title: 'Reorder outage',
        owner: 'sre',
        severity: 'sev1',
        incidentDate: new Date('2025-04-01T12:00:00.000Z'),
        deployment: ' v2.3 ',
        traces: ['prd-0001', 'PRD-0001']
      });

      expect(pm.id).toBe('PM-0001');
      expect(pm.references).toEqual([{ targetId: prd.id, targetType: 'prd', linkType: 'traces-to' }]);
      expect(pm.type === 'postmortem' && pm.deployment).toBe('v2.3');
    });

    it('should require a severity for post-mortems', async () => {
      await expect(ws.artifacts.create({ type: 'postmortem', title: 'Outage', owner: 'sre' })).rejects.toThrow(
        'Severity is required for post-mortems'
      );
    });

    it('should only let post-mortems trace', async () => {
      const prd = await ws.artifacts.create({ type: 'prd', title: 'Reorder', owner: 'pm' });
      await expect(
        ws.artifacts.create({ type: 'prd', title: 'Other', owner: 'pm', traces: [prd.id] })
      ).rejects.toBeInstanceOf(ValidationError);
    });

    it('should reject trace targets of other types', async () => {
      const prd = await ws.artifacts.create({ type: 'prd', title: 'Reorder', owner: 'pm' });
      const daa = await ws.artifacts.create({ type: 'daa', title: 'Domain', owner: 'a', parentId: prd.id });

      await expect(
        ws.artifacts.create({ type: 'postmortem', title: 'Outage', owner: 'sre', severity: 'sev3', traces: [daa.id] })
      ).rejects.toThrow('A post-mortem cannot trace to DAA-0001: expected an ADR, Bolt or PRD');
    });

    it('should skip IDs already taken on disk', async () => {
      await ws.artifacts.create({ type: 'prd', title: 'First', owner: 'pm' });
      fs.writeFileSync(path.join(testDir, '.air', 'counters.json'), JSON.stringify({ idCounters: { prd: 0 } }));
      ws = openWorkspace(testDir);

      const second = await ws.artifacts.create({ type: 'prd', title: 'Second', owner: 'pm' });
      expect(second.id).toBe('PRD-0002');
    });

    it('should reject unknown sections', async () => {
      await expect(
        ws.artifacts.create({ type: 'prd', title: 'Reorder', owner: 'pm', sections: { Decision: 'x' } })
      ).rejects.toThrow('Unknown prd section "Decision"');
    });

    it('should audit creation', async () => {
      const prd = await ws.artifacts.create({ type: 'prd', title: 'Reorder', owner: 'pm' }, 'jane');
      const history = await ws.auditService.getHistory(prd.id);
      expect(history).toHaveLength(1);
      expect(history[0]).toMatchObject({ action: 'create', actor: 'jane', artifactId: 'PRD-0001' });
    });
  });

  describe('get and find', () => {
    it('should throw for missing artifacts in get and return null in find', async () => {
      await expect(ws.artifacts.get('ADR-0009')).rejects.toThrow('Artifact not found: ADR-0009');
      expect(await ws.artifacts.find('ADR-0009')).toBeNull();
    });

    it('should reject malformed IDs', async () => {
      await expect(ws.artifacts.find('../etc/passwd')).rejects.toThrow();
    });
  });

  describe('update', () => {
    it('should change title, owner and tags and audit the old values', async () => {
      const prd = await ws.artifacts.create({ type: 'prd', title: 'Reorder', owner: 'pm', tags: ['a'] });

      const updated = await ws.artifacts.update(prd.id, { title: 'Reorder v2', owner: 'pm', tags: ['b'] }, 'jane');

      expect(updated.title).toBe('Reorder v2');
      expect(updated.tags).toEqual(['b']);
      const history = await ws.auditService.getHistory(prd.id);
      expect(history[1].changes).toEqual({
        title: { old: 'Reorder', new: 'Reorder v2' },
        tags: { old: ['a'], new: ['b'] }
      });
    });

    it('should not write when nothing changes', async () => {
      const prd = await ws.artifacts.create({ type: 'prd', title: 'Reorder', owner: 'pm' });
      await ws.artifacts.update(prd.id, { title: 'Reorder' });
      expect(await ws.auditService.getHistory(prd.id)).toHaveLength(1);
    });
  });

  describe('updateSection', () => {
    it('should replace a text section by heading', async () => {
      const prd = await ws.artifacts.create({ type: 'prd', title: 'Reorder', owner: 'pm' });

      const updated = await ws.artifacts.updateSection(prd.id, 'problem', 'Buyers cannot reorder');

      expect(updated.type === 'prd' && updated.problem).toBe('Buyers cannot reorder');
      const stored = await ws.artifacts.get(prd.id);
      expect(stored.type === 'prd' && stored.problem).toBe('Buyers cannot reorder');
    });

    it('should split list input into single-line items', async () => {
      const prd = await ws.artifacts.create({ type: 'prd', title: 'Reorder', owner: 'pm' });

      const updated = await ws.artifacts.updateSection(prd.id, 'Non-Goals', '* Mobile\n- Gift cards\nsubscriptions');

      expect(updated.type === 'prd' && updated.nonGoals).toEqual(['Mobile', 'Gift cards', 'subscriptions']);
    });

    it('should reject content that would start a new section', async () => {
      const prd = await ws.artifacts.create({ type: 'prd', title: 'Reorder', owner: 'pm' });

      await expect(ws.artifacts.updateSection(prd.id, 'Problem', 'text\n## Goals\n- injected')).rejects.toThrow(
        'Section "Problem" cannot contain Markdown headings'
      );
    });
  });

  describe('type-specific edits', () => {
    it('should record RFC sign-offs, replacing a reviewer\'s earlier one', async () => {
      const prd = await ws.artifacts.create({ type: 'prd', title: 'Reorder', owner: 'pm' });
      const tip = await ws.artifacts.create({ type: 'tip', title: 'Small', owner: 'eng', parentId: prd.id });
      const rfc = await ws.artifacts.create({ type: 'rfc', title: 'Design', owner: 'eng', parentId: tip.id });

      await ws.artifacts.addSignoff(rfc.id, { name: 'Ana', role: 'architect', approved: false });
      const updated = await ws.artifacts.addSignoff(rfc.id, { name: 'ana', role: 'architect', approved: true });

      expect(updated.type === 'rfc' && updated.signoffs.map(s => [s.name, s.approved])).toEqual([['ana', true]]);
    });

    it('should refuse a blank sign-off role and keep the RFC readable', async () => {
      const prd = await ws.artifacts.create({ type: 'prd', title: 'Reorder', owner: 'pm' });
      const tip = await ws.artifacts.create({ type: 'tip', title: 'Small', owner: 'eng', parentId: prd.id });
      const rfc = await ws.artifacts.create({ type: 'rfc', title: 'Design', owner: 'eng', parentId: tip.id });

      await expect(
        ws.artifacts.addSignoff(rfc.id, { name: 'alice', role: '   ', approved: true })
      ).rejects.toThrow('Sign-off role cannot be empty');

      const reloaded = await ws.artifacts.find(rfc.id);
      expect(reloaded?.type === 'rfc' && reloaded.signoffs).toEqual([]);
      expect((await ws.artifacts.list({ type: 'rfc' })).map(a => a.id)).toEqual(['RFC-0001']);
    });

    it('should refuse sign-offs on other types', async () => {
      const prd = await ws.artifacts.create({ type: 'prd', title: 'Reorder', owner: 'pm' });
      await expect(
        ws.artifacts.addSignoff(prd.id, { name: 'Ana', role: 'architect', approved: true })
      ).rejects.toThrow('Sign-offs apply to RFCs, not PRD-0001');
    });

    it('should add bounded contexts to a DAA', async () => {
      const prd = await ws.artifacts.create({ type: 'prd', title: 'Reorder', owner: 'pm' });
      const daa = await ws.artifacts.create({ type: 'daa', title: 'Domain', owner: 'a', parentId: prd.id });

      const updated = await ws.artifacts.addBoundedContext(daa.id, { name: 'Ordering', responsibility: 'Orders', aggregates: ['Order', ' '] });
      expect(updated.type === 'daa' && updated.boundedContexts).toEqual([
        { name: 'Ordering', responsibility: 'Orders', aggregates: ['Order'] }
      ]);

      await expect(
        ws.artifacts.addBoundedContext(daa.id, { name: 'ordering', responsibility: 'Again', aggregates: [] })
      ).rejects.toThrow('DAA-0001 already has a bounded context named "ordering"');
    });

    it('should assign a Bolt', async () => {
      const prd = await ws.artifacts.create({ type: 'prd', title: 'Reorder', owner: 'pm' });
      const tip = await ws.artifacts.create({ type: 'tip', title: 'Small', owner: 'eng', parentId: prd.id });
      const rfc = await ws.artifacts.create({ type: 'rfc', title: 'Design', owner: 'eng', parentId: tip.id });
      const adr = await ws.artifacts.create({ type: 'adr', title: 'Decision', owner: 'eng', parentId: rfc.id });
      const bolt = await ws.artifacts.create({ type: 'bolt', title: 'Work', owner: 'eng', parentId: adr.id });

      const updated = await ws.artifacts.assign(bolt.id, 'dev', '2d');

      expect(updated.type === 'bolt' && [updated.assignee, updated.estimate]).toEqual(['dev', '2d']);
    });
  });

  describe('delete', () => {
    it('should delete an unreferenced draft', async () => {
      const prd = await ws.artifacts.create({ type: 'prd', title: 'Reorder', owner: 'pm' });

      await ws.artifacts.delete(prd.id, 'jane');

      expect(await ws.artifacts.find(prd.id)).toBeNull();
      const history = await ws.auditService.getHistory(prd.id);
      expect(history.map(e => e.action)).toEqual(['create', 'delete']);
    });

    it('should refuse to delete an artifact others link to', async () => {
      const prd = await ws.artifacts.create({ type: 'prd', title: 'Reorder', owner: 'pm' });
      await ws.artifacts.create({ type: 'daa', title: 'Domain', owner: 'a', parentId: prd.id });

      await expect(ws.artifacts.delete(prd.id)).rejects.toThrow('Cannot delete PRD-0001: referenced by DAA-0001');
    });

    it('should refuse to delete past the initial status', async () => {
      const prd = await ws.artifacts.create({
        type: 'prd',
        title: 'Reorder',
        owner: 'pm',
        sections: { problem: 'p', goals: ['g'], acceptanceCriteria: ['c'] }
      });
      await ws.lifecycle.transition(prd.id, 'approved');

      await expect(ws.artifacts.delete(prd.id)).rejects.toBeInstanceOf(ImmutableArtifactError);
    });
  });
});

describe('toListItems', () => {
  it('should strip bullets and blank lines', () => {
    expect(toListItems('- a\n\n* b\n  c  ')).toEqual(['a', 'b', 'c']);
    expect(toListItems(['one', 'two\nthree'])).toEqual(['one', 'two', 'three']);
  });
});
