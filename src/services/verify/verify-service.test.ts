// Tests for store-wide invariant checks

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { openWorkspace, Workspace } from '../workspace.js';
import { stringifyPattern } from '../playbook/playbook-service.js';
import { seal } from '../../core/integrity.js';
import {
  CREATED,
  makePRD,
  makeDAA,
  makeRFC,
  makeADR,
  makeBolt,
  makePostmortem,
  ref
} from '../../testing/fixtures.js';

describe('VerifyService', () => {
  const testDir = './.air-test-verify';
  let ws: Workspace;

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

  it('should pass a consistent store', async () => {
    for (const artifact of [makePRD(), makeDAA(), makeRFC(), makeADR(), makeBolt(), makePostmortem()]) {
      await ws.fileStore.save(artifact);
    }

    const report = await ws.verify.verify();

    expect(report).toEqual({ checked: 6, issues: [], errors: 0, warnings: 0, ok: true });
  });

  it('should report links to missing artifacts', async () => {
    await ws.fileStore.save(makeADR());

    const report = await ws.verify.verify();

    expect(report.issues).toEqual([
      {
        kind: 'broken-reference',
        severity: 'error',
        artifactId: 'ADR-0001',
        message: 'derives-from link to RFC-0001, which does not exist'
      }
    ]);
    expect(report.ok).toBe(false);
  });

  it('should report child artifacts without a parent', async () => {
    await ws.fileStore.save(makePRD());
    await ws.fileStore.save(makeDAA({ references: [] }));

    const report = await ws.verify.verify();

    expect(report.issues.filter(i => i.kind === 'missing-parent')).toEqual([
      {
        kind: 'missing-parent',
        severity: 'error',
        artifactId: 'DAA-0001',
        message: 'DAA-0001 does not derive from any artifact'
      }
    ]);
  });

  it('should report content edited after sealing', async () => {
    await ws.fileStore.save({ ...seal(makePRD({ status: 'approved' })), problem: 'Rewritten after approval' });

    const report = await ws.verify.verify();

    expect(report.issues.filter(i => i.kind === 'checksum-mismatch')).toEqual([
      {
        kind: 'checksum-mismatch',
        severity: 'error',
        artifactId: 'PRD-0001',
        message: 'Checksum mismatch: PRD-0001 was modified after it was sealed'
      }
    ]);
  });

  it('should report structural problems as invalid artifacts', async () => {
    await ws.fileStore.save(makePRD({ status: 'approved' }));

    const report = await ws.verify.verify();

    expect(report.issues).toContainEqual({
      kind: 'invalid-artifact',
      severity: 'error',
      artifactId: 'PRD-0001',
      message: 'checksum: A approved prd must carry a checksum'
    });
  });

  it('should report lineage cycles', async () => {
    await ws.fileStore.save(makeADR({ id: 'ADR-0002', references: [ref('ADR-0003', 'supersedes')] }));
    await ws.fileStore.save(makeADR({ id: 'ADR-0003', references: [ref('ADR-0002', 'supersedes')] }));

    const report = await ws.verify.verify();

    expect(report.issues.filter(i => i.kind === 'lineage-cycle')).toEqual([
      {
        kind: 'lineage-cycle',
        severity: 'error',
        artifactId: 'ADR-0002',
        message: 'Lineage cycle: ADR-0002 -> ADR-0003 -> ADR-0002'
      }
    ]);
  });

  it('should warn when a parent falls behind its child', async () => {
    await ws.fileStore.save(makePRD());
    await ws.fileStore.save(seal(makeDAA({ status: 'validated' })));

    const report = await ws.verify.verify();

    expect(report.issues.filter(i => i.kind === 'status-inconsistency')).toEqual([
      {
        kind: 'status-inconsistency',
        severity: 'warning',
        artifactId: 'DAA-0001',
        message: 'DAA-0001 is validated but its parent PRD-0001 is draft (expected approved or superseded)'
      }
    ]);
  });

  it('should accept a superseded parent', async () => {
    await ws.fileStore.save(makePRD({ status: 'superseded', supersededBy: 'PRD-0002' }));
    await ws.fileStore.save(makePRD({ id: 'PRD-0002' }));
    await ws.fileStore.save(seal(makeDAA({ status: 'locked' })));

    const report = await ws.verify.verify();

    expect(report.issues.filter(i => i.kind === 'status-inconsistency')).toEqual([]);
  });

  it('should report files that cannot be parsed', async () => {
    const brokenArtifact = path.join(ws.storeDir, 'prd', 'PRD-0005.md');
    const brokenPattern = path.join(ws.storeDir, 'playbook', 'PLAY-0001.yaml');
    const config = path.join(ws.storeDir, 'config.yaml');
    fs.writeFileSync(brokenArtifact, 'no frontmatter here', 'utf-8');
    fs.writeFileSync(brokenPattern, 'name: [unclosed', 'utf-8');
    fs.writeFileSync(config, 'git:\n  tagOnSeal: sometimes\n', 'utf-8');

    const report = await ws.verify.verify();

    expect(report.issues.map(i => [i.kind, i.path])).toEqual([
      ['unparseable-file', brokenArtifact],
      ['unparseable-file', brokenPattern],
      ['unparseable-file', config]
    ]);
    expect(report.errors).toBe(3);
  });

  it('should report playbook patterns learned from missing post-mortems', async () => {
    fs.writeFileSync(
      path.join(ws.storeDir, 'playbook', 'PLAY-0001.yaml'),
      stringifyPattern({
        id: 'PLAY-0001',
        name: 'Orphaned pattern',
        problem: 'Problem',
        solution: 'Solution',
        sourcePostmortems: ['PM-0009'],
        tags: [],
        createdAt: CREATED,
        owner: 'sre'
      }),
      'utf-8'
    );

    const report = await ws.verify.verify();

    expect(report.checked).toBe(1);
    expect(report.issues).toEqual([
      {
        kind: 'broken-reference',
        severity: 'error',
        artifactId: 'PLAY-0001',
        message: 'PLAY-0001 is learned from PM-0009, which does not exist'
      }
    ]);
  });
});
