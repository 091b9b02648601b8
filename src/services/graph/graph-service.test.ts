/**
 * Tests for the Graph Service
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import { GraphService } from './graph-service.js';
import { FileStore } from '../storage/file-store.js';
import { NotFoundError } from '../../core/errors.js';
import {
  makePRD,
  makeDAA,
  makeRFC,
  makeADR,
  makeBolt,
  makePostmortem,
  ref
} from '../../testing/fixtures.js';

const TEST_DIR = '.air-test-graph';

describe('GraphService', () => {
  let fileStore: FileStore;
  let graphService: GraphService;

  beforeEach(async () => {
    await fs.rm(TEST_DIR, { recursive: true, force: true });
    fileStore = new FileStore({ baseDir: TEST_DIR });
    await fileStore.initialize();
    graphService = new GraphService(fileStore);

    // PRD <- DAA <- RFC <- ADR <- BOLT, and PM traces to ADR
    for (const artifact of [makePRD(), makeDAA(), makeRFC(), makeADR(), makeBolt(), makePostmortem()]) {
      await fileStore.save(artifact);
    }
  });

  afterEach(async () => {
    await fs.rm(TEST_DIR, { recursive: true, force: true });
  });

  describe('trace', () => {
    it('should list ancestors and descendants with their depth', async () => {
      const result = await graphService.trace('adr-0001');

      expect(result.id).toBe('ADR-0001');
      expect(result.upstream.map(n => [n.id, n.depth, n.linkType])).toEqual([
        ['RFC-0001', 1, 'derives-from'],
        ['DAA-0001', 2, 'derives-from'],
        ['PRD-0001', 3, 'derives-from']
      ]);
      expect(result.downstream.map(n => [n.id, n.depth, n.linkType])).toEqual([
        ['BOLT-0001', 1, 'derives-from'],
        ['PM-0001', 1, 'traces-to']
      ]);
    });

    it('should reach post-mortems from the root', async () => {
      const result = await graphService.trace('PRD-0001');

      expect(result.upstream).toEqual([]);
      expect(result.downstream.map(n => n.id)).toEqual(['DAA-0001', 'RFC-0001', 'ADR-0001', 'BOLT-0001', 'PM-0001']);
      expect(result.downstream[4]).toEqual({
        id: 'PM-0001',
        title: 'Title of PM-0001',
        type: 'postmortem',
        status: 'draft',
        depth: 4,
        linkType: 'traces-to'
      });
    });

    it('should not follow relates-to links', async () => {
      await fileStore.save(makePRD({ id: 'PRD-0002', references: [ref('ADR-0001', 'relates-to')] }));

      const result = await graphService.trace('ADR-0001');

      expect(result.downstream.map(n => n.id)).not.toContain('PRD-0002');
    });

    it('should throw for unknown artifacts', async () => {
      await expect(graphService.trace('ADR-0099')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('getLineage', () => {
    it('should return the chain from the root', async () => {
      expect(await graphService.getLineage('BOLT-0001')).toEqual([
        'PRD-0001',
        'DAA-0001',
        'RFC-0001',
        'ADR-0001',
        'BOLT-0001'
      ]);
    });

    it('should return the artifact alone when it has no parent', async () => {
      expect(await graphService.getLineage('PM-0001')).toEqual(['PM-0001']);
    });
  });

  describe('generateGraph', () => {
    it('should render Mermaid with type and status classes', async () => {
      const output = await graphService.generateGraph({ format: 'mermaid', includeTypes: ['prd', 'daa'] });
      const lines = output.split('\n');

      expect(lines[0]).toBe('graph TB');
      expect(lines).toContain('classDef prd fill:#8e44ad,stroke:#6c3483,color:#fff');
      expect(lines).toContain('DAA_0001["DAA-0001: Title of DAA-0001"]');
      expect(lines).toContain('DAA_0001 -->|derives-from| PRD_0001');
      expect(lines).toContain('class PRD_0001 prd');
      expect(lines).toContain('class PRD_0001 pending');
      expect(lines).not.toContain('RFC_0001["RFC-0001: Title of RFC-0001"]');
    });

    it('should render DOT with colors, styles and escaped titles', async () => {
      await fileStore.save(makeADR({ id: 'ADR-0002', title: 'Use "strict" mode', status: 'deprecated' }));

      const output = await graphService.generateGraph({ format: 'dot' });
      const lines = output.split('\n');

      expect(lines[0]).toBe('digraph G {');
      expect(lines).toContain('  ADR_0002 [label="ADR-0002\\nUse \\"strict\\" mode", color=green, style=filled, fillcolor=gray];');
      expect(lines).toContain('  PM_0001 [label="PM-0001\\nTitle of PM-0001", color=red, style=dashed];');
      expect(lines).toContain('  BOLT_0001 -> ADR_0001 [label="derives-from"];');
      expect(lines[lines.length - 1]).toBe('}');
    });

    it('should draw relates-to links dotted', async () => {
      await fileStore.save(makePRD({ id: 'PRD-0002', references: [ref('ADR-0001', 'relates-to')] }));

      const mermaid = await graphService.generateGraph({ format: 'mermaid' });
      const dot = await graphService.generateGraph({ format: 'dot' });

      expect(mermaid.split('\n')).toContain('PRD_0002 -.->|relates-to| ADR_0001');
      expect(dot.split('\n')).toContain('  PRD_0002 -> ADR_0001 [label="relates-to", style=dotted];');
    });

    it('should limit the graph to the root\'s connected artifacts', async () => {
      await fileStore.save(makePRD({ id: 'PRD-0002' }));

      const output = await graphService.generateGraph({ format: 'mermaid', rootId: 'PRD-0001' });

      expect(output).toContain('PM_0001["PM-0001: Title of PM-0001"]');
      expect(output).not.toContain('PRD_0002');
    });
  });

  describe('getConnectedArtifacts', () => {
    it('should follow links in both directions', async () => {
      await fileStore.save(makePRD({ id: 'PRD-0002' }));

      expect(await graphService.getConnectedArtifacts('BOLT-0001')).toEqual([
        'ADR-0001',
        'DAA-0001',
        'PM-0001',
        'PRD-0001',
        'RFC-0001'
      ]);
      expect(await graphService.getConnectedArtifacts('PRD-0002')).toEqual([]);
    });
  });

  describe('detectCycles', () => {
    it('should find no cycles in a clean lineage', async () => {
      expect(await graphService.detectCycles()).toEqual([]);
    });

    it('should report a supersession loop', async () => {
      await fileStore.save(makeADR({ id: 'ADR-0002', references: [ref('ADR-0003', 'supersedes')] }));
      await fileStore.save(makeADR({ id: 'ADR-0003', references: [ref('ADR-0002', 'supersedes')] }));

      expect(await graphService.detectCycles()).toEqual([
        { cycle: ['ADR-0002', 'ADR-0003', 'ADR-0002'], severity: 'warning' }
      ]);
    });
  });
});
