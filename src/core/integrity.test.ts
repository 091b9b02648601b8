// Integrity tests

import { describe, it, expect } from 'vitest';
import {
  computeChecksum,
  seal,
  verifyIntegrity
} from './integrity.js';
import { makePRD, makeRFC, ref } from '../testing/fixtures.js';

describe('Integrity', () => {
  describe('computeChecksum', () => {
    it('should compute consistent checksum for same artifact', () => {
      const artifact = makePRD();
      expect(computeChecksum(artifact)).toBe(computeChecksum(artifact));
    });

    it('should produce different checksum for different content', () => {
      expect(computeChecksum(makePRD({ title: 'Title A' }))).not.toBe(computeChecksum(makePRD({ title: 'Title B' })));
      expect(computeChecksum(makePRD({ goals: ['One'] }))).not.toBe(computeChecksum(makePRD({ goals: ['Two'] })));
    });

    it('should ignore edit timestamps, status and links', () => {
      const sealed = makePRD({ status: 'approved' });
      const later = makePRD({
        status: 'superseded',
        updatedAt: new Date('2025-12-31'),
        supersededBy: 'PRD-0002',
        references: [ref('PRD-0002', 'relates-to')]
      });
      expect(computeChecksum(sealed)).toBe(computeChecksum(later));
    });

    it('should handle tag order consistently', () => {
      expect(computeChecksum(makePRD({ tags: ['a', 'b', 'c'] }))).toBe(computeChecksum(makePRD({ tags: ['c', 'a', 'b'] })));
    });

    it('should return 64-character hex string', () => {
      expect(computeChecksum(makePRD())).toMatch(/^[a-f0-9]{64}$/);
    });
  });

  describe('seal', () => {
    it('should record the checksum and seal time without touching the original', () => {
      const artifact = makePRD({ status: 'approved' });
      const sealedAt = new Date('2025-03-05T00:00:00.000Z');
      const sealed = seal(artifact, sealedAt);

      expect(sealed.checksum).toBe(computeChecksum(artifact));
      expect(sealed.sealedAt).toEqual(sealedAt);
      expect(artifact.checksum).toBeUndefined();
    });
  });

  describe('verifyIntegrity', () => {
    it('should treat unsealed artifacts as valid', () => {
      expect(verifyIntegrity(makePRD())).toEqual({ valid: true });
    });

    it('should return valid for an unmodified sealed artifact', () => {
      expect(verifyIntegrity(seal(makeRFC({ status: 'approved' }))).valid).toBe(true);
    });

    it('should detect content modified after sealing', () => {
      const sealed = seal(makePRD({ status: 'approved' }));
      sealed.title = 'Modified Title';

      expect(verifyIntegrity(sealed)).toEqual({
        valid: false,
        reason: 'Checksum mismatch: PRD-0001 was modified after it was sealed'
      });
    });
  });
});
