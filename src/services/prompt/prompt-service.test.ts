/**
 * Tests for the interactive prompt service
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fc from 'fast-check';
import {
  PromptService,
  InteractiveError,
  parseTags,
  titleSimilarity
} from './prompt-service.js';

vi.mock('inquirer', () => ({
  default: {
    prompt: vi.fn()
  }
}));

vi.mock('simple-git', () => ({
  simpleGit: vi.fn(() => ({
    getConfig: vi.fn()
  }))
}));

import inquirer from 'inquirer';
import { simpleGit } from 'simple-git';

function setTTY(value: boolean | undefined): void {
  Object.defineProperty(process.stdin, 'isTTY', {
    value,
    writable: true,
    configurable: true
  });
}

function mockGitConfig(...values: Array<string | null>): void {
  const getConfig = vi.fn();
  for (const value of values) {
    getConfig.mockResolvedValueOnce({ value });
  }
  vi.mocked(simpleGit).mockReturnValue({ getConfig } as unknown as ReturnType<typeof simpleGit>);
}

describe('PromptService', () => {
  let service: PromptService;
  let originalIsTTY: boolean | undefined;

  beforeEach(() => {
    vi.clearAllMocks();
    service = new PromptService();
    originalIsTTY = process.stdin.isTTY;
  });

  afterEach(() => {
    setTTY(originalIsTTY);
  });

  describe('isInteractive', () => {
    it('should follow stdin.isTTY', () => {
      setTTY(true);
      expect(service.isInteractive()).toBe(true);
      setTTY(false);
      expect(service.isInteractive()).toBe(false);
      setTTY(undefined);
      expect(service.isInteractive()).toBe(false);
    });
  });

  describe('getMissingRequiredFields', () => {
    it('should require title and owner for every type', () => {
      expect(service.getMissingRequiredFields('adr', {})).toEqual(['title', 'owner']);
      expect(service.getMissingRequiredFields('adr', { title: 'T', owner: '  ' })).toEqual(['owner']);
    });

    it('should also require a severity for post-mortems', () => {
      expect(service.getMissingRequiredFields('postmortem', { title: 'T', owner: 'o' })).toEqual(['severity']);
    });
  });

  describe('promptForMissingFields', () => {
    it('should return provided fields without prompting', async () => {
      const result = await service.promptForMissingFields('prd', { title: 'Checkout', owner: 'alice' });

      expect(result).toEqual({ title: 'Checkout', owner: 'alice', tags: [], severity: undefined });
      expect(inquirer.prompt).not.toHaveBeenCalled();
    });

    it('should throw InteractiveError without a TTY', async () => {
      setTTY(false);
      await expect(service.promptForMissingFields('prd', { title: 'Checkout' }))
        .rejects.toThrow(InteractiveError);
      await expect(service.promptForMissingFields('prd', { title: 'Checkout' }))
        .rejects.toThrow('Missing required fields: owner');
    });

    it('should merge prompted answers with provided fields', async () => {
      setTTY(true);
      mockGitConfig('Git User');
      vi.mocked(inquirer.prompt).mockResolvedValueOnce({ title: ' New feature ', owner: 'Git User', tags: 'a, b,,c' });

      const result = await service.promptForMissingFields('prd', {});

      expect(result).toEqual({ title: 'New feature', owner: 'Git User', tags: ['a', 'b', 'c'], severity: undefined });
    });

    it('should offer the git user as the owner default', async () => {
      setTTY(true);
      mockGitConfig('Git User');
      vi.mocked(inquirer.prompt).mockResolvedValueOnce({ owner: 'Git User' });

      await service.promptForMissingFields('prd', { title: 'Checkout', tags: [] });

      const questions = vi.mocked(inquirer.prompt).mock.calls[0][0] as unknown as Array<{ name: string; default?: string; when?: boolean }>;
      const owner = questions.find(q => q.name === 'owner');
      expect(owner?.default).toBe('Git User');
      expect(owner?.when).toBe(true);
      expect(questions.find(q => q.name === 'title')?.when).toBe(false);
    });

    it('should ask for the severity of a post-mortem', async () => {
      setTTY(true);
      vi.mocked(inquirer.prompt).mockResolvedValueOnce({ severity: 'sev2' });

      const result = await service.promptForMissingFields('postmortem', { title: 'Outage', owner: 'sre' });

      expect(result.severity).toBe('sev2');
    });
  });

  describe('getGitUserName', () => {
    it('should return user.name', async () => {
      mockGitConfig('John Doe');
      expect(await service.getGitUserName()).toBe('John Doe');
    });

    it('should fall back to user.email', async () => {
      mockGitConfig('', 'john@example.com');
      expect(await service.getGitUserName()).toBe('john@example.com');
    });

    it('should return undefined when neither is set', async () => {
      mockGitConfig(null, null);
      expect(await service.getGitUserName()).toBeUndefined();
    });

    it('should return undefined when git fails', async () => {
      const getConfig = vi.fn().mockRejectedValue(new Error('git not found'));
      vi.mocked(simpleGit).mockReturnValue({ getConfig } as unknown as ReturnType<typeof simpleGit>);
      expect(await service.getGitUserName()).toBeUndefined();
    });
  });

  describe('promptForLinkType', () => {
    it('should refuse without a TTY', async () => {
      setTTY(false);
      await expect(service.promptForLinkType()).rejects.toThrow(InteractiveError);
    });

    it('should return the chosen link type', async () => {
      setTTY(true);
      vi.mocked(inquirer.prompt).mockResolvedValueOnce({ linkType: 'traces-to' });
      expect(await service.promptForLinkType()).toBe('traces-to');
    });
  });

  describe('promptForConfirmation', () => {
    it('should answer no without a TTY', async () => {
      setTTY(false);
      expect(await service.promptForConfirmation('Delete?')).toBe(false);
      expect(inquirer.prompt).not.toHaveBeenCalled();
    });

    it('should return the answer with a TTY', async () => {
      setTTY(true);
      vi.mocked(inquirer.prompt).mockResolvedValueOnce({ confirmed: true });
      expect(await service.promptForConfirmation('Delete?')).toBe(true);
    });
  });

  describe('getTagSuggestions', () => {
    it('should rank tags by frequency', () => {
      const suggestions = service.getTagSuggestions([
        { tags: ['payments', 'api'] },
        { tags: ['Payments'] },
        { tags: ['infra', 'api', 'payments'] }
      ]);
      expect(suggestions).toEqual(['payments', 'api', 'infra']);
    });

    it('should honor the limit', () => {
      expect(service.getTagSuggestions([{ tags: ['a', 'b', 'c'] }], 2)).toEqual(['a', 'b']);
    });
  });

  describe('validateTitleUniqueness', () => {
    const existing = [
      { id: 'PRD-0001', title: 'Checkout redesign' },
      { id: 'PRD-0002', title: 'Search ranking' }
    ];

    it('should flag exact matches ignoring case', () => {
      const result = service.validateTitleUniqueness('checkout REDESIGN', existing);
      expect(result).toEqual({
        isUnique: false,
        duplicates: [{ id: 'PRD-0001', title: 'Checkout redesign', matchType: 'exact' }]
      });
    });

    it('should flag near matches', () => {
      const result = service.validateTitleUniqueness('Checkout redesigns', existing);
      expect(result.duplicates.map(d => d.matchType)).toEqual(['fuzzy']);
    });

    it('should accept distinct titles', () => {
      expect(service.validateTitleUniqueness('Billing export', existing).isUnique).toBe(true);
    });
  });
});

describe('parseTags', () => {
  it('should split and trim comma-separated input', () => {
    expect(parseTags(' a ,b,, c ')).toEqual(['a', 'b', 'c']);
    expect(parseTags(undefined)).toEqual([]);
  });
});

describe('titleSimilarity', () => {
  it('should be 1 for identical strings and symmetric', () => {
    fc.assert(
      fc.property(fc.string(), fc.string(), (a, b) => {
        expect(titleSimilarity(a, a)).toBe(1);
        expect(titleSimilarity(a, b)).toBeCloseTo(titleSimilarity(b, a));
        const s = titleSimilarity(a, b);
        return s >= 0 && s <= 1;
      })
    );
  });
});
