// Tests for git lifecycle tags

import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('simple-git', () => ({
  simpleGit: vi.fn()
}));

import { simpleGit } from 'simple-git';
import { GitTagService } from './git-tag-service.js';

interface FakeGit {
  checkIsRepo: ReturnType<typeof vi.fn>;
  tags: ReturnType<typeof vi.fn>;
  addAnnotatedTag: ReturnType<typeof vi.fn>;
}

function installFakeGit(overrides: Partial<FakeGit> = {}): FakeGit {
  const git: FakeGit = {
    checkIsRepo: vi.fn().mockResolvedValue(true),
    tags: vi.fn().mockResolvedValue({ all: [] }),
    addAnnotatedTag: vi.fn().mockResolvedValue({ name: 'ignored' }),
    ...overrides
  };
  vi.mocked(simpleGit).mockReturnValue(git as unknown as ReturnType<typeof simpleGit>);
  return git;
}

describe('GitTagService', () => {
  const options = { enabled: true, tagPrefix: 'air' };

  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
  });

  it('should build tag names from prefix, ID and status', () => {
    expect(GitTagService.tagName('air', 'ADR-0001', 'accepted')).toBe('air/ADR-0001/accepted');
  });

  it('should do nothing when tagging is disabled', async () => {
    const git = installFakeGit();
    const service = new GitTagService('.');

    expect(await service.tagLifecycle('ADR-0001', 'accepted', { ...options, enabled: false })).toBeNull();
    expect(git.checkIsRepo).not.toHaveBeenCalled();
  });

  it('should create an annotated tag', async () => {
    const git = installFakeGit();
    const service = new GitTagService('.');

    const name = await service.tagLifecycle('ADR-0001', 'accepted', options);

    expect(name).toBe('air/ADR-0001/accepted');
    expect(git.addAnnotatedTag).toHaveBeenCalledWith('air/ADR-0001/accepted', 'ADR-0001 accepted');
  });

  it('should not recreate an existing tag', async () => {
    const git = installFakeGit({ tags: vi.fn().mockResolvedValue({ all: ['air/PRD-0001/approved'] }) });
    const service = new GitTagService('.');

    expect(await service.tagLifecycle('PRD-0001', 'approved', options)).toBe('air/PRD-0001/approved');
    expect(git.addAnnotatedTag).not.toHaveBeenCalled();
  });

  it('should skip tagging outside a repository', async () => {
    const git = installFakeGit({ checkIsRepo: vi.fn().mockResolvedValue(false) });
    const service = new GitTagService('.');

    expect(await service.tagLifecycle('PRD-0001', 'approved', options)).toBeNull();
    expect(git.addAnnotatedTag).not.toHaveBeenCalled();
  });

  it('should log and continue when git refuses the tag', async () => {
    installFakeGit({ addAnnotatedTag: vi.fn().mockRejectedValue(new Error('no HEAD')) });
    const service = new GitTagService('.');

    expect(await service.tagLifecycle('PRD-0001', 'approved', options)).toBeNull();
    expect(console.warn).toHaveBeenCalledWith('[air] [WARN] Could not create tag air/PRD-0001/approved: no HEAD');
  });

  it('should report no repository when git is missing', async () => {
    installFakeGit({ checkIsRepo: vi.fn().mockRejectedValue(new Error('spawn git ENOENT')) });
    const service = new GitTagService('.');

    expect(await service.isGitRepository()).toBe(false);
  });
});
