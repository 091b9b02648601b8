/**
 * Interactive Prompt Service
 *
 * Asks for missing artifact fields when stdin is a TTY, with the owner
 * defaulting to the git user, and refuses to prompt otherwise.
 */

import inquirer from 'inquirer';
import { simpleGit, SimpleGit } from 'simple-git';
import { ArtifactType, Severity, SEVERITIES, LinkType } from '../../models/types.js';
import { TrackerError } from '../../core/errors.js';
import { logger } from '../../core/logger.js';

/**
 * Fields a user may be asked for when creating an artifact
 */
export interface CreateFields {
  title: string;
  owner: string;
  tags: string[];
  severity?: Severity;
}

/**
 * Raised when a field is missing and there is no terminal to ask on
 */
export class InteractiveError extends TrackerError {
  readonly code = 'INTERACTIVE_ERROR';
  readonly exitCode = 2;

  constructor(public readonly missingFields: string[]) {
    super(
      `Interactive mode required but terminal does not support TTY input.\n` +
      `Missing required fields: ${missingFields.join(', ')}\n` +
      `Please provide these fields via command line flags.`,
      { missingFields }
    );
  }
}

/**
 * An existing artifact whose title is the same as or close to a new one
 */
export interface TitleDuplicate {
  id: string;
  title: string;
  matchType: 'exact' | 'fuzzy';
  similarity?: number;
}

export interface TitleValidationResult {
  isUnique: boolean;
  duplicates: TitleDuplicate[];
}

type RequiredField = 'title' | 'owner' | 'severity';

export const REQUIRED_FIELDS: Record<ArtifactType, readonly RequiredField[]> = {
  prd: ['title', 'owner'],
  daa: ['title', 'owner'],
  tip: ['title', 'owner'],
  rfc: ['title', 'owner'],
  adr: ['title', 'owner'],
  bolt: ['title', 'owner'],
  postmortem: ['title', 'owner', 'severity']
};

/** Links a user may create by hand */
const MANUAL_LINK_TYPES: readonly { name: string; value: LinkType }[] = [
  { name: 'Relates to - General relationship', value: 'relates-to' },
  { name: 'Traces to - Post-mortem traces to an ADR, Bolt or PRD', value: 'traces-to' },
  { name: 'Derives from - Attach a missing lineage parent', value: 'derives-from' }
];

interface CreateAnswers {
  title: string;
  owner: string;
  tags: string;
  severity: Severity;
}

function requireValue(label: string): (input: string) => boolean | string {
  return (input: string) => (input && input.trim() !== '' ? true : `${label} is required`);
}

/**
 * Splits comma-separated tag input
 */
export function parseTags(input: string | undefined): string[] {
  if (!input) return [];
  return input
    .split(',')
    .map(tag => tag.trim())
    .filter(tag => tag.length > 0);
}

/**
 * Edit distance between two strings (single-row dynamic programming)
 */
function levenshtein(a: string, b: string): number {
  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(previous[j] + 1, current[j - 1] + 1, previous[j - 1] + cost);
    }
    previous = current;
  }
  return previous[b.length];
}

/**
 * Similarity in [0, 1], 1 meaning identical
 */
export function titleSimilarity(a: string, b: string): number {
  const maxLen = Math.max(a.length, b.length);
  if (maxLen === 0) return 1;
  return 1 - levenshtein(a, b) / maxLen;
}

export class PromptService {
  private readonly basePath?: string;
  private git: SimpleGit | null = null;

  constructor(basePath?: string) {
    this.basePath = basePath;
  }

  private getGit(): SimpleGit {
    if (!this.git) {
      this.git = simpleGit(this.basePath);
    }
    return this.git;
  }

  isInteractive(): boolean {
    return process.stdin.isTTY === true;
  }

  /**
   * Global git user.name, falling back to user.email
   */
  async getGitUserName(): Promise<string | undefined> {
    try {
      const git = this.getGit();
      const userName = await git.getConfig('user.name', 'global');
      if (userName.value && userName.value.trim()) {
        return userName.value.trim();
      }

      const userEmail = await git.getConfig('user.email', 'global');
      if (userEmail.value && userEmail.value.trim()) {
        return userEmail.value.trim();
      }

      return undefined;
    } catch (error) {
      logger.debug('git config unavailable', { error: String(error) });
      return undefined;
    }
  }

  /**
   * Most frequent tags across the given artifacts
   */
  getTagSuggestions(artifacts: ReadonlyArray<{ tags: string[] }>, limit: number = 10): string[] {
    const counts = new Map<string, number>();
    for (const artifact of artifacts) {
      for (const tag of artifact.tags) {
        const normalized = tag.trim().toLowerCase();
        if (normalized) {
          counts.set(normalized, (counts.get(normalized) ?? 0) + 1);
        }
      }
    }
    return [...counts.entries()]
      .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
      .map(([tag]) => tag)
      .slice(0, limit);
  }

  /**
   * Finds existing artifacts with the same or a very similar title (80%+)
   */
  validateTitleUniqueness(
    title: string,
    existing: ReadonlyArray<{ title: string; id: string }>
  ): TitleValidationResult {
    const normalized = title.trim().toLowerCase();
    if (!normalized) {
      return { isUnique: true, duplicates: [] };
    }

    const duplicates: TitleDuplicate[] = [];
    for (const artifact of existing) {
      const other = artifact.title.trim().toLowerCase();
      if (other === normalized) {
        duplicates.push({ id: artifact.id, title: artifact.title, matchType: 'exact' });
        continue;
      }
      const similarity = titleSimilarity(normalized, other);
      if (similarity >= 0.8) {
        duplicates.push({ id: artifact.id, title: artifact.title, matchType: 'fuzzy', similarity });
      }
    }

    return { isUnique: duplicates.length === 0, duplicates };
  }

  getMissingRequiredFields(artifactType: ArtifactType, provided: Partial<CreateFields>): RequiredField[] {
    return REQUIRED_FIELDS[artifactType].filter(field => {
      const value = provided[field];
      return value === undefined || value.trim() === '';
    });
  }

  /**
   * Fills in missing creation fields, prompting when possible
   *
   * @throws InteractiveError if fields are missing and stdin is not a TTY
   */
  async promptForMissingFields(
    artifactType: ArtifactType,
    provided: Partial<CreateFields>,
    suggestedTags: string[] = []
  ): Promise<CreateFields> {
    const missing = this.getMissingRequiredFields(artifactType, provided);

    if (missing.length === 0) {
      return {
        title: provided.title ?? '',
        owner: provided.owner ?? '',
        tags: provided.tags ?? [],
        severity: provided.severity
      };
    }

    if (!this.isInteractive()) {
      throw new InteractiveError(missing);
    }

    const ownerDefault = missing.includes('owner') ? await this.getGitUserName() : undefined;

    const answers = await inquirer.prompt<CreateAnswers>([
      {
        type: 'input',
        name: 'title',
        message: 'Title:',
        when: missing.includes('title'),
        validate: requireValue('Title')
      },
      {
        type: 'input',
        name: 'owner',
        message: 'Owner:',
        default: ownerDefault,
        when: missing.includes('owner'),
        validate: requireValue('Owner')
      },
      {
        type: 'input',
        name: 'tags',
        message: 'Tags (comma-separated):',
        default: suggestedTags.length > 0 ? suggestedTags.join(', ') : undefined,
        when: missing.includes('title') && provided.tags === undefined
      },
      {
        type: 'list',
        name: 'severity',
        message: 'Severity:',
        choices: [...SEVERITIES],
        when: missing.includes('severity')
      }
    ]);

    return {
      title: (provided.title || answers.title || '').trim(),
      owner: (provided.owner || answers.owner || '').trim(),
      tags: provided.tags ?? parseTags(answers.tags),
      severity: provided.severity ?? answers.severity
    };
  }

  /**
   * Asks which kind of link to create
   */
  async promptForLinkType(): Promise<LinkType> {
    if (!this.isInteractive()) {
      throw new InteractiveError(['type']);
    }

    const { linkType } = await inquirer.prompt<{ linkType: LinkType }>([
      {
        type: 'list',
        name: 'linkType',
        message: 'Select relationship type:',
        choices: [...MANUAL_LINK_TYPES],
        default: 'relates-to'
      }
    ]);

    return linkType;
  }

  /**
   * Yes/no confirmation; always "no" without a terminal
   */
  async promptForConfirmation(message: string): Promise<boolean> {
    if (!this.isInteractive()) {
      return false;
    }

    const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
      {
        type: 'confirm',
        name: 'confirmed',
        message,
        default: false
      }
    ]);

    return confirmed;
  }
}
