// YAML frontmatter parser for Markdown artifacts

import * as yaml from 'yaml';
import { SerializationError } from '../../core/errors.js';

/**
 * Result of splitting a Markdown file into frontmatter and body
 */
export interface ParseResult {
  /** Raw frontmatter, not yet validated */
  data: Record<string, unknown>;
  content: string;
}

/**
 * Parses YAML frontmatter from a Markdown string.
 *
 * Frontmatter must be delimited by `---` lines at the start and end.
 *
 * @throws SerializationError if frontmatter is missing or malformed
 */
export function parseFrontmatter(input: string): ParseResult {
  const lines = input.split(/\r?\n/);

  if (lines.length === 0 || lines[0].trimEnd() !== '---') {
    throw new SerializationError('Missing opening frontmatter delimiter (---)', 1);
  }

  let closingIndex = -1;
  for (let i = 1; i < lines.length; i++) {
    if (lines[i].trimEnd() === '---') {
      closingIndex = i;
      break;
    }
  }

  if (closingIndex === -1) {
    throw new SerializationError('Missing closing frontmatter delimiter (---)', lines.length);
  }

  const yamlContent = lines.slice(1, closingIndex).join('\n');

  let parsed: unknown;
  try {
    parsed = yaml.parse(yamlContent);
  } catch (err) {
    if (err instanceof yaml.YAMLParseError) {
      // linePos is relative to the YAML block; +1 for the opening delimiter
      const line = (err.linePos?.[0]?.line ?? 1) + 1;
      throw new SerializationError(`YAML parse error: ${err.message}`, line);
    }
    throw new SerializationError(`YAML parse error: ${String(err)}`, 2);
  }

  if (parsed === null || parsed === undefined) {
    parsed = {};
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new SerializationError('Frontmatter must be a YAML mapping', 2);
  }

  const data: Record<string, unknown> = { ...parsed };
  const content = lines.slice(closingIndex + 1).join('\n').trim();

  return { data, content };
}

/**
 * Splits Markdown content into sections by `##` headers
 */
export function parseSections(content: string): Record<string, string> {
  const sections: Record<string, string> = {};
  const lines = content.split(/\r?\n/);

  let currentSection = '';
  let currentContent: string[] = [];

  for (const line of lines) {
    const h2Match = line.match(/^## (.+)$/);
    if (h2Match) {
      if (currentSection) {
        sections[currentSection] = currentContent.join('\n').trim();
      }
      currentSection = h2Match[1].trim();
      currentContent = [];
    } else if (currentSection) {
      currentContent.push(line);
    }
  }

  if (currentSection) {
    sections[currentSection] = currentContent.join('\n').trim();
  }

  return sections;
}

/**
 * Parses a bullet list section (lines starting with -)
 */
export function parseListSection(content: string | undefined): string[] {
  if (!content) return [];

  return content
    .split(/\r?\n/)
    .filter(line => line.trim().startsWith('-'))
    .map(line => line.trim().replace(/^-\s*/, ''))
    .filter(item => item.length > 0);
}
