// Serialization exports

export { serialize, serializeSection } from './serializer.js';
export { deserialize } from './deserializer.js';
export { parseFrontmatter, parseSections, parseListSection } from './parser.js';
export type { ParseResult } from './parser.js';
export {
  SECTION_LAYOUTS,
  isPlaceholder,
  isSectionEmpty,
  findSection,
  getSectionValues,
  templateValues,
  withSections
} from './sections.js';
export type { SectionSpec, SectionKind, SectionValue } from './sections.js';
