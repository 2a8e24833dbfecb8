export {
  SECTION_END,
  DEFAULT_MAX_CHUNK_SIZE,
  sectionStart,
  isValidSectionId,
  splitLines,
  hasMarkers,
  chunkLines,
  render,
  wrap,
  unwrap,
  parse,
  sections,
  index,
  update,
  reorder,
} from './protocol';
export type { Section, ParsedSection, ParsedDocument, UpdateResult } from './protocol';
export { hasFence, extractPatchBlocks, applyPatchSet, applyResponse } from './patch-blocks';
export type { PatchBlock } from './patch-blocks';
