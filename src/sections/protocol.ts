/**
 * Section-addressable text protocol.
 *
 * A document is cut into line-aligned chunks, each rendered between a start
 * marker carrying its id and a fixed end marker:
 *
 *   ###SECTION:section1###
 *   first chunk
 *   ###ENDSECTION###
 *
 * Markers only count when they make up a whole line (surrounding whitespace
 * ignored). Every transform here is pure; callers own the document text.
 */

import { logger } from '../utils';

export const SECTION_END = '###ENDSECTION###';
export const DEFAULT_MAX_CHUNK_SIZE = 400;

const START_PATTERN = /^###SECTION:(\S+)###$/;
const VALID_ID = /^[^#\s]+$/;
const LINE_PATTERN = /[^\r\n]*(?:\r\n|\r|\n)|[^\r\n]+$/g;
const TRAILING_ENDING = /(?:\r\n|\r|\n)$/;

export interface Section {
  id: string;
  content: string;
}

export interface ParsedSection extends Section {
  /** Index of the start marker in `lines`. */
  startLine: number;
  /** Index of the end marker in `lines`. */
  endLine: number;
}

export interface ParsedDocument {
  sections: ParsedSection[];
  /** Every input line, line endings kept. */
  lines: string[];
}

export interface UpdateResult {
  text: string;
  /** False when the target did not exist and a section was appended instead. */
  found: boolean;
}

export function sectionStart(id: string): string {
  return `###SECTION:${id}###`;
}

export function isValidSectionId(id: string): boolean {
  return VALID_ID.test(id);
}

function linesWithEndings(text: string): string[] {
  return text.match(LINE_PATTERN) ?? [];
}

function stripLineEnding(line: string): string {
  return line.replace(TRAILING_ENDING, '');
}

function startMarkerId(line: string): string | undefined {
  return START_PATTERN.exec(line.trim())?.[1];
}

function isEndMarker(line: string): boolean {
  return line.trim() === SECTION_END;
}

function isMarker(line: string): boolean {
  return isEndMarker(line) || startMarkerId(line) !== undefined;
}

export function splitLines(text: string): string[] {
  return linesWithEndings(text).map(stripLineEnding);
}

export function hasMarkers(text: string): boolean {
  return splitLines(text).some(isMarker);
}

/**
 * Group lines into chunks whose summed line lengths (newlines excluded) stay
 * within `maxChunkSize`. A single line longer than the limit is a chunk of its
 * own; lines are never split.
 */
export function chunkLines(text: string, maxChunkSize: number = DEFAULT_MAX_CHUNK_SIZE): string[] {
  const chunks: string[] = [];
  let current: string[] = [];
  let size = 0;

  for (const line of splitLines(text)) {
    if (current.length > 0 && size + line.length > maxChunkSize) {
      chunks.push(current.join('\n'));
      current = [];
      size = 0;
    }
    current.push(line);
    size += line.length;
  }
  if (current.length > 0) {
    chunks.push(current.join('\n'));
  }
  return chunks;
}

export function render(sections: readonly Section[]): string {
  if (sections.length === 0) return '';
  return (
    sections.map(({ id, content }) => `${sectionStart(id)}\n${content}\n${SECTION_END}`).join('\n') +
    '\n'
  );
}

export function unwrap(text: string): string {
  return splitLines(text)
    .filter(line => !isMarker(line))
    .join('\n');
}

export function wrap(text: string, maxChunkSize: number = DEFAULT_MAX_CHUNK_SIZE): string {
  let plain = text;
  if (hasMarkers(plain)) {
    logger.warn('Input already carries section markers; unwrapping before re-wrapping');
    plain = unwrap(plain);
  }
  return render(
    chunkLines(plain, maxChunkSize).map((content, i) => ({ id: `section${i + 1}`, content }))
  );
}

/**
 * Scan a marked document. A section left open at end of input, or interrupted
 * by another start marker, is dropped.
 */
export function parse(text: string): ParsedDocument {
  const lines = linesWithEndings(text);
  const sections: ParsedSection[] = [];

  let i = 0;
  while (i < lines.length) {
    const id = startMarkerId(lines[i]);
    if (id === undefined) {
      i++;
      continue;
    }

    let j = i + 1;
    let closed = false;
    while (j < lines.length) {
      if (isEndMarker(lines[j])) {
        closed = true;
        break;
      }
      if (startMarkerId(lines[j]) !== undefined) break;
      j++;
    }

    if (!closed) {
      i = j;
      continue;
    }

    const content = lines.slice(i + 1, j).join('').replace(TRAILING_ENDING, '');
    sections.push({ id, content, startLine: i, endLine: j });
    i = j + 1;
  }

  return { sections, lines };
}

export function sections(text: string): Section[] {
  return parse(text).sections.map(({ id, content }) => ({ id, content }));
}

export function index(text: string): string[] {
  return parse(text).sections.map(s => s.id);
}

function nextSectionId(used: ReadonlySet<string>): string {
  let n = used.size + 1;
  while (used.has(`section${n}`)) n++;
  return `section${n}`;
}

/**
 * Replace the body of `targetId`. A missing target is not an error: the body
 * is appended as a new section, named `targetId` when that is a usable id and
 * the next free `sectionN` otherwise.
 */
export function update(text: string, targetId: string, newBody: string): UpdateResult {
  const { sections: parsed, lines } = parse(text);
  const body = newBody.replace(TRAILING_ENDING, '');
  const target = parsed.find(s => s.id === targetId);

  if (target) {
    const before = lines.slice(0, target.startLine + 1);
    const after = lines.slice(target.endLine);
    return { text: [...before, `${body}\n`, ...after].join(''), found: true };
  }

  const used = new Set(parsed.map(s => s.id));
  const id = isValidSectionId(targetId) && !used.has(targetId) ? targetId : nextSectionId(used);
  const base = text === '' || TRAILING_ENDING.test(text) ? text : `${text}\n`;
  return { text: base + render([{ id, content: body }]), found: false };
}

/**
 * Re-render sections in `newOrder`. Ids not named there keep their relative
 * order after the named ones; unknown ids are ignored. Text outside any
 * section is not carried over.
 */
export function reorder(text: string, newOrder: readonly string[]): string {
  const all = sections(text);
  const byId = new Map(all.map(s => [s.id, s]));
  const placed = new Set<string>();
  const ordered: Section[] = [];

  const place = (section: Section | undefined): void => {
    if (!section || placed.has(section.id)) return;
    placed.add(section.id);
    ordered.push(section);
  };

  for (const id of newOrder) place(byId.get(id));
  for (const section of all) place(section);

  return render(ordered);
}
