import { MalformedEditError } from '../utils';
import { update } from './protocol';

/**
 * One edit instruction lifted from a completion response. An empty target
 * replaces the whole document.
 */
export interface PatchBlock {
  target: string;
  body: string;
}

const FENCE = '```';
const BLOCK_PATTERN = /```(\S*)\n([\s\S]*?)\n```/g;

export function hasFence(text: string): boolean {
  return text.includes(FENCE);
}

export function extractPatchBlocks(text: string): PatchBlock[] {
  const blocks: PatchBlock[] = [];
  for (const match of text.matchAll(BLOCK_PATTERN)) {
    blocks.push({ target: match[1].trim(), body: match[2].trim() });
  }
  return blocks;
}

/**
 * Apply blocks in order. The first whole-document block wins outright and the
 * rest of the set is never looked at; otherwise each block updates (or
 * appends) its target and a later block on the same target overwrites an
 * earlier one.
 */
export function applyPatchSet(text: string, blocks: readonly PatchBlock[]): string {
  if (blocks.length === 0) {
    throw new MalformedEditError('Patch set contains no fenced blocks');
  }

  const whole = blocks.find(block => block.target === '');
  if (whole) return whole.body;

  let result = text;
  for (const block of blocks) {
    result = update(result, block.target, block.body).text;
  }
  return result;
}

/**
 * Extract and apply in one step. Throws MalformedEditError when the response
 * holds no parsable block.
 */
export function applyResponse(text: string, response: string): string {
  const blocks = extractPatchBlocks(response);
  if (blocks.length === 0) {
    throw new MalformedEditError('Response opened a fence but no patch block could be parsed', {
      preview: response.slice(0, 200),
    });
  }
  return applyPatchSet(text, blocks);
}
