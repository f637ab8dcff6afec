/**
 * Markdown Chunker
 *
 * Splits generated wiki pages into heading-aware, token-bounded chunks for
 * embedding. Stage 1 cuts at ATX headings outside fenced code. Stage 2
 * recursively splits any section over the token budget on paragraph, line,
 * sentence and word boundaries, prepends token overlap from the previous
 * piece and folds undersized pieces into their neighbours.
 *
 * Offsets of stage-2 chunks are approximate: overlap text is duplicated from
 * the previous chunk, so such a chunk cannot be found verbatim in the page
 * and falls back to the running cursor position. Offsets are UTF-16 string
 * indices into the original page.
 */

import { getEncoding } from 'js-tiktoken';

export interface Tokenizer {
  encode(text: string): number[];
  decode(tokens: number[]): string;
}

export interface ChunkResult {
  content: string;
  /** Titles from the outermost enclosing heading down to the nearest one */
  headingPath: string[];
  /** 0 when no heading encloses the chunk */
  headingLevel: number;
  tokenCount: number;
  startChar: number;
  endChar: number;
  hasCode: boolean;
}

export interface ChunkOptions {
  maxTokens?: number;
  overlapTokens?: number;
  minTokens?: number;
  tokenizer?: Tokenizer;
}

interface Section {
  content: string;
  headingPath: string[];
  headingLevel: number;
  startChar: number;
}

const FENCE_RE = /^```/gm;
const HEADING_RE = /^(#{1,6})[ \t]+(.*)$/gm;

export const RECURSIVE_SEPARATORS: readonly string[] = ['\n\n', '\n', '. ', ' '];

let defaultTokenizer: Tokenizer | null = null;

/**
 * cl100k_base BPE, created on first use. Special-token text is encoded as
 * ordinary text so pages that mention such markers still chunk.
 */
export function getDefaultTokenizer(): Tokenizer {
  if (!defaultTokenizer) {
    const encoding = getEncoding('cl100k_base');
    defaultTokenizer = {
      encode: (text) => encoding.encode(text, [], []),
      decode: (tokens) => encoding.decode(tokens),
    };
  }
  return defaultTokenizer;
}

export function countTokens(text: string, tokenizer: Tokenizer = getDefaultTokenizer()): number {
  return tokenizer.encode(text).length;
}

export function containsCodeFence(text: string): boolean {
  return new RegExp(FENCE_RE.source, 'm').test(text);
}

/**
 * [start, end) spans covered by fenced code. An unpaired trailing fence runs
 * to the end of the document.
 */
export function findCodeRegions(content: string): Array<[number, number]> {
  const fences = [...content.matchAll(FENCE_RE)].map((m) => ({ start: m.index ?? 0, end: (m.index ?? 0) + m[0].length }));
  const regions: Array<[number, number]> = [];

  for (let i = 0; i + 1 < fences.length; i += 2) {
    regions.push([fences[i].start, fences[i + 1].end]);
  }
  if (fences.length % 2 === 1) {
    regions.push([fences[fences.length - 1].start, content.length]);
  }

  return regions;
}

/**
 * Stage 1: one section per heading, plus a level-0 preamble when there is
 * non-blank text before the first heading.
 */
export function splitByHeadings(content: string): Section[] {
  const codeRegions = findCodeRegions(content);
  const insideCode = (pos: number) => codeRegions.some(([start, end]) => start <= pos && pos < end);

  const headings: Array<{ pos: number; level: number; title: string }> = [];
  for (const match of content.matchAll(HEADING_RE)) {
    const pos = match.index ?? 0;
    if (!insideCode(pos)) {
      headings.push({ pos, level: match[1].length, title: match[2].trim() });
    }
  }

  if (headings.length === 0) {
    return [{ content, headingPath: [], headingLevel: 0, startChar: 0 }];
  }

  const sections: Section[] = [];
  const preamble = content.slice(0, headings[0].pos);
  if (preamble.trim()) {
    sections.push({ content: preamble, headingPath: [], headingLevel: 0, startChar: 0 });
  }

  // A heading at level L replaces the title at L and forgets everything deeper
  const stack = new Map<number, string>();

  headings.forEach((heading, idx) => {
    const end = idx + 1 < headings.length ? headings[idx + 1].pos : content.length;

    stack.set(heading.level, heading.title);
    for (const level of [...stack.keys()]) {
      if (level > heading.level) stack.delete(level);
    }
    const headingPath = [...stack.entries()].sort(([a], [b]) => a - b).map(([, title]) => title);

    sections.push({
      content: content.slice(heading.pos, end),
      headingPath,
      headingLevel: heading.level,
      startChar: heading.pos,
    });
  });

  return sections;
}

/**
 * Stage 2: split on the first separator that actually divides the text,
 * greedily re-merge pieces up to the budget, and recurse into any piece that
 * is still too large. Text no separator can split is returned as-is.
 */
export function recursiveSplit(
  text: string,
  maxTokens: number,
  tokenizer: Tokenizer = getDefaultTokenizer(),
  separators: readonly string[] = RECURSIVE_SEPARATORS
): string[] {
  const fits = (candidate: string) => countTokens(candidate, tokenizer) <= maxTokens;

  if (fits(text) || separators.length === 0) {
    return [text];
  }

  const [separator, ...remaining] = separators;
  const parts = text.split(separator);
  if (parts.length === 1) {
    return recursiveSplit(text, maxTokens, tokenizer, remaining);
  }

  const merged: string[] = [];
  let current = parts[0];
  for (const part of parts.slice(1)) {
    const candidate = current + separator + part;
    if (fits(candidate)) {
      current = candidate;
    } else {
      if (current.trim()) merged.push(current);
      current = part;
    }
  }
  if (current.trim()) merged.push(current);

  return merged.flatMap((piece) => (fits(piece) ? [piece] : recursiveSplit(piece, maxTokens, tokenizer, remaining)));
}

/**
 * Prefix every fragment after the first with the trailing `overlapTokens`
 * tokens of its predecessor (all of them when the predecessor is shorter).
 */
export function applyOverlap(
  fragments: string[],
  overlapTokens: number,
  tokenizer: Tokenizer = getDefaultTokenizer()
): string[] {
  if (overlapTokens <= 0 || fragments.length <= 1) {
    return fragments;
  }

  return fragments.map((fragment, i) => {
    if (i === 0) return fragment;
    const previous = tokenizer.encode(fragments[i - 1]);
    const tail = previous.length > overlapTokens ? previous.slice(-overlapTokens) : previous;
    return tokenizer.decode(tail) + fragment;
  });
}

/**
 * Fold a fragment into the one before it when either is under `minTokens`.
 * Best effort: the last fragment can still end up short.
 */
export function mergeSmallChunks(
  fragments: string[],
  minTokens: number,
  tokenizer: Tokenizer = getDefaultTokenizer()
): string[] {
  if (fragments.length === 0) {
    return fragments;
  }

  const merged = [fragments[0]];
  for (const fragment of fragments.slice(1)) {
    const last = merged.length - 1;
    if (countTokens(merged[last], tokenizer) < minTokens || countTokens(fragment, tokenizer) < minTokens) {
      merged[last] = merged[last] + fragment;
    } else {
      merged.push(fragment);
    }
  }
  return merged;
}

/**
 * Split a markdown page into chunks. Empty or whitespace-only input yields
 * no chunks.
 */
export function chunkMarkdown(content: string, options: ChunkOptions = {}): ChunkResult[] {
  const maxTokens = options.maxTokens ?? 512;
  const overlapTokens = options.overlapTokens ?? 50;
  const minTokens = options.minTokens ?? 50;
  const tokenizer = options.tokenizer ?? getDefaultTokenizer();

  if (!content.trim()) {
    return [];
  }

  const results: ChunkResult[] = [];

  for (const section of splitByHeadings(content)) {
    const sectionTokens = countTokens(section.content, tokenizer);

    if (sectionTokens <= maxTokens) {
      results.push({
        content: section.content,
        headingPath: section.headingPath,
        headingLevel: section.headingLevel,
        tokenCount: sectionTokens,
        startChar: section.startChar,
        endChar: section.startChar + section.content.length,
        hasCode: containsCodeFence(section.content),
      });
      continue;
    }

    let fragments = recursiveSplit(section.content, maxTokens, tokenizer);
    fragments = applyOverlap(fragments, overlapTokens, tokenizer);
    fragments = mergeSmallChunks(fragments, minTokens, tokenizer);

    let cursor = section.startChar;
    for (const fragment of fragments) {
      let start = content.indexOf(fragment, cursor);
      if (start === -1) {
        start = cursor;
      }
      const end = start + fragment.length;

      results.push({
        content: fragment,
        headingPath: [...section.headingPath],
        headingLevel: section.headingLevel,
        tokenCount: countTokens(fragment, tokenizer),
        startChar: start,
        endChar: end,
        hasCode: containsCodeFence(fragment),
      });
      cursor = end;
    }
  }

  return results;
}
