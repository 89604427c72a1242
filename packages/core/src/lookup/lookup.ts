// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Outline lookup: find the strokes that produce a piece of text.
 *
 * The text is split into tokens (words, numbers, single punctuation marks)
 * and segmented greedily from the longest dictionary phrase down, solving
 * the remainder recursively. Each segment uses its best outline; complete
 * segmentations are returned cheapest first (fewest strokes, then fewest
 * keys). A text with any unreachable token yields no segmentations.
 *
 * Fallbacks per phrase:
 * - single punctuation is also looked up as the command entry `{x}`
 * - capitalised phrases fall back to the lower-case entry after a
 *   capitalise-next stroke
 * - numbers (optionally with currency sign and thousands separators) are
 *   spelled digit by digit
 */

import type { HostDictionary } from "../bridge/host.js";
import { LOG_CONTEXT, type LoggerAdapter } from "../logger.js";

export type Outline = readonly string[];

export interface LookupSegment {
  text: string;
  steno: Outline;
}

export type Segmentation = LookupSegment[];

export interface LookupOptions {
  /**
   * Upper bound on segmentations kept per suffix (default: 1000).
   */
  maxSegmentations?: number;
  logger?: LoggerAdapter;
}

/** Stroke that capitalises the next word */
export const CAPITALIZE_NEXT = "KPA";

const TOKEN_PATTERN =
  /[$€£]?\d+(?:,\d+)*|[\p{L}\p{N}_]+(?:['’][\p{L}\p{N}_]+)*|[^\p{L}\p{N}_\s]/gu;
const ALPHANUMERIC = /^[\p{L}\p{N}]$/u;
const NUMBER_DECORATION = /[$,€£]/g;
const DIGITS = /^\d+$/;

const DEFAULT_MAX_SEGMENTATIONS = 1000;

export function tokenize(text: string): string[] {
  return Array.from(text.matchAll(TOKEN_PATTERN), (match) => match[0]);
}

function keyCount(outline: Outline): number {
  return outline.reduce((total, stroke) => total + stroke.length, 0);
}

function compareOutlines(a: Outline, b: Outline): number {
  const byLength = a.length - b.length || keyCount(a) - keyCount(b);
  if (byLength !== 0) return byLength;
  const [left, right] = [a.join("/"), b.join("/")];
  return left < right ? -1 : left > right ? 1 : 0;
}

function collect(into: Map<string, Outline>, outlines: Iterable<Outline>): void {
  for (const outline of outlines) {
    if (outline.length > 0) into.set(outline.join("/"), outline);
  }
}

/**
 * Shortest outline for each digit, concatenated; undefined when any digit
 * has no entry.
 */
function spellDigits(dictionary: HostDictionary, digits: string): Outline | undefined {
  const strokes: string[] = [];
  for (const digit of digits) {
    const candidates = Array.from(dictionary.reverseLookup(digit)).filter(
      (outline) => outline.length > 0,
    );
    const best = candidates.sort(compareOutlines)[0];
    if (!best) return undefined;
    strokes.push(...best);
  }
  return strokes;
}

/**
 * Every outline for one phrase, best first: direct entries before
 * fallbacks, then by stroke count and key count.
 */
export function outlinesFor(dictionary: HostDictionary, phrase: string): Outline[] {
  const direct = new Map<string, Outline>();
  collect(direct, dictionary.reverseLookup(phrase));
  if (Array.from(phrase).length === 1 && !ALPHANUMERIC.test(phrase)) {
    collect(direct, dictionary.reverseLookup(`{${phrase}}`));
  }

  const fallback = new Map<string, Outline>();
  const lower = phrase.toLowerCase();
  if (lower !== phrase) {
    const capitalised = Array.from(dictionary.reverseLookup(lower), (outline) => [
      CAPITALIZE_NEXT,
      ...outline,
    ]);
    collect(fallback, capitalised);
  }

  const digits = phrase.replace(NUMBER_DECORATION, "");
  if (DIGITS.test(digits)) {
    const spelled = spellDigits(dictionary, digits);
    if (spelled) collect(fallback, [spelled]);
  }

  const ranked = [
    ...Array.from(direct.values(), (outline) => ({ outline, direct: true })),
    ...Array.from(fallback)
      .filter(([key]) => !direct.has(key))
      .map(([, outline]) => ({ outline, direct: false })),
  ];
  ranked.sort(
    (a, b) => Number(b.direct) - Number(a.direct) || compareOutlines(a.outline, b.outline),
  );
  return ranked.map((entry) => entry.outline);
}

function totals(segmentation: Segmentation): [strokes: number, keys: number] {
  let strokes = 0;
  let keys = 0;
  for (const segment of segmentation) {
    strokes += segment.steno.length;
    keys += keyCount(segment.steno);
  }
  return [strokes, keys];
}

/**
 * All complete segmentations of `text`, cheapest first.
 */
export function lookupOutlines(
  dictionary: HostDictionary,
  text: string,
  options: LookupOptions = {},
): Segmentation[] {
  const tokens = tokenize(text);
  if (tokens.length === 0) return [];

  const limit = options.maxSegmentations ?? DEFAULT_MAX_SEGMENTATIONS;
  const longestKey = dictionary.longestKey();
  const memo = new Map<number, Segmentation[]>();

  const solve = (start: number): Segmentation[] => {
    if (start === tokens.length) return [[]];
    const cached = memo.get(start);
    if (cached) return cached;

    const solutions: Segmentation[] = [];
    const maxLength = Math.min(tokens.length - start, longestKey);
    for (let length = maxLength; length > 0 && solutions.length < limit; length--) {
      const phrase = tokens.slice(start, start + length).join(" ");
      const best = outlinesFor(dictionary, phrase)[0];
      if (!best) continue;

      for (const rest of solve(start + length)) {
        solutions.push([{ text: phrase, steno: best }, ...rest]);
        if (solutions.length >= limit) break;
      }
    }

    if (solutions.length === 0) {
      options.logger?.debug(LOG_CONTEXT.DISPATCH, "No outline for phrase start", {
        token: tokens[start],
      });
    }
    memo.set(start, solutions);
    return solutions;
  };

  const results = solve(0);
  const cost = new Map(results.map((segmentation) => [segmentation, totals(segmentation)]));
  return results.sort((a, b) => {
    const [strokesA, keysA] = cost.get(a) ?? totals(a);
    const [strokesB, keysB] = cost.get(b) ?? totals(b);
    return strokesA - strokesB || keysA - keysB;
  });
}
