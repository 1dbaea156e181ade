/**
 * Human-readable canary names: `<app>-canary-<adjective>-<noun>-<suffix>`.
 * Word lists live in names.json beside this module; the suffix is four base-36 characters.
 */

import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { randomInt } from "crypto";
import { z } from "zod";
import { CANARY_TRACK } from "./types.js";

const WordListsSchema = z.object({
  adjectives: z.array(z.string().min(1)).min(1),
  nouns: z.array(z.string().min(1)).min(1),
});

export type WordLists = z.infer<typeof WordListsSchema>;

/** Picks an index in [0, max). */
export type RandomIndex = (max: number) => number;

let cached: WordLists | null = null;

export function loadWordLists(): WordLists {
  if (cached) return cached;
  const path = fileURLToPath(new URL("./names.json", import.meta.url));
  cached = WordListsSchema.parse(JSON.parse(readFileSync(path, "utf-8")));
  return cached;
}

/** Collapses any run of `_`, `-` or whitespace into a single `-`. */
export function normalizeToken(token: string): string {
  return token
    .trim()
    .replace(/[\s_-]+/g, "-")
    .replace(/^-|-$/g, "")
    .toLowerCase();
}

const SUFFIX_SPACE = 36 ** 4;

export function randomSuffix(random: RandomIndex = randomInt): string {
  return random(SUFFIX_SPACE).toString(36).padStart(4, "0");
}

/** Number of distinct tokens `randomToken` can produce. */
export function nameSpaceSize(words: WordLists = loadWordLists()): number {
  return words.adjectives.length * words.nouns.length * SUFFIX_SPACE;
}

export function randomToken(random: RandomIndex = randomInt, words: WordLists = loadWordLists()): string {
  const adjective = words.adjectives[random(words.adjectives.length)];
  const noun = words.nouns[random(words.nouns.length)];
  return normalizeToken(`${adjective}_${noun}_${randomSuffix(random)}`);
}

export function canaryName(applicationName: string, token: string): string {
  return `${applicationName}-${CANARY_TRACK}-${normalizeToken(token)}`;
}
