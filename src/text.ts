import { readFileSync } from "node:fs";
import type { Inputs, InputValue } from "./types.js";

const TOKEN_PATTERN = /[\p{L}\p{N}]+/gu;

const STOP_WORDS = loadStopWords();

function loadStopWords(): Set<string> {
  const raw = readFileSync(new URL("../data/stopwords.json", import.meta.url), "utf8");
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) {
    throw new Error("data/stopwords.json must contain an array of words");
  }
  return new Set(parsed.filter((word): word is string => typeof word === "string"));
}

export function tokenize(text: string): string[] {
  return text.match(TOKEN_PATTERN) ?? [];
}

export function analyze(text: string): string[] {
  return tokenize(text).map((token) => token.toLowerCase());
}

export function inputText(value: InputValue): string {
  return Array.isArray(value) ? value.join(" ") : value;
}

export function isStopWord(token: string): boolean {
  return STOP_WORDS.has(token);
}

/** Distinct lower-cased content words across all inputs, in first-seen order. */
export function wordCloudTerms(inputs: Inputs): string[] {
  const words = new Set<string>();
  for (const value of Object.values(inputs)) {
    for (const token of analyze(inputText(value))) {
      if (token.length > 1 && !isStopWord(token)) {
        words.add(token);
      }
    }
  }
  return [...words];
}
