/**
 * Pattern Matcher
 * Aho-Corasick automaton over the normalized keywords and synonyms of one
 * axis. Built once per axis; a scan costs O(text length + hits) regardless
 * of how many patterns are indexed.
 */

import { LabelPatternMap, PatternHit } from './types';
import { normalizeText } from './TextNormalizer';

interface PatternPayload {
  label: string;
  isSynonym: boolean;
}

interface IndexedPattern {
  pattern: string;
  payloads: PatternPayload[];
}

interface AutomatonNode {
  next: Map<string, number>;
  fail: number;
  /** Patterns ending at this node, including those reached through fail links */
  outputs: IndexedPattern[];
}

// Patterns this short must have clean boundaries on both sides
const SHORT_PATTERN_LENGTH = 2;

const ALPHANUMERIC = /[\p{L}\p{N}]/u;

function isAlphanumeric(char: string | undefined): boolean {
  return char !== undefined && ALPHANUMERIC.test(char);
}

export class PatternMatcher {
  private readonly nodes: AutomatonNode[] = [];
  private readonly patternCount: number;

  constructor(keywords: LabelPatternMap, synonyms: LabelPatternMap) {
    // Group by normalized form so one automaton hit yields every label sharing it
    const index = new Map<string, IndexedPattern>();

    const register = (map: LabelPatternMap, isSynonym: boolean) => {
      for (const [label, patterns] of Object.entries(map)) {
        for (const raw of patterns) {
          const pattern = normalizeText(raw);
          if (!pattern) continue;

          let entry = index.get(pattern);
          if (!entry) {
            entry = { pattern, payloads: [] };
            index.set(pattern, entry);
          }
          entry.payloads.push({ label, isSynonym });
        }
      }
    };

    register(keywords, false);
    register(synonyms, true);

    this.patternCount = index.size;
    if (this.patternCount > 0) {
      this.build([...index.values()]);
    }
  }

  get size(): number {
    return this.patternCount;
  }

  /**
   * Find every occurrence of every indexed pattern in already-normalized text.
   * A pattern shared by several labels yields one hit per label.
   */
  findMatches(normalizedText: string): PatternHit[] {
    if (this.patternCount === 0 || normalizedText.length === 0) {
      return [];
    }

    const hits: PatternHit[] = [];
    let state = 0;

    for (let i = 0; i < normalizedText.length; i++) {
      const char = normalizedText[i];

      while (state !== 0 && !this.nodes[state].next.has(char)) {
        state = this.nodes[state].fail;
      }
      state = this.nodes[state].next.get(char) ?? 0;

      for (const output of this.nodes[state].outputs) {
        const start = i - output.pattern.length + 1;
        if (!this.hasValidBoundaries(normalizedText, start, i, output.pattern.length)) {
          continue;
        }
        for (const payload of output.payloads) {
          hits.push({
            pattern: output.pattern,
            label: payload.label,
            isSynonym: payload.isSynonym,
          });
        }
      }
    }

    return hits;
  }

  private hasValidBoundaries(text: string, start: number, end: number, length: number): boolean {
    const beforeOk = !isAlphanumeric(text[start - 1]);
    const afterOk = !isAlphanumeric(text[end + 1]);

    if (length <= SHORT_PATTERN_LENGTH) {
      return beforeOk && afterOk;
    }
    return beforeOk || afterOk;
  }

  private createNode(): number {
    this.nodes.push({ next: new Map(), fail: 0, outputs: [] });
    return this.nodes.length - 1;
  }

  private build(patterns: IndexedPattern[]): void {
    const root = this.createNode();

    // Trie
    for (const entry of patterns) {
      let state = root;
      for (let k = 0; k < entry.pattern.length; k++) {
        const unit = entry.pattern[k];
        let child = this.nodes[state].next.get(unit);
        if (child === undefined) {
          child = this.createNode();
          this.nodes[state].next.set(unit, child);
        }
        state = child;
      }
      this.nodes[state].outputs.push(entry);
    }

    // Failure links, breadth first
    const queue: number[] = [];
    for (const child of this.nodes[root].next.values()) {
      this.nodes[child].fail = root;
      queue.push(child);
    }

    for (let head = 0; head < queue.length; head++) {
      const state = queue[head];
      for (const [unit, child] of this.nodes[state].next) {
        let fallback = this.nodes[state].fail;
        while (fallback !== root && !this.nodes[fallback].next.has(unit)) {
          fallback = this.nodes[fallback].fail;
        }
        const target = this.nodes[fallback].next.get(unit);
        this.nodes[child].fail = target !== undefined && target !== child ? target : root;
        this.nodes[child].outputs.push(...this.nodes[this.nodes[child].fail].outputs);
        queue.push(child);
      }
    }
  }
}
