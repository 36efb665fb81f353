/**
 * Trie over canonicalized display names for autocomplete.
 *
 * Each node owns a fixed 26-slot child array, one slot per lowercase
 * letter. Spaces are skipped on the way down, so "main st" and "mainst"
 * share a key. A terminal node stores the display name last inserted
 * under its key.
 */

import { canonicalize } from "./canonicalize.js";

const ALPHABET_SIZE = 26;
const CHAR_CODE_A = 97;

class TrieNode {
  readonly children: (TrieNode | undefined)[] = new Array<TrieNode | undefined>(ALPHABET_SIZE).fill(undefined);
  terminal = false;
  displayName?: string;
}

/** Slot for a canonical character, or -1 for anything that is not a-z */
function slotOf(ch: string): number {
  const slot = ch.charCodeAt(0) - CHAR_CODE_A;
  return slot >= 0 && slot < ALPHABET_SIZE ? slot : -1;
}

export class PrefixIndex {
  private readonly root = new TrieNode();
  private terminalCount = 0;

  /** Number of distinct keys stored */
  get size(): number {
    return this.terminalCount;
  }

  /**
   * Store a display name under its canonical key. Names without any
   * letters are ignored.
   */
  insert(displayName: string): void {
    let node = this.root;
    let depth = 0;
    for (const ch of canonicalize(displayName)) {
      const slot = slotOf(ch);
      if (slot < 0) continue;
      let child = node.children[slot];
      if (!child) {
        child = new TrieNode();
        node.children[slot] = child;
      }
      node = child;
      depth++;
    }
    if (depth === 0) return;

    if (!node.terminal) this.terminalCount++;
    node.terminal = true;
    node.displayName = displayName;
  }

  /**
   * Display names of every key that starts with the canonical form of
   * `prefixText`. An empty prefix matches everything.
   */
  prefixSearch(prefixText: string): Set<string> {
    const matches = new Set<string>();
    let node: TrieNode | undefined = this.root;
    for (const ch of canonicalize(prefixText)) {
      const slot = slotOf(ch);
      if (slot < 0) continue;
      node = node.children[slot];
      if (!node) return matches;
    }
    collect(node, matches);
    return matches;
  }
}

function collect(node: TrieNode, matches: Set<string>): void {
  if (node.terminal && node.displayName !== undefined) matches.add(node.displayName);
  for (const child of node.children) {
    if (child) collect(child, matches);
  }
}
