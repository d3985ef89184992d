// Locates the JSON array inside a model answer: fenced ```json block first, then
// the first [...] run found by bracket depth.

import type { LocatedCandidate } from './types.js';

const FENCE_OPEN = '```json';
const FENCE_CLOSE = '```';

function findFencedBlock(text: string): string | undefined {
  const lines = text.split(/\r\n|\r|\n/);
  let start = -1;
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (line === FENCE_OPEN) {
      start = i + 1;
    } else if (line === FENCE_CLOSE && start !== -1) {
      return lines.slice(start, i).join('\n').trim();
    }
  }
  return undefined;
}

export function locateJsonArray(text: string): LocatedCandidate {
  const fenced = findFencedBlock(text);
  if (fenced !== undefined) return { candidate: fenced, source: 'fenced' };

  const start = text.indexOf('[');
  if (start === -1) return { candidate: text, source: 'raw' };
  let depth = 0;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (ch === '[') depth++;
    else if (ch === ']') {
      depth--;
      if (depth === 0) return { candidate: text.slice(start, i + 1), source: 'bracket-balanced' };
    }
  }
  // Text ended inside the array; the repairer decides what survives
  return { candidate: text.slice(start), source: 'bracket-unbalanced' };
}

export function extractJsonArray(text: string): string {
  return locateJsonArray(text).candidate;
}
