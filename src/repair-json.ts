import type { RepairResult, RepairStep } from './types.js';

/**
 * Cuts a candidate that failed strict parsing back to its last complete element.
 *
 * Leading prose before the first `[` is dropped. Unless the last `}` is already
 * followed by nothing but the closing `]`, everything after it is dropped and a
 * `]` appended, whatever the text ends with: an answer cut off right after a
 * nested array ends in `]` too. Values are never invented, so a truncated
 * trailing element is lost rather than guessed at.
 */
export function repairJsonArray(candidate: string): RepairResult {
  const steps: RepairStep[] = [];
  let text = candidate;

  if (!text.trim().startsWith('[')) {
    const start = text.indexOf('[');
    if (start !== -1) {
      text = text.slice(start);
      steps.push('strip-leading-text');
    }
  }

  const lastBrace = text.lastIndexOf('}');
  if (lastBrace === -1) {
    // An array without objects can only be closed as it stands
    if (text.trim().endsWith(']')) return { ok: true, text, steps };
    return { ok: false, reason: 'no-complete-element', steps };
  }
  if (text.slice(lastBrace + 1).trim() !== ']') {
    text = text.slice(0, lastBrace + 1) + ']';
    steps.push('close-after-last-object');
  }

  return { ok: true, text, steps };
}
