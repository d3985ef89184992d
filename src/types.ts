// Types and settings for record recovery

import type { JSONParseError, JSONValue } from '@ai-sdk/provider';

export interface Logger {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}

/**
 * One element recovered from the model's JSON array. Fields are copied verbatim
 * from the source JSON; nothing is coerced or checked beyond being an object.
 *
 * The prompt asks for `box`, `label`, `fill_percent`, `is_low` and `confidence`,
 * but older prompts emit `box_2d` and `percent_full`, so every field stays
 * optional here. Use `validateDetectedRecord` for a typed view.
 */
export interface DetectedRecord {
  readonly box?: JSONValue;
  readonly label?: JSONValue;
  readonly fill_percent?: JSONValue;
  readonly is_low?: JSONValue;
  readonly confidence?: JSONValue;
  readonly [field: string]: JSONValue | undefined;
}

export type CandidateSource = 'fenced' | 'bracket-balanced' | 'bracket-unbalanced' | 'raw';

export interface LocatedCandidate {
  candidate: string;
  source: CandidateSource;
}

export type RepairStep = 'strip-leading-text' | 'close-after-last-object';

export type RepairResult =
  | { ok: true; text: string; steps: RepairStep[] }
  | { ok: false; reason: 'no-complete-element'; steps: RepairStep[] };

export type ParseOutcome = 'parsed' | 'repaired' | 'empty';

export interface ParseDiagnostics {
  source: CandidateSource;
  candidate: string;
  // Present only when the first strict parse failed
  repair?: RepairResult;
  parseErrors: JSONParseError[];
  outcome: ParseOutcome;
}

export interface ParseResult {
  records: DetectedRecord[];
  diagnostics: ParseDiagnostics;
}

export interface RecordParserSettings {
  // Enable debug/info narration of each pipeline step
  verbose?: boolean;

  // Custom logger; set to false to disable logging
  logger?: Logger | false;
}

/**
 * Axis order of the four box numbers.
 * - `yxyx`: `[y0, x0, y1, x1]`, what the detection prompt asks for
 * - `xyxy`: `[x0, y0, x1, y1]`
 */
export type BoxAxisOrder = 'yxyx' | 'xyxy';

export interface PixelBox {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

export interface ImageSize {
  width: number;
  height: number;
}

export interface FillLevelDetectorSettings extends RecordParserSettings {
  // Sampling temperature for the detection call (default 0.1)
  temperature?: number;

  // Output token limit for the detection call (default 4000)
  maxOutputTokens?: number;

  // Abort the model call after this many milliseconds (default 60000)
  timeoutMs?: number;
}
