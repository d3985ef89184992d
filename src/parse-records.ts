import type { JSONParseError } from '@ai-sdk/provider';
import { createParseError, createShapeError } from './errors.js';
import { locateJsonArray } from './extract-json.js';
import { resolveLogger } from './logger.js';
import { repairJsonArray } from './repair-json.js';
import type {
  DetectedRecord,
  Logger,
  ParseDiagnostics,
  ParseResult,
  RecordParserSettings,
} from './types.js';
import { validateSettings } from './validation.js';

type StrictParse = { ok: true; records: DetectedRecord[] } | { ok: false; error: JSONParseError };

function isRecordShape(value: unknown): value is DetectedRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

function strictParse(text: string): StrictParse {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (err) {
    return { ok: false, error: createParseError(text, err) };
  }
  if (!Array.isArray(value) || !value.every(isRecordShape)) {
    return { ok: false, error: createShapeError(text) };
  }
  return { ok: true, records: value.map((r) => deepFreeze(r)) };
}

function preview(text: string): string {
  return text.length > 200 ? `${text.slice(0, 200)}...` : text;
}

function run(raw: string, logger: Logger): ParseResult {
  const { candidate, source } = locateJsonArray(raw);
  logger.debug(`Candidate from ${source}: ${candidate.length} characters`);
  const diagnostics: ParseDiagnostics = { source, candidate, parseErrors: [], outcome: 'empty' };

  const first = strictParse(candidate);
  if (first.ok) {
    logger.debug(`Parsed ${first.records.length} records`);
    diagnostics.outcome = 'parsed';
    return { records: first.records, diagnostics };
  }
  diagnostics.parseErrors.push(first.error);
  logger.debug(`Strict parse failed: ${first.error.message}`);

  const repair = repairJsonArray(candidate);
  diagnostics.repair = repair;
  if (!repair.ok) {
    logger.debug('No complete element to recover');
    return { records: [], diagnostics };
  }
  logger.debug(`Repaired with [${repair.steps.join(', ')}]: ${preview(repair.text)}`);

  const second = strictParse(repair.text);
  if (!second.ok) {
    diagnostics.parseErrors.push(second.error);
    logger.debug(`Repaired text still fails: ${second.error.message}`);
    return { records: [], diagnostics };
  }
  logger.debug(`Recovered ${second.records.length} records`);
  diagnostics.outcome = 'repaired';
  return { records: second.records, diagnostics };
}

function settingsLogger(settings: RecordParserSettings): Logger {
  const v = validateSettings(settings);
  if (!v.valid) throw new Error(`Invalid settings: ${v.errors.join(', ')}`);
  return resolveLogger(settings);
}

/**
 * Recovers the records of a model answer along with how they were found.
 * Malformed input yields an empty `records` array, never an exception.
 */
export function parseRecordsWithDiagnostics(
  raw: string,
  settings: RecordParserSettings = {},
): ParseResult {
  return run(raw, settingsLogger(settings));
}

export function parseRecords(raw: string, settings: RecordParserSettings = {}): DetectedRecord[] {
  return run(raw, settingsLogger(settings)).records;
}

export interface RecordParser {
  (raw: string): DetectedRecord[];
  parse(raw: string): DetectedRecord[];
  parseWithDiagnostics(raw: string): ParseResult;
}

export function createRecordParser(settings: RecordParserSettings = {}): RecordParser {
  const logger = settingsLogger(settings);

  const parse = (raw: string) => run(raw, logger).records;
  const parser = Object.assign(parse, {
    parse,
    parseWithDiagnostics: (raw: string) => run(raw, logger),
  });

  return parser;
}
