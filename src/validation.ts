import { z } from 'zod';
import { createRecordValidationError } from './errors.js';
import type { Logger, RecordParserSettings } from './types.js';

function isLogger(value: unknown): value is Logger {
  if (typeof value !== 'object' || value === null) return false;
  const obj = value as Record<string, unknown>;
  return (['debug', 'info', 'warn', 'error'] as const).every((k) => typeof obj[k] === 'function');
}

const parserSettingsShape = {
  verbose: z.boolean().optional(),
  logger: z
    .union([z.literal(false), z.custom<Logger>(isLogger, 'Expected a logger or false')])
    .optional(),
};

const parserSettingsSchema = z.object(parserSettingsShape).strict();

const detectorSettingsSchema = z
  .object({
    ...parserSettingsShape,
    temperature: z.number().min(0).optional(),
    maxOutputTokens: z.number().int().positive().optional(),
    timeoutMs: z.number().int().positive().optional(),
  })
  .strict();

export interface SettingsValidation {
  valid: boolean;
  warnings: string[];
  errors: string[];
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => {
    const path = i.path.join('.');
    return `${path ? path + ': ' : ''}${i.message || 'Invalid value'}`;
  });
}

function checkSettings(schema: z.ZodTypeAny, settings: unknown): SettingsValidation {
  const warnings: string[] = [];

  const parsed = schema.safeParse(settings);
  if (!parsed.success) {
    return { valid: false, warnings, errors: formatIssues(parsed.error) };
  }

  const s = parsed.data as RecordParserSettings;
  if (s.logger === false && s.verbose) {
    warnings.push('verbose has no effect when logger is false.');
  }

  return { valid: true, warnings, errors: [] };
}

export function validateSettings(settings: unknown): SettingsValidation {
  return checkSettings(parserSettingsSchema, settings);
}

export function validateDetectorSettings(settings: unknown): SettingsValidation {
  return checkSettings(detectorSettingsSchema, settings);
}

const boxSchema = z.tuple([z.number(), z.number(), z.number(), z.number()]);
const fillSchema = z.number().int().min(0).max(100);

// Accepts both field spellings the detection prompts have used
const detectionRecordSchema = z
  .object({
    box: boxSchema.optional(),
    box_2d: boxSchema.optional(),
    label: z.string(),
    fill_percent: fillSchema.optional(),
    percent_full: fillSchema.optional(),
    is_low: z.boolean(),
    confidence: z.number().min(0).max(1),
  })
  .transform((r, ctx) => {
    const box = r.box ?? r.box_2d;
    const fill = r.fill_percent ?? r.percent_full;
    if (box === undefined) {
      ctx.addIssue({ code: 'custom', path: ['box'], message: 'Required' });
    }
    if (fill === undefined) {
      ctx.addIssue({ code: 'custom', path: ['fill_percent'], message: 'Required' });
    }
    if (box === undefined || fill === undefined) return z.NEVER;
    return {
      box,
      label: r.label,
      fill_percent: fill,
      is_low: r.is_low,
      confidence: r.confidence,
    };
  });

export type DetectionRecord = z.output<typeof detectionRecordSchema>;

export function validateDetectedRecord(record: unknown): {
  valid: boolean;
  record?: DetectionRecord;
  errors: string[];
} {
  const parsed = detectionRecordSchema.safeParse(record);
  if (!parsed.success) return { valid: false, errors: formatIssues(parsed.error) };
  return { valid: true, record: parsed.data, errors: [] };
}

export function assertDetectedRecord(record: unknown): DetectionRecord {
  const res = validateDetectedRecord(record);
  if (!res.record) throw createRecordValidationError(record, res.errors);
  return res.record;
}
