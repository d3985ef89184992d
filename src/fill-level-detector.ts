import type {
  LanguageModelV2,
  LanguageModelV2CallWarning,
  LanguageModelV2Content,
  LanguageModelV2FinishReason,
} from '@ai-sdk/provider';
import { buildDetectionPrompt, type DetectionImage } from './detection-prompt.js';
import { resolveLogger } from './logger.js';
import { createRecordParser } from './parse-records.js';
import type { DetectedRecord, FillLevelDetectorSettings, ParseDiagnostics } from './types.js';
import { validateDetectorSettings } from './validation.js';

export interface FillLevelDetectorOptions extends FillLevelDetectorSettings {
  model: LanguageModelV2;
}

export interface DetectOptions {
  // Replaces the default timeout signal
  abortSignal?: AbortSignal;
  // Replaces DETECTION_PROMPT
  instructions?: string;
}

export interface DetectionResult {
  records: DetectedRecord[];
  diagnostics: ParseDiagnostics;
  text: string;
  finishReason: LanguageModelV2FinishReason;
  warnings: LanguageModelV2CallWarning[];
}

export interface FillLevelDetector {
  detect(image: DetectionImage, options?: DetectOptions): Promise<DetectionResult>;
}

function collectText(content: LanguageModelV2Content[]): string {
  return content
    .flatMap((part) => (part.type === 'text' ? [part.text] : []))
    .join('');
}

/**
 * Asks a vision model to enumerate the containers in an image and recovers the
 * records from whatever it answers. Model errors propagate; retries belong to
 * the caller.
 */
export function createFillLevelDetector(options: FillLevelDetectorOptions): FillLevelDetector {
  const { model, ...settings } = options;
  const v = validateDetectorSettings(settings);
  if (!v.valid) throw new Error(`Invalid settings: ${v.errors.join(', ')}`);

  const logger = resolveLogger(settings);
  const parser = createRecordParser({ logger: settings.logger, verbose: settings.verbose });

  return {
    async detect(image, detectOptions = {}) {
      const started = Date.now();
      logger.debug(`Sending detection request to ${model.provider}:${model.modelId}`);

      const res = await model.doGenerate({
        prompt: buildDetectionPrompt(image, detectOptions.instructions),
        temperature: settings.temperature ?? 0.1,
        maxOutputTokens: settings.maxOutputTokens ?? 4000,
        abortSignal: detectOptions.abortSignal ?? AbortSignal.timeout(settings.timeoutMs ?? 60_000),
      });

      const text = collectText(res.content);
      logger.debug(`Response received in ${((Date.now() - started) / 1000).toFixed(2)} seconds`);
      if (res.finishReason === 'length') {
        logger.warn('Fill level detector: output hit the token limit; trailing records may be lost.');
      }

      const { records, diagnostics } = parser.parseWithDiagnostics(text);
      return { records, diagnostics, text, finishReason: res.finishReason, warnings: res.warnings };
    },
  };
}
