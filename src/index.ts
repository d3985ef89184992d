export { extractJsonArray, locateJsonArray } from './extract-json.js';
export { repairJsonArray } from './repair-json.js';
export {
  createRecordParser,
  parseRecords,
  parseRecordsWithDiagnostics,
  type RecordParser,
} from './parse-records.js';
export { toPixelBox, type PixelBoxOptions } from './box.js';
export {
  assertDetectedRecord,
  validateDetectedRecord,
  validateDetectorSettings,
  validateSettings,
  type DetectionRecord,
  type SettingsValidation,
} from './validation.js';
export { buildDetectionPrompt, DETECTION_PROMPT, type DetectionImage } from './detection-prompt.js';
export {
  createFillLevelDetector,
  type DetectOptions,
  type DetectionResult,
  type FillLevelDetector,
  type FillLevelDetectorOptions,
} from './fill-level-detector.js';
export { createVerboseLogger, getLogger } from './logger.js';
export type * from './types.js';
