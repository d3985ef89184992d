import type { LanguageModelV2DataContent, LanguageModelV2Prompt } from '@ai-sdk/provider';

export interface DetectionImage {
  // Raw bytes, a base64 string or a URL the model can fetch
  data: LanguageModelV2DataContent;
  // Defaults to image/png
  mediaType?: string;
}

export const DETECTION_PROMPT = `
You are an annotation engine. Look at the image and enumerate EVERY distinct, non-overlapping, real-world object fully or partially visible in the frame (e.g., bottles, tubes, jars, boxes). For each object, output EXACTLY one JSON object with this schema and key order:

[
  {
    "box_2d": [y0, x0, y1, x1],
    "label": "<concise object name + short attribute/description>",
    "percent_full": N,
    "is_low": true|false,
    "confidence": C
  },
  ...
]

STRICT RULES (follow exactly):
- OUTPUT FORMAT: Respond ONLY with a Markdown JSON code block. First line MUST be \`\`\`json and last line MUST be \`\`\`. No prose before/after. No explanations. No comments.
- JSON: Strict JSON; no trailing commas; double-quoted keys/strings; numbers only for percent_full/confidence; booleans are true/false (lowercase).
- SORTING: Sort objects by the top-left corner of the box (ascending x0, then ascending y0) for deterministic order.
- LABELING: Use generic names unless the brand text is clearly readable in the image; do NOT hallucinate brands or models.
- PERCENT FULL HEURISTICS (deterministic):
  1) Transparent/Translucent containers: estimate fill line via visible liquid boundary within the object's vertical extent.
  2) Opaque containers with sight window: use the visible window only.
  3) Fully opaque with no cues: use 100 if unopened-sealed cues; otherwise 50 by default.
  4) Squeezables (tubes): infer from creases/flattening; if uncertain, default 40.
  Clip the final value to [0,100] and round to nearest integer.
- CONFIDENCE: 0.9 when a clear fill boundary/window exists; 0.6 when inferred from shape/creases; 0.4 when no visual cues.
- BOX_2D: Use [y0, x0, y1, x1] normalized to 0-1000 (integers). Ensure y0<y1 and x0<x1. The box must tightly enclose the object.

IF NOTHING IS DETECTED: Return an empty JSON array [] in the required code block.
`;

/**
 * Builds the single-message prompt for a detection call: the image first, then
 * the annotation instructions.
 */
export function buildDetectionPrompt(
  image: DetectionImage,
  instructions: string = DETECTION_PROMPT,
): LanguageModelV2Prompt {
  return [
    {
      role: 'user',
      content: [
        { type: 'file', data: image.data, mediaType: image.mediaType ?? 'image/png' },
        { type: 'text', text: instructions },
      ],
    },
  ];
}
