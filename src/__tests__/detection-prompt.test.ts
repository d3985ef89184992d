import { describe, it, expect } from 'vitest';
import { buildDetectionPrompt, DETECTION_PROMPT } from '../detection-prompt.js';

describe('buildDetectionPrompt', () => {
  it('sends the image before the instructions', () => {
    const data = new Uint8Array([1, 2, 3]);
    expect(buildDetectionPrompt({ data })).toEqual([
      {
        role: 'user',
        content: [
          { type: 'file', data, mediaType: 'image/png' },
          { type: 'text', text: DETECTION_PROMPT },
        ],
      },
    ]);
  });

  it('keeps an explicit media type and custom instructions', () => {
    const [message] = buildDetectionPrompt(
      { data: 'aGVsbG8=', mediaType: 'image/jpeg' },
      'List the jars.',
    );
    expect(message.content).toEqual([
      { type: 'file', data: 'aGVsbG8=', mediaType: 'image/jpeg' },
      { type: 'text', text: 'List the jars.' },
    ]);
  });

  it('asks for a fenced json answer', () => {
    expect(DETECTION_PROMPT).toContain('First line MUST be ```json and last line MUST be ```.');
  });
});
