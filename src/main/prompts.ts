/**
 * Chat prompts for the content analyzer and the vision face detector.
 * Every prompt asks for a single JSON object so responses can go
 * through `safeJsonParse`.
 */

export interface SegmentPromptInput {
  text: string;
  contextBefore: string;
  contextAfter: string;
}

export const ANALYSIS_SYSTEM_PROMPT =
  'You are a video editor deciding which spoken moments of a short vertical video deserve an illustrative image. Reply with JSON only.';

export function buildSegmentAnalysisPrompt(input: SegmentPromptInput): string {
  return [
    'Decide whether the speech segment below should be illustrated with a generated image that briefly replaces the video frames.',
    '',
    `Segment: "${input.text}"`,
    `Previous context: "${input.contextBefore}"`,
    `Following context: "${input.contextAfter}"`,
    '',
    'Score 0-10 how much an image would help the viewer. Concrete people, places, objects and events score high; abstract remarks and filler score low.',
    'Only propose an image when it clearly adds something.',
    '',
    'Answer with this JSON object:',
    '{',
    '  "needs_visualization": boolean,',
    '  "importance_score": number,',
    '  "reasoning": string,',
    '  "image_prompt": string | null,',
    '  "image_description": string | null',
    '}',
  ].join('\n');
}

export const CAPTION_SYSTEM_PROMPT =
  'You write short on-screen captions for vertical social videos. Reply with JSON only.';

export function buildCaptionPrompt(text: string, maxLength: number): string {
  return [
    'Write a caption that carries the key message or feeling of this speech, not a transcript of it.',
    '',
    `Speech: "${text}"`,
    '',
    `Keep it under ${maxLength} characters, punchy, in sentence or title case.`,
    'For "Thank you so much, I could not have done it without you" a good caption is "Thank You!".',
    '',
    'Pick the sentiment that fits best: important, happy, sad, angry, neutral, excited, grateful or worried.',
    '',
    'Answer with this JSON object:',
    '{ "english_text": string, "sentiment": string }',
  ].join('\n');
}

export const FACE_DETECTION_PROMPT = [
  'List every human face visible in this video frame.',
  'Give each face as a box in normalised coordinates between 0 and 1, origin at the top-left corner.',
  'Answer with this JSON object: { "faces": [ { "x": number, "y": number, "width": number, "height": number } ] }',
  'Answer { "faces": [] } when there are no faces.',
].join('\n');
