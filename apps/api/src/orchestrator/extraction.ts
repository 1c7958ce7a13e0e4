import { EVENT_TIME_FORMAT, parseEventTime } from '@voice-reminder/shared';
import type { ChatCompleter, ChatMessage } from '../integrations/groq.js';

export const EXTRACTION_SYSTEM_PROMPT = 'You are a helpful assistant that extracts event information.';

export type ExtractionResult =
  | { kind: 'event'; timeText: string; eventTime: Date; eventContent: string }
  | { kind: 'ambiguous'; lineCount: number }
  | { kind: 'invalid-time'; timeText: string };

export function buildExtractionPrompt(transcript: string) {
  return (
    `Extract the event time and content from this text: ${transcript}. ` +
    `Format the response as two lines: first line is the event time in '${EVENT_TIME_FORMAT}' format, ` +
    'second line is the event content.'
  );
}

export function buildExtractionMessages(transcript: string): ChatMessage[] {
  return [
    { role: 'system', content: EXTRACTION_SYSTEM_PROMPT },
    { role: 'user', content: buildExtractionPrompt(transcript) }
  ];
}

/**
 * Anything other than exactly two non-empty lines is an ordinary "could not
 * understand" outcome, not an error.
 */
export function parseExtractionResponse(raw: string): ExtractionResult {
  const lines = raw
    .trim()
    .split(/\r?\n/)
    .map((line) => line.trim());

  if (lines.length !== 2 || lines.some((line) => line.length === 0)) {
    return { kind: 'ambiguous', lineCount: lines.length };
  }

  const [timeText, eventContent] = lines;
  const eventTime = parseEventTime(timeText);
  if (!eventTime) return { kind: 'invalid-time', timeText };

  return { kind: 'event', timeText, eventTime, eventContent };
}

export async function extractEventDetails(model: ChatCompleter, transcript: string): Promise<ExtractionResult> {
  const raw = await model.complete(buildExtractionMessages(transcript));
  return parseExtractionResponse(raw);
}
