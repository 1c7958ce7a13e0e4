import type { Reminder } from '@voice-reminder/shared';
import type { AudioMessageEvent } from '../integrations/line.js';
import type { ChatCompleter, Transcriber } from '../integrations/groq.js';
import { errorContext } from '../logger.js';
import { NOT_UNDERSTOOD_REPLY, PROCESSING_FAILED_REPLY, formatConfirmation } from '../messages.js';
import { extractEventDetails, type ExtractionResult } from './extraction.js';
import { createReminder, type ReminderDeps } from './reminders.js';
import { transcribeAudioMessage } from './transcription.js';

export type VoiceMessageDeps = ReminderDeps & {
  transcriber: Transcriber;
  extractor: ChatCompleter;
  audioTmpDir?: string;
};

export type VoiceMessageOutcome =
  | { state: 'scheduled'; reminder: Reminder; scheduled: boolean; reply: string }
  | { state: 'rejected'; reason: 'ambiguous' | 'invalid-time'; reply: string }
  | { state: 'failed'; stage: 'transcription' | 'extraction' | 'persistence'; error: unknown; reply: string };

function failed(stage: 'transcription' | 'extraction' | 'persistence', error: unknown): VoiceMessageOutcome {
  return { state: 'failed', stage, error, reply: PROCESSING_FAILED_REPLY };
}

/** ReceivedAudio → Transcribed → Extracted → Persisted+Scheduled | Rejected, or Failed. */
export async function processAudioMessage(
  deps: VoiceMessageDeps,
  event: AudioMessageEvent
): Promise<VoiceMessageOutcome> {
  let transcript: string;
  try {
    transcript = await transcribeAudioMessage(deps, event.messageId);
  } catch (err) {
    return failed('transcription', err);
  }
  deps.logger.debug({ messageId: event.messageId, transcript }, 'voice:transcribed');

  let extraction: ExtractionResult;
  try {
    extraction = await extractEventDetails(deps.extractor, transcript);
  } catch (err) {
    return failed('extraction', err);
  }

  if (extraction.kind === 'ambiguous') {
    deps.logger.info({ messageId: event.messageId, lineCount: extraction.lineCount }, 'voice:rejected');
    return { state: 'rejected', reason: 'ambiguous', reply: NOT_UNDERSTOOD_REPLY };
  }
  if (extraction.kind === 'invalid-time') {
    deps.logger.info({ messageId: event.messageId, timeText: extraction.timeText }, 'voice:rejected');
    return { state: 'rejected', reason: 'invalid-time', reply: NOT_UNDERSTOOD_REPLY };
  }

  try {
    const { reminder, scheduled } = await createReminder(deps, {
      userId: event.userId,
      eventTime: extraction.eventTime,
      eventContent: extraction.eventContent
    });
    return {
      state: 'scheduled',
      reminder,
      scheduled,
      reply: formatConfirmation(extraction.timeText, extraction.eventContent)
    };
  } catch (err) {
    return failed('persistence', err);
  }
}

/** Runs the workflow and always answers the user; nothing here throws. */
export async function handleAudioMessage(
  deps: VoiceMessageDeps,
  event: AudioMessageEvent
): Promise<VoiceMessageOutcome> {
  const outcome = await processAudioMessage(deps, event);

  if (outcome.state === 'failed') {
    deps.logger.error(
      { messageId: event.messageId, stage: outcome.stage, err: errorContext(outcome.error) },
      'voice:failed'
    );
  }

  try {
    await deps.messaging.reply(event.replyToken, outcome.reply);
  } catch (err) {
    deps.logger.error({ messageId: event.messageId, err: errorContext(err) }, 'voice:reply-failed');
  }
  return outcome;
}
