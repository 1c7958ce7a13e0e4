import type { MessagingPlatform } from '../integrations/line.js';
import type { Transcriber } from '../integrations/groq.js';
import { TranscriptionError } from '../errors.js';
import { withTempFile } from '../tools/tempFile.js';

export async function transcribeAudioMessage(
  deps: { messaging: MessagingPlatform; transcriber: Transcriber; audioTmpDir?: string },
  messageId: string
): Promise<string> {
  try {
    const content = await deps.messaging.getMessageContent(messageId);
    return await withTempFile(content, { dir: deps.audioTmpDir, suffix: '.m4a' }, (filePath) =>
      deps.transcriber.transcribe(filePath)
    );
  } catch (err) {
    if (err instanceof TranscriptionError) throw err;
    const msg = err instanceof Error ? err.message : String(err);
    throw new TranscriptionError(`Could not fetch voice message ${messageId}: ${msg}`, { cause: err });
  }
}
