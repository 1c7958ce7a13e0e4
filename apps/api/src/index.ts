import { loadEnv } from './env.js';
import { createLogger, errorContext } from './logger.js';
import { buildApp } from './app.js';
import { getDb } from './db/firestore.js';
import { FirestoreReminderStore } from './db/firestoreReminderStore.js';
import { MemoryReminderStore } from './db/memoryReminderStore.js';
import type { ReminderStore } from './db/reminderStore.js';
import { GroqClient } from './integrations/groq.js';
import { LineMessaging } from './integrations/line.js';
import { NodeScheduleScheduler } from './scheduler.js';
import { restorePendingReminders } from './orchestrator/reminders.js';
import { handleAudioMessage, type VoiceMessageDeps } from './orchestrator/voiceMessage.js';

const env = loadEnv();
const logger = createLogger(env.LOG_LEVEL);

const store: ReminderStore =
  env.REMINDER_STORE === 'memory' ? new MemoryReminderStore() : new FirestoreReminderStore(getDb(env));
const scheduler = new NodeScheduleScheduler(logger);
const groq = new GroqClient({
  apiKey: env.GROQ_API_KEY,
  baseUrl: env.GROQ_BASE_URL,
  transcriptionModel: env.TRANSCRIPTION_MODEL,
  extractionModel: env.EXTRACTION_MODEL,
  maxTokens: env.EXTRACTION_MAX_TOKENS,
  timeoutMs: env.UPSTREAM_TIMEOUT_MS
});

const deps: VoiceMessageDeps = {
  store,
  scheduler,
  messaging: new LineMessaging(env.LINE_CHANNEL_ACCESS_TOKEN),
  transcriber: groq,
  extractor: groq,
  audioTmpDir: env.AUDIO_TMP_DIR,
  logger
};

const restored = await restorePendingReminders(deps);
logger.info({ restored, store: env.REMINDER_STORE }, 'reminders:restored');

const app = await buildApp({
  logger,
  channelSecret: env.LINE_CHANNEL_SECRET,
  onAudioMessage: (event) => handleAudioMessage(deps, event)
});

async function shutdown(signal: string) {
  logger.info({ signal }, 'shutdown');
  try {
    await app.close();
    await scheduler.shutdown();
  } catch (err) {
    logger.error({ err: errorContext(err) }, 'shutdown:failed');
    process.exitCode = 1;
  }
}

process.once('SIGINT', () => void shutdown('SIGINT'));
process.once('SIGTERM', () => void shutdown('SIGTERM'));

await app.listen({ port: env.PORT, host: '0.0.0.0' });
