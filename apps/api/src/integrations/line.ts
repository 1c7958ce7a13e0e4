import { messagingApi, validateSignature } from '@line/bot-sdk';
import type { Readable } from 'node:stream';
import { z } from 'zod';

export const SIGNATURE_HEADER = 'x-line-signature';

export interface MessagingPlatform {
  getMessageContent(messageId: string): Promise<Readable>;
  reply(replyToken: string, text: string): Promise<void>;
  push(userId: string, text: string): Promise<void>;
}

export class LineMessaging implements MessagingPlatform {
  private readonly client: messagingApi.MessagingApiClient;
  private readonly blobClient: messagingApi.MessagingApiBlobClient;

  constructor(channelAccessToken: string) {
    this.client = new messagingApi.MessagingApiClient({ channelAccessToken });
    this.blobClient = new messagingApi.MessagingApiBlobClient({ channelAccessToken });
  }

  getMessageContent(messageId: string): Promise<Readable> {
    return this.blobClient.getMessageContent(messageId);
  }

  async reply(replyToken: string, text: string): Promise<void> {
    await this.client.replyMessage({ replyToken, messages: [{ type: 'text', text }] });
  }

  async push(userId: string, text: string): Promise<void> {
    await this.client.pushMessage({ to: userId, messages: [{ type: 'text', text }] });
  }
}

export function isValidLineSignature(body: string, signature: string, channelSecret: string) {
  return validateSignature(body, channelSecret, signature);
}

// Only the fields the bot reads; LINE adds more over time.
const WebhookEventSchema = z
  .object({
    type: z.string(),
    replyToken: z.string().optional(),
    source: z.object({ type: z.string(), userId: z.string().optional() }).passthrough().optional(),
    message: z.object({ id: z.string(), type: z.string() }).passthrough().optional()
  })
  .passthrough();

export const WebhookBodySchema = z.object({
  destination: z.string().optional(),
  events: z.array(WebhookEventSchema)
});

export type WebhookEvent = z.infer<typeof WebhookEventSchema>;

export type AudioMessageEvent = {
  userId: string;
  replyToken: string;
  messageId: string;
};

export function toAudioMessageEvent(event: WebhookEvent): AudioMessageEvent | null {
  if (event.type !== 'message' || event.message?.type !== 'audio') return null;
  const userId = event.source?.userId;
  if (!userId || !event.replyToken) return null;
  return { userId, replyToken: event.replyToken, messageId: event.message.id };
}
