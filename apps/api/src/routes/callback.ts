import type { FastifyInstance } from 'fastify';
import {
  SIGNATURE_HEADER,
  WebhookBodySchema,
  isValidLineSignature,
  toAudioMessageEvent,
  type AudioMessageEvent
} from '../integrations/line.js';

export type CallbackRouteOptions = {
  channelSecret: string;
  onAudioMessage: (event: AudioMessageEvent) => Promise<unknown>;
};

export async function callbackRoutes(app: FastifyInstance, opts: CallbackRouteOptions) {
  // The signature covers the exact bytes LINE sent, so keep the body as a string.
  app.addContentTypeParser('application/json', { parseAs: 'string' }, (_req, body, done) => {
    done(null, body);
  });

  app.post('/callback', async (req, reply) => {
    const signature = req.headers[SIGNATURE_HEADER];
    if (typeof signature !== 'string' || typeof req.body !== 'string') {
      return reply.badRequest('Missing signature');
    }
    if (!isValidLineSignature(req.body, signature, opts.channelSecret)) {
      req.log.warn('callback:invalid-signature');
      return reply.badRequest('Invalid signature');
    }

    let payload: unknown;
    try {
      payload = JSON.parse(req.body);
    } catch {
      return reply.badRequest('Malformed payload');
    }
    const parsed = WebhookBodySchema.safeParse(payload);
    if (!parsed.success) return reply.badRequest('Malformed payload');

    for (const event of parsed.data.events) {
      const audio = toAudioMessageEvent(event);
      if (!audio) continue;
      await opts.onAudioMessage(audio);
    }

    return reply.type('text/plain').send('OK');
  });
}
