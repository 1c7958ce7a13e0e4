import { promises as fs } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { fetchText, parseJsonBody, type TimedResponse } from '../tools/http.js';
import { ExtractionServiceError, TranscriptionError } from '../errors.js';

export type ChatMessage = {
  role: 'system' | 'user' | 'assistant';
  content: string;
};

export interface Transcriber {
  transcribe(filePath: string): Promise<string>;
}

export interface ChatCompleter {
  complete(messages: ChatMessage[]): Promise<string>;
}

export type GroqConfig = {
  apiKey: string;
  baseUrl: string;
  transcriptionModel: string;
  extractionModel: string;
  maxTokens: number;
  timeoutMs: number;
};

const TranscriptionResponseSchema = z.object({ text: z.string() });

const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() })
      })
    )
    .min(1)
});

function errorMessage(err: unknown) {
  return err instanceof Error ? err.message : String(err);
}

type ErrorClass = new (message: string, options?: ErrorOptions) => Error;

/** Speech-to-text and chat completions against Groq's OpenAI-compatible API. */
export class GroqClient implements Transcriber, ChatCompleter {
  constructor(private readonly config: GroqConfig) {}

  async transcribe(filePath: string): Promise<string> {
    let buffer: Buffer;
    try {
      buffer = await fs.readFile(filePath);
    } catch (e) {
      throw new TranscriptionError(`Could not read audio file: ${errorMessage(e)}`, { cause: e });
    }

    const form = new FormData();
    form.append('model', this.config.transcriptionModel);
    form.append('response_format', 'json');
    form.append('file', new Blob([buffer], { type: 'audio/mp4' }), path.basename(filePath));

    const json = await this.post('/audio/transcriptions', 'transcription', form, TranscriptionError);
    const parsed = TranscriptionResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new TranscriptionError('Groq transcription returned no text');
    }
    return parsed.data.text;
  }

  async complete(messages: ChatMessage[]): Promise<string> {
    const body = JSON.stringify({
      model: this.config.extractionModel,
      messages,
      max_tokens: this.config.maxTokens
    });

    const json = await this.post('/chat/completions', 'completion', body, ExtractionServiceError);
    const parsed = ChatCompletionResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new ExtractionServiceError('Groq completion returned no choices');
    }
    return parsed.data.choices[0].message.content ?? '';
  }

  // Every failure of the call, including a timeout while the body streams in, becomes `Failure`.
  private async post(endpoint: string, label: string, body: FormData | string, Failure: ErrorClass) {
    const headers: Record<string, string> = { authorization: `Bearer ${this.config.apiKey}` };
    if (typeof body === 'string') headers['content-type'] = 'application/json';

    let res: TimedResponse;
    try {
      res = await fetchText(`${this.config.baseUrl}${endpoint}`, {
        method: 'POST',
        headers,
        body,
        timeoutMs: this.config.timeoutMs
      });
    } catch (e) {
      throw new Failure(`Groq ${label} request failed: ${errorMessage(e)}`, { cause: e });
    }

    if (!res.ok) {
      throw new Failure(`Groq ${label} failed: ${res.status}${res.body ? ` ${res.body}` : ''}`);
    }
    return parseJsonBody(res.body);
  }
}
