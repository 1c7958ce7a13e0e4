import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { GroqClient } from '../integrations/groq.js';
import { ExtractionServiceError, TranscriptionError } from '../errors.js';
import { fetchText } from '../tools/http.js';

const config = {
  apiKey: 'test-key',
  baseUrl: 'https://groq.test/openai/v1',
  transcriptionModel: 'whisper-large-v3',
  extractionModel: 'llama3-8b-8192',
  maxTokens: 200,
  timeoutMs: 1_000
};

function jsonResponse(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

describe('GroqClient', () => {
  let fetchMock: ReturnType<typeof vi.fn>;
  let tmpDir: string;

  beforeEach(async () => {
    fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'groq-test-'));
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  describe('transcribe', () => {
    it('uploads the file with the model and json response format', async () => {
      const filePath = path.join(tmpDir, 'voice.m4a');
      await fs.writeFile(filePath, 'fake-audio');
      fetchMock.mockResolvedValue(jsonResponse({ text: 'Meeting with Bob at 3pm tomorrow' }));

      const text = await new GroqClient(config).transcribe(filePath);

      expect(text).toBe('Meeting with Bob at 3pm tomorrow');
      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe('https://groq.test/openai/v1/audio/transcriptions');
      expect(init.method).toBe('POST');
      expect(init.headers).toEqual({ authorization: 'Bearer test-key' });
      const form = init.body;
      expect(form).toBeInstanceOf(FormData);
      expect(form.get('model')).toBe('whisper-large-v3');
      expect(form.get('response_format')).toBe('json');
      const file = form.get('file');
      expect(file).toBeInstanceOf(Blob);
      if (file instanceof Blob) expect(await file.text()).toBe('fake-audio');
    });

    it('fails with a TranscriptionError on a non-2xx answer', async () => {
      const filePath = path.join(tmpDir, 'voice.m4a');
      await fs.writeFile(filePath, 'fake-audio');
      fetchMock.mockResolvedValue(new Response('bad audio', { status: 400 }));

      const err = await new GroqClient(config).transcribe(filePath).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(TranscriptionError);
      expect(err).toHaveProperty('message', 'Groq transcription failed: 400 bad audio');
    });

    it('fails with a TranscriptionError when the body has no text', async () => {
      const filePath = path.join(tmpDir, 'voice.m4a');
      await fs.writeFile(filePath, 'fake-audio');
      fetchMock.mockResolvedValue(jsonResponse({ segments: [] }));

      await expect(new GroqClient(config).transcribe(filePath)).rejects.toBeInstanceOf(TranscriptionError);
    });

    it('fails with a TranscriptionError when the file is missing', async () => {
      await expect(new GroqClient(config).transcribe(path.join(tmpDir, 'missing.m4a'))).rejects.toBeInstanceOf(
        TranscriptionError
      );
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  describe('complete', () => {
    it('posts the chat request with the model and token limit', async () => {
      fetchMock.mockResolvedValue(
        jsonResponse({ choices: [{ message: { role: 'assistant', content: '15:00 2024-06-05\nMeeting with Bob' } }] })
      );

      const out = await new GroqClient(config).complete([{ role: 'user', content: 'hi' }]);

      expect(out).toBe('15:00 2024-06-05\nMeeting with Bob');
      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe('https://groq.test/openai/v1/chat/completions');
      expect(JSON.parse(String(init.body))).toEqual({
        model: 'llama3-8b-8192',
        messages: [{ role: 'user', content: 'hi' }],
        max_tokens: 200
      });
    });

    it('returns an empty string for a null message content', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ choices: [{ message: { content: null } }] }));

      expect(await new GroqClient(config).complete([])).toBe('');
    });

    it('fails with an ExtractionServiceError on a non-2xx answer', async () => {
      fetchMock.mockResolvedValue(new Response('rate limited', { status: 429 }));

      await expect(new GroqClient(config).complete([])).rejects.toThrow(
        new ExtractionServiceError('Groq completion failed: 429 rate limited')
      );
    });

    it('fails with an ExtractionServiceError when the network call fails', async () => {
      fetchMock.mockRejectedValue(new Error('ECONNREFUSED'));

      await expect(new GroqClient(config).complete([])).rejects.toBeInstanceOf(ExtractionServiceError);
    });
  });
});

describe('fetchText', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  function abortError() {
    const err = new Error('This operation was aborted');
    err.name = 'AbortError';
    return err;
  }

  it('returns the status and the full body', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => new Response('{"text":"hi"}', { status: 201 }))
    );

    expect(await fetchText('https://groq.test/ok', { timeoutMs: 1_000 })).toEqual({
      ok: true,
      status: 201,
      body: '{"text":"hi"}'
    });
  });

  it('aborts a request that gets no headers in time', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(
        (_input: string | URL, init?: RequestInit) =>
          new Promise((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(abortError()));
          })
      )
    );

    await expect(fetchText('https://groq.test/slow', { timeoutMs: 10 })).rejects.toThrow(
      'Request timed out after 10ms'
    );
  });

  it('keeps the deadline running while the body streams in', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async (_input: string | URL, init?: RequestInit) => {
        const stalled = new ReadableStream<Uint8Array>({
          start(controller) {
            controller.enqueue(new TextEncoder().encode('{"text":'));
            init?.signal?.addEventListener('abort', () => controller.error(abortError()));
          }
        });
        return new Response(stalled, { status: 200 });
      })
    );

    await expect(fetchText('https://groq.test/stall', { timeoutMs: 10 })).rejects.toThrow(
      'Request timed out after 10ms'
    );
  });
});

describe('GroqClient timeouts', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('reports a stalled completion body as an ExtractionServiceError', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async (_input: string | URL, init?: RequestInit) => {
        const stalled = new ReadableStream<Uint8Array>({
          start(controller) {
            init?.signal?.addEventListener('abort', () => controller.error(new Error('aborted')));
          }
        });
        return new Response(stalled, { status: 200 });
      })
    );

    await expect(new GroqClient({ ...config, timeoutMs: 10 }).complete([])).rejects.toThrow(
      new ExtractionServiceError('Groq completion request failed: Request timed out after 10ms')
    );
  });
});
