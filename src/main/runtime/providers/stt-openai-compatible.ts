import type { RemoteSttBackend, SttTranscribeRequest, SttTranscribeResponse } from '../types.js';
import { fetchFn } from '../../ctx.js';
import { encodeWav } from '../../audio/wav.js';
import { BackendInvocationError, errorMessage } from '../../errors.js';
import { appendPath, isLikelyLocalEndpoint, normalizeBaseEndpoint } from './common.js';

export const DEFAULT_API_BASE_URL = 'https://api.openai.com/v1';

export type OpenAiCompatibleSttOptions = {
  baseUrl: string;
  model: string;
  /** Rate written into the WAV header. */
  sampleRate: number;
  /** Defaults to `OPENAI_API_KEY`. */
  apiKey?: string;
};

function parseTranscribeText(payload: unknown): string {
  if (!payload || typeof payload !== 'object') return '';
  for (const key of ['text', 'output_text', 'transcript']) {
    const value: unknown = Reflect.get(payload, key);
    if (typeof value === 'string') return value;
  }
  return '';
}

export function createOpenAiCompatibleSttBackend(options: OpenAiCompatibleSttOptions): RemoteSttBackend {
  const endpoint = normalizeBaseEndpoint(options.baseUrl, DEFAULT_API_BASE_URL);
  const url = appendPath(endpoint, '/audio/transcriptions');

  return {
    descriptor: {
      id: 'stt.remote.openai_compatible',
      kind: 'remote',
      displayName: 'OpenAI-compatible STT'
    },

    async transcribe(request: SttTranscribeRequest): Promise<SttTranscribeResponse> {
      const token = (options.apiKey ?? process.env.OPENAI_API_KEY ?? '').trim();
      if (!token && !isLikelyLocalEndpoint(endpoint)) {
        throw new BackendInvocationError('Missing API key for OpenAI-compatible STT (set OPENAI_API_KEY)');
      }

      const wav = encodeWav(request.audio.samples, options.sampleRate);
      const form = new FormData();
      form.append('file', new Blob([new Uint8Array(wav)], { type: 'audio/wav' }), 'audio.wav');
      form.append('model', options.model);
      if (request.decoding.language) form.append('language', request.decoding.language);
      if (request.decoding.initialPrompt) form.append('prompt', request.decoding.initialPrompt);
      form.append('temperature', String(request.decoding.temperature));

      const headers: Record<string, string> = {};
      if (token) headers.Authorization = `Bearer ${token}`;

      let response: Response;
      try {
        response = await fetchFn(url, { method: 'POST', headers, body: form });
      } catch (err) {
        throw new BackendInvocationError(`OpenAI-compatible STT request failed: ${errorMessage(err)}`, { cause: err });
      }

      if (!response.ok) {
        const body = await response.text().catch(() => '');
        throw new BackendInvocationError(`OpenAI-compatible STT failed ${response.status}: ${body || 'empty response'}`);
      }

      let data: unknown;
      try {
        data = await response.json();
      } catch (err) {
        throw new BackendInvocationError('OpenAI-compatible STT returned invalid JSON', { cause: err });
      }
      return { text: parseTranscribeText(data).trim() };
    }
  };
}
