import type { AppConfig } from '../config-manager.js';
import type { AudioBuffer } from '../audio/audio-buffer.js';
import type { BackendKind, DecodingOptions, SttBackend } from './types.js';
import { createLocalSttBackend } from './providers/stt-local-worker.js';
import { createOpenAiCompatibleSttBackend } from './providers/stt-openai-compatible.js';

export function resolveBackendKind(config: Pick<AppConfig, 'model_options'>): BackendKind {
  return config.model_options.use_api ? 'remote' : 'local';
}

export function decodingOptionsFrom(config: Pick<AppConfig, 'model_options'>): DecodingOptions {
  const common = config.model_options.common;
  return {
    language: common.language,
    initialPrompt: common.initial_prompt,
    temperature: common.temperature
  };
}

export function createSttBackend(config: Pick<AppConfig, 'model_options' | 'recording_options'>): SttBackend {
  const { api, local } = config.model_options;
  if (resolveBackendKind(config) === 'remote') {
    return createOpenAiCompatibleSttBackend({
      baseUrl: api.base_url,
      model: api.model,
      sampleRate: config.recording_options.sample_rate
    });
  }
  return createLocalSttBackend({
    model: local.model_path || local.model,
    device: local.device,
    computeType: local.compute_type,
    conditionOnPreviousText: local.condition_on_previous_text,
    vadFilter: local.vad_filter
  });
}

export function normalizeTranscript(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Turns a sealed audio buffer into text with the backend chosen at startup.
 * Backend errors propagate to the caller (the recording session).
 */
export class TranscriptionEngine {
  constructor(
    private readonly backend: SttBackend,
    private readonly decoding: DecodingOptions,
    private readonly minDurationMs = 0
  ) {}

  static fromConfig(config: Pick<AppConfig, 'model_options' | 'recording_options'>): TranscriptionEngine {
    return new TranscriptionEngine(createSttBackend(config), decodingOptionsFrom(config), config.recording_options.min_duration);
  }

  get backendId(): string {
    return this.backend.descriptor.id;
  }

  /** Preloads the local model; remote backends have nothing to prepare. */
  async warmup(): Promise<void> {
    const backend = this.backend;
    if ('warmup' in backend) await backend.warmup();
  }

  async transcribe(buffer: AudioBuffer): Promise<string> {
    if (buffer.isEmpty()) return '';
    if (buffer.durationMs < this.minDurationMs) {
      console.log('[stt] recording too short, skipping', { durationMs: Math.round(buffer.durationMs), minDurationMs: this.minDurationMs });
      return '';
    }
    const started = Date.now();
    const result = await this.backend.transcribe({ audio: buffer, decoding: this.decoding });
    const text = normalizeTranscript(result.text);
    console.log('[stt] transcribed', { backend: this.backend.descriptor.id, ms: Date.now() - started, chars: text.length });
    return text;
  }
}
