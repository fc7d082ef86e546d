import { ensureWorker, getWorkerGeneration, sendWorkerMessage } from '../../worker-manager.js';
import { toFloat32Samples } from '../../audio/audio-buffer.js';
import { BackendInitError, BackendInvocationError, DictationError, errorMessage } from '../../errors.js';
import type { LocalSttBackend, SttTranscribeRequest, SttTranscribeResponse } from '../types.js';

export type LocalSttOptions = {
  /** Model name or local path handed to faster-whisper. */
  model: string;
  device: string;
  computeType: string;
  conditionOnPreviousText: boolean;
  vadFilter: boolean;
  startupTimeoutMs?: number;
  requestTimeoutMs?: number;
};

type LoadedModel = {
  model: string;
  device: string;
  computeType: string;
};

type CachedModel = {
  generation: number;
  loading: Promise<LoadedModel>;
};

// One model per worker process, shared by every backend instance.
const modelCache = new Map<string, CachedModel>();

export function resetLocalModelCache(): void {
  modelCache.clear();
}

function cacheKey(model: string, device: string, computeType: string): string {
  return `${model}|${device}|${computeType}`;
}

/** int8 quantization is CPU-only in this setup. */
export function resolveDevice(device: string, computeType: string): string {
  if (computeType === 'int8') return 'cpu';
  return device || 'auto';
}

async function loadOnDevice(options: LocalSttOptions, device: string): Promise<LoadedModel> {
  await ensureWorker(options.startupTimeoutMs);
  const result = await sendWorkerMessage(
    'load',
    { model: options.model, device, compute_type: options.computeType },
    options.startupTimeoutMs ?? 120000
  );
  const loadedDevice = typeof result.device === 'string' ? result.device : device;
  console.log('[stt-local] model loaded', { model: options.model, device: loadedDevice, computeType: options.computeType });
  return { model: options.model, device: loadedDevice, computeType: options.computeType };
}

async function loadWithFallback(options: LocalSttOptions): Promise<LoadedModel> {
  const device = resolveDevice(options.device, options.computeType);
  try {
    return await loadOnDevice(options, device);
  } catch (err) {
    if (device === 'cpu') {
      throw new BackendInitError(`Failed to load model "${options.model}" on cpu: ${errorMessage(err)}`, { cause: err });
    }
    console.error('[stt-local] load failed on', device, '- retrying on cpu:', errorMessage(err));
  }
  try {
    return await loadOnDevice(options, 'cpu');
  } catch (err) {
    throw new BackendInitError(`Failed to load model "${options.model}" on ${device} and on cpu: ${errorMessage(err)}`, {
      cause: err
    });
  }
}

/** Loads the model into the running worker, respawning the worker (and reloading) after it died. */
export async function loadModel(options: LocalSttOptions): Promise<LoadedModel> {
  await ensureWorker(options.startupTimeoutMs);
  const generation = getWorkerGeneration();
  const key = cacheKey(options.model, resolveDevice(options.device, options.computeType), options.computeType);
  const cached = modelCache.get(key);
  if (cached && cached.generation === generation) return cached.loading;
  if (cached) console.log('[stt-local] worker restarted, reloading model', options.model);
  const loading = loadWithFallback(options);
  const entry = { generation, loading };
  modelCache.set(key, entry);
  loading.catch(() => {
    if (modelCache.get(key) === entry) modelCache.delete(key);
  });
  return loading;
}

export function createLocalSttBackend(options: LocalSttOptions): LocalSttBackend {
  return {
    descriptor: {
      id: 'stt.local.faster_whisper',
      kind: 'local',
      displayName: 'Local faster-whisper'
    },

    async warmup(): Promise<void> {
      await loadModel(options);
    },

    async transcribe(request: SttTranscribeRequest): Promise<SttTranscribeResponse> {
      const loaded = await loadModel(options);
      const floats = toFloat32Samples(request.audio.samples);
      const payload = {
        model: loaded.model,
        device: loaded.device,
        compute_type: loaded.computeType,
        audio_base64: Buffer.from(floats.buffer, floats.byteOffset, floats.byteLength).toString('base64'),
        sample_rate: request.audio.sampleRate,
        language: request.decoding.language,
        initial_prompt: request.decoding.initialPrompt,
        temperature: request.decoding.temperature,
        condition_on_previous_text: options.conditionOnPreviousText,
        vad_filter: options.vadFilter
      };
      let result: Record<string, unknown>;
      try {
        result = await sendWorkerMessage('transcribe', payload, options.requestTimeoutMs ?? 600000);
      } catch (err) {
        if (err instanceof DictationError) throw err;
        throw new BackendInvocationError(`Local transcription failed: ${errorMessage(err)}`, { cause: err });
      }
      return { text: typeof result.text === 'string' ? result.text : '' };
    }
  };
}
