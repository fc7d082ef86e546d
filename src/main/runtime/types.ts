import type { AudioBuffer } from '../audio/audio-buffer.js';

export type BackendKind = 'local' | 'remote';

export type SttBackendDescriptor = {
  id: string;
  kind: BackendKind;
  displayName: string;
};

/** Decoding parameters shared by both backends. */
export type DecodingOptions = {
  /** null lets the model detect the language. */
  language: string | null;
  initialPrompt: string | null;
  temperature: number;
};

export type SttTranscribeRequest = {
  audio: AudioBuffer;
  decoding: DecodingOptions;
};

export type SttTranscribeResponse = {
  text: string;
};

interface SttBackendBase {
  descriptor: SttBackendDescriptor;
  transcribe: (request: SttTranscribeRequest) => Promise<SttTranscribeResponse>;
}

export interface LocalSttBackend extends SttBackendBase {
  descriptor: SttBackendDescriptor & { kind: 'local' };
  /** Loads the model ahead of the first request. */
  warmup: () => Promise<void>;
}

export interface RemoteSttBackend extends SttBackendBase {
  descriptor: SttBackendDescriptor & { kind: 'remote' };
}

export type SttBackend = LocalSttBackend | RemoteSttBackend;
