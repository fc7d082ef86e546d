import { rms } from './audio-buffer.js';

export type SilenceDetectorOptions = {
  sampleRate: number;
  silenceDurationMs: number;
  threshold: number;
};

/**
 * Energy-based end-of-speech detection for continuous dictation: trips once
 * speech has been heard and is followed by `silenceDurationMs` of chunks whose
 * RMS stays under `threshold`. Leading silence never trips it.
 */
export class SilenceDetector {
  private heardSpeech = false;
  private silentSamples = 0;

  constructor(private readonly options: SilenceDetectorOptions) {}

  feed(chunk: Int16Array): boolean {
    if (!chunk.length) return this.tripped();
    if (rms(chunk) >= this.options.threshold) {
      this.heardSpeech = true;
      this.silentSamples = 0;
      return false;
    }
    if (this.heardSpeech) this.silentSamples += chunk.length;
    return this.tripped();
  }

  reset(): void {
    this.heardSpeech = false;
    this.silentSamples = 0;
  }

  private tripped(): boolean {
    if (!this.heardSpeech || this.options.silenceDurationMs <= 0) return false;
    return (this.silentSamples * 1000) / this.options.sampleRate >= this.options.silenceDurationMs;
  }
}
