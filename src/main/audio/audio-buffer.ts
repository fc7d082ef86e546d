/**
 * Signed 16-bit mono samples captured during one recording session.
 *
 * Instances are sealed: the samples are copied in once and callers must treat
 * `samples` as read-only. A session hands its buffer to the transcription
 * engine and drops its own reference in the same step.
 */
export class AudioBuffer {
  readonly samples: Int16Array;
  readonly sampleRate: number;

  constructor(samples: Int16Array, sampleRate: number) {
    this.samples = samples;
    this.sampleRate = sampleRate;
  }

  static empty(sampleRate: number): AudioBuffer {
    return new AudioBuffer(new Int16Array(0), sampleRate);
  }

  get length(): number {
    return this.samples.length;
  }

  get durationMs(): number {
    if (!this.sampleRate) return 0;
    return (this.samples.length * 1000) / this.sampleRate;
  }

  isEmpty(): boolean {
    return this.samples.length === 0;
  }
}

/** Collects chunks while recording; `seal()` moves them into an AudioBuffer exactly once. */
export class AudioAccumulator {
  private chunks: Int16Array[] | null = [];
  private total = 0;

  get sampleCount(): number {
    return this.total;
  }

  get sealed(): boolean {
    return this.chunks === null;
  }

  append(chunk: Int16Array): void {
    if (!this.chunks) throw new Error('[audio] cannot append to a sealed accumulator');
    if (!chunk.length) return;
    this.chunks.push(chunk);
    this.total += chunk.length;
  }

  seal(sampleRate: number): AudioBuffer {
    if (!this.chunks) throw new Error('[audio] accumulator already sealed');
    const samples = new Int16Array(this.total);
    let offset = 0;
    for (const chunk of this.chunks) {
      samples.set(chunk, offset);
      offset += chunk.length;
    }
    this.chunks = null;
    return new AudioBuffer(samples, sampleRate);
  }

  discard(): void {
    this.chunks = null;
    this.total = 0;
  }
}

/** int16 → float amplitude in [-1, 1): `sample / 32768`. */
export function toFloat32Samples(samples: Int16Array): Float32Array {
  const out = new Float32Array(samples.length);
  for (let i = 0; i < samples.length; i++) {
    out[i] = samples[i] / 32768;
  }
  return out;
}

export function rms(samples: Int16Array): number {
  if (!samples.length) return 0;
  let sum = 0;
  for (let i = 0; i < samples.length; i++) {
    sum += samples[i] * samples[i];
  }
  return Math.sqrt(sum / samples.length);
}
