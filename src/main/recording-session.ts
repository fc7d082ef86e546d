import { AudioAccumulator, type AudioBuffer } from './audio/audio-buffer.js';
import type { AudioSource } from './audio/capture-source.js';
import type { SilenceDetector } from './audio/silence-detector.js';
import type { CommandOutcome } from './commands/registry.js';
import { errorMessage } from './errors.js';
import { applyPostProcessing, type PostProcessingConfig } from './post-processing.js';

export type SessionState = 'idle' | 'recording' | 'transcribing' | 'stopped';

/** Transitions reported to the status display. */
export type SessionStatus = Exclude<SessionState, 'idle'>;

export type SessionOutcome = 'completed' | 'cancelled' | 'capture_failed';

export type SessionResult = {
  text: string;
  outcome: SessionOutcome;
  commandExecuted: boolean;
  /** Set when the backend or the pipeline failed; `text` is then empty. */
  error?: Error;
};

export type SessionCallbacks = {
  onStatus?: (status: SessionStatus, text?: string) => void;
  onComplete?: (result: SessionResult) => void;
};

export interface Transcriber {
  transcribe(buffer: AudioBuffer): Promise<string>;
}

export interface CommandExecutor {
  execute(rawText: string): Promise<CommandOutcome>;
}

export type RecordingSessionOptions = {
  id: number;
  audioSource: AudioSource;
  engine: Transcriber;
  commands: CommandExecutor;
  postProcessing: PostProcessingConfig;
  sampleRate: number;
  /** How often samples are pulled from the source while recording. */
  pollIntervalMs?: number;
  /** Ends the capture on trailing silence (continuous mode). */
  silenceDetector?: SilenceDetector | null;
  callbacks?: SessionCallbacks;
};

const DEFAULT_POLL_INTERVAL_MS = 50;

/**
 * One capture → transcribe → post-process cycle.
 *
 * idle → recording → transcribing → stopped, or idle → recording → stopped
 * when cancelled or when capture fails. The result is delivered exactly once,
 * through `onComplete` and the `done` promise.
 */
export class RecordingSession {
  readonly id: number;
  readonly done: Promise<SessionResult>;

  private currentState: SessionState = 'idle';
  private readonly cancellation = new AbortController();
  private accumulator = new AudioAccumulator();
  private pollTimer: NodeJS.Timeout | null = null;
  private settled = false;
  private silenceTripped = false;
  private resolveDone: (result: SessionResult) => void = () => {};

  constructor(private readonly options: RecordingSessionOptions) {
    this.id = options.id;
    this.done = new Promise<SessionResult>((resolve) => {
      this.resolveDone = resolve;
    });
  }

  get state(): SessionState {
    return this.currentState;
  }

  isActive(): boolean {
    return this.currentState === 'recording' || this.currentState === 'transcribing';
  }

  /** Idle → Recording. Returns false when the session was already started. */
  start(): boolean {
    if (this.currentState !== 'idle') return false;
    try {
      this.options.audioSource.open();
    } catch (err) {
      console.error(`[session ${this.id}] could not open audio source:`, errorMessage(err));
      this.accumulator.discard();
      this.finish({ text: '', outcome: 'capture_failed', commandExecuted: false, error: toError(err) });
      return false;
    }
    this.currentState = 'recording';
    this.options.silenceDetector?.reset();
    console.log(`[session ${this.id}] recording`);
    this.emitStatus('recording');
    this.pollTimer = setInterval(() => this.pump(), this.options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS);
    return true;
  }

  /** Recording → Transcribing: closes the buffer and runs the pipeline in the background. */
  stopRecording(): boolean {
    if (this.currentState !== 'recording') return false;
    this.clearPollTimer();
    if (!this.drain()) return false;
    this.options.audioSource.close();
    const buffer = this.accumulator.seal(this.options.sampleRate);
    this.currentState = 'transcribing';
    console.log(`[session ${this.id}] transcribing`, { samples: buffer.length, durationMs: Math.round(buffer.durationMs) });
    this.emitStatus('transcribing');
    this.process(buffer).catch((err) => {
      console.error(`[session ${this.id}] pipeline failed:`, errorMessage(err));
      this.finish({ text: '', outcome: 'completed', commandExecuted: false, error: toError(err) });
    });
    return true;
  }

  /** Recording → Stopped with an empty result; the buffer is discarded without transcription. */
  cancel(): boolean {
    if (this.currentState !== 'recording') return false;
    this.cancellation.abort();
    this.clearPollTimer();
    this.options.audioSource.close();
    this.accumulator.discard();
    console.log(`[session ${this.id}] cancelled`);
    this.finish({ text: '', outcome: 'cancelled', commandExecuted: false });
    return true;
  }

  private pump(): void {
    if (this.currentState !== 'recording') return;
    if (!this.drain()) return;
    if (this.silenceTripped) {
      console.log(`[session ${this.id}] silence detected, ending capture`);
      this.stopRecording();
    }
  }

  /** Pulls pending samples; on a source failure the session ends as capture_failed. */
  private drain(): boolean {
    let chunk: Int16Array;
    try {
      chunk = this.options.audioSource.readAvailableSamples();
    } catch (err) {
      console.error(`[session ${this.id}] audio capture failed:`, errorMessage(err));
      this.clearPollTimer();
      this.options.audioSource.close();
      this.accumulator.discard();
      this.finish({ text: '', outcome: 'capture_failed', commandExecuted: false, error: toError(err) });
      return false;
    }
    if (!chunk.length) return true;
    this.accumulator.append(chunk);
    if (this.options.silenceDetector?.feed(chunk)) this.silenceTripped = true;
    return true;
  }

  private async process(buffer: AudioBuffer): Promise<void> {
    let text = '';
    let error: Error | undefined;
    if (this.cancellation.signal.aborted) {
      this.finish({ text: '', outcome: 'cancelled', commandExecuted: false });
      return;
    }
    try {
      text = await this.options.engine.transcribe(buffer);
    } catch (err) {
      error = toError(err);
      console.error(`[session ${this.id}] transcription failed:`, errorMessage(err));
    }
    if (!text) {
      this.finish({ text: '', outcome: 'completed', commandExecuted: false, error });
      return;
    }

    const command = await this.options.commands.execute(text);
    const remainder = command.text.trim();
    const finalText = command.executed && !remainder ? '' : applyPostProcessing(command.text, this.options.postProcessing);
    this.finish({ text: finalText, outcome: 'completed', commandExecuted: command.executed });
  }

  private finish(result: SessionResult): void {
    if (this.settled) return;
    this.settled = true;
    this.currentState = 'stopped';
    this.emitStatus('stopped', result.text);
    try {
      this.options.callbacks?.onComplete?.(result);
    } catch (err) {
      console.error(`[session ${this.id}] completion callback failed:`, errorMessage(err));
    }
    this.resolveDone(result);
  }

  private emitStatus(status: SessionStatus, text?: string): void {
    const onStatus = this.options.callbacks?.onStatus;
    if (!onStatus) return;
    queueMicrotask(() => {
      try {
        onStatus(status, text);
      } catch (err) {
        console.error(`[session ${this.id}] status callback failed:`, errorMessage(err));
      }
    });
  }

  private clearPollTimer(): void {
    if (!this.pollTimer) return;
    clearInterval(this.pollTimer);
    this.pollTimer = null;
  }
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
