import type { RecordingMode } from './config-manager.js';
import type { RecordingSession, SessionCallbacks, SessionResult } from './recording-session.js';
import type { StatusDisplay } from './status-display.js';
import { errorMessage } from './errors.js';
import { createControllerStore, type ControllerState, type ControllerStore } from '../store/controller-store.js';

export type SessionFactory = (callbacks: SessionCallbacks) => RecordingSession;

export type ActivationControllerOptions = {
  mode: RecordingMode;
  createSession: SessionFactory;
  /** Types the final text into the focused window; called once per completed session, with '' when nothing is left. */
  output?: (text: string) => Promise<void>;
  /** Completion noise, played after the text is delivered. */
  noise?: () => Promise<void>;
  status?: StatusDisplay | null;
  onSessionComplete?: (result: SessionResult) => void;
};

/**
 * Maps activate/deactivate events onto the current recording session:
 *
 * | mode            | activate, no session | activate, recording | activate, transcribing | deactivate |
 * |-----------------|----------------------|---------------------|------------------------|------------|
 * | press_to_toggle | start                | stop                | no-op                  | no-op      |
 * | continuous      | start loop           | stop, loop on       | loop off               | no-op      |
 * | hold_to_record  | start                | no-op               | no-op                  | stop       |
 *
 * In continuous mode a press while the last capture is being transcribed
 * toggles dictation off: that session finishes and no new one starts.
 */
export class ActivationController {
  readonly mode: RecordingMode;
  private readonly store: ControllerStore = createControllerStore();
  private settling: Promise<void> = Promise.resolve();

  constructor(private readonly options: ActivationControllerOptions) {
    this.mode = options.mode;
  }

  getState(): ControllerState {
    return this.store.getState();
  }

  onActivate(): void {
    const { session } = this.store.getState();
    if (!session) {
      if (this.mode === 'continuous') this.store.setState({ loopActive: true });
      this.startSession();
      return;
    }
    if (this.mode === 'continuous' && session.state === 'transcribing') {
      if (this.store.getState().loopActive) console.log('[controller] continuous dictation toggled off');
      this.store.setState({ loopActive: false });
      return;
    }
    if (this.mode === 'press_to_toggle' || this.mode === 'continuous') {
      session.stopRecording();
    }
  }

  onDeactivate(): void {
    if (this.mode !== 'hold_to_record') return;
    this.store.getState().session?.stopRecording();
  }

  /** Ends the continuous loop and aborts a session that is still recording. */
  stop(): void {
    this.store.setState({ loopActive: false });
    this.store.getState().session?.cancel();
  }

  /** Resolves once the current session (if any) has finished and its result was delivered. */
  async whenSettled(): Promise<void> {
    const { session } = this.store.getState();
    if (session) await session.done;
    await this.settling;
  }

  private startSession(): RecordingSession | null {
    if (this.store.getState().session) return null;
    const session: RecordingSession = this.options.createSession({
      onStatus: (status, text) => {
        if (this.store.getState().session === session) this.store.setState({ status });
        this.options.status?.update(status, text);
      },
      onComplete: (result) => {
        this.settling = this.handleComplete(session, result).catch((err) => {
          console.error('[controller] completion handling failed:', errorMessage(err));
        });
      }
    });
    this.store.setState({ session, status: 'recording' });
    session.start();
    return session;
  }

  private async handleComplete(session: RecordingSession, result: SessionResult): Promise<void> {
    if (result.outcome === 'completed' && this.options.output) {
      try {
        await this.options.output(result.text);
      } catch (err) {
        console.error('[controller] text output failed:', errorMessage(err));
      }
    }
    if (result.outcome === 'completed' && this.options.noise) {
      try {
        await this.options.noise();
      } catch (err) {
        console.error('[controller] completion noise failed:', errorMessage(err));
      }
    }

    const state = this.store.getState();
    if (state.session !== session) return;
    const loopActive = state.loopActive && result.outcome !== 'capture_failed';
    if (state.loopActive && !loopActive) console.error('[controller] audio capture failed, continuous dictation stopped');
    this.store.setState({
      session: null,
      status: 'idle',
      loopActive,
      completedSessions: state.completedSessions + 1,
      lastResult: result
    });
    this.options.onSessionComplete?.(result);

    if (this.mode === 'continuous' && loopActive) this.startSession();
  }
}
