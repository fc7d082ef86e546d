import type { AppConfig } from './config-manager.js';
import { ActivationController } from './activation-controller.js';
import { CommandAudioSource, resolveCaptureCommand, type AudioSource } from './audio/capture-source.js';
import { SilenceDetector } from './audio/silence-detector.js';
import { CommandProcessor } from './commands/processor.js';
import { createCommandRegistry } from './commands/registry.js';
import { playCompletionSound } from './completion-sound.js';
import { toPostProcessingConfig } from './post-processing.js';
import { RecordingSession, type CommandExecutor, type SessionResult, type Transcriber } from './recording-session.js';
import { createStatusDisplay, type StatusDisplay } from './status-display.js';
import { typeText } from './text-output.js';

export type DictationDeps = {
  engine: Transcriber;
  commands?: CommandExecutor;
  createAudioSource?: () => AudioSource;
  output?: (text: string) => Promise<void>;
  noise?: () => Promise<void>;
  status?: StatusDisplay | null;
  pollIntervalMs?: number;
  onSessionComplete?: (result: SessionResult) => void;
};

async function typeIntoFocusedWindow(text: string): Promise<void> {
  const result = await typeText(text);
  if (!result.ok) console.error('[output] could not type text:', result.reason);
}

async function playNoise(): Promise<void> {
  await playCompletionSound();
}

/** Wires configuration, the engine and the platform adapters into an activation controller. */
export function createDictationController(config: AppConfig, deps: DictationDeps): ActivationController {
  const recording = config.recording_options;
  const commands = deps.commands ?? new CommandProcessor(createCommandRegistry(config));
  const postProcessing = toPostProcessingConfig(config.post_processing);
  const createAudioSource =
    deps.createAudioSource ??
    (() => new CommandAudioSource(resolveCaptureCommand(recording.capture_command, recording.sample_rate)));
  const useSilenceDetection = recording.recording_mode === 'continuous' && recording.silence_duration > 0;
  let nextSessionId = 0;

  return new ActivationController({
    mode: recording.recording_mode,
    createSession: (callbacks) =>
      new RecordingSession({
        id: ++nextSessionId,
        audioSource: createAudioSource(),
        engine: deps.engine,
        commands,
        postProcessing,
        sampleRate: recording.sample_rate,
        pollIntervalMs: deps.pollIntervalMs,
        silenceDetector: useSilenceDetection
          ? new SilenceDetector({
              sampleRate: recording.sample_rate,
              silenceDurationMs: recording.silence_duration,
              threshold: recording.silence_threshold
            })
          : null,
        callbacks
      }),
    output: deps.output ?? typeIntoFocusedWindow,
    noise: config.misc.noise_on_completion ? deps.noise ?? playNoise : undefined,
    status: deps.status === undefined ? createStatusDisplay(config.misc) : deps.status,
    onSessionComplete: deps.onSessionComplete
  });
}
