import { afterEach, describe, expect, it, vi } from 'vitest';
import type { AudioBuffer } from '../audio/audio-buffer.js';
import type { AudioSource } from '../audio/capture-source.js';
import { createDefaultConfig, type AppConfig, type RecordingMode } from '../config-manager.js';
import { createDictationController } from '../dictation.js';

class QueueAudioSource implements AudioSource {
  readonly queue: number[] = [];
  open = vi.fn();
  close = vi.fn();

  readAvailableSamples(): Int16Array {
    const samples = Int16Array.from(this.queue);
    this.queue.length = 0;
    return samples;
  }
}

function configFor(mode: RecordingMode, patch: (cfg: AppConfig) => void = () => {}): AppConfig {
  const cfg = createDefaultConfig();
  cfg.recording_options.recording_mode = mode;
  patch(cfg);
  return cfg;
}

function setup(config: AppConfig, text = 'Hello.') {
  const sources: QueueAudioSource[] = [];
  const transcribe = vi.fn(async (_buffer: AudioBuffer) => text);
  const output = vi.fn(async (_text: string) => {});
  const noise = vi.fn(async () => {});
  const controller = createDictationController(config, {
    engine: { transcribe },
    createAudioSource: () => {
      const source = new QueueAudioSource();
      sources.push(source);
      return source;
    },
    output,
    noise,
    status: null,
    pollIntervalMs: 10
  });
  return { controller, sources, transcribe, output, noise };
}

afterEach(() => {
  vi.useRealTimers();
});

describe('createDictationController', () => {
  it('runs a toggle session through post-processing and plays the completion noise', async () => {
    const { controller, sources, transcribe, output, noise } = setup(
      configFor('press_to_toggle', (cfg) => {
        cfg.misc.noise_on_completion = true;
      })
    );

    controller.onActivate();
    sources[0].queue.push(4, 5, 6);
    controller.onActivate();
    await controller.whenSettled();

    expect(transcribe).toHaveBeenCalledTimes(1);
    expect(transcribe.mock.calls[0][0].sampleRate).toBe(16000);
    expect(Array.from(transcribe.mock.calls[0][0].samples)).toEqual([4, 5, 6]);
    expect(output).toHaveBeenCalledWith('Hello. ');
    expect(noise).toHaveBeenCalledTimes(1);
    expect(sources[0].close).toHaveBeenCalledTimes(1);
  });

  it('stays quiet unless noise_on_completion is set', async () => {
    const { controller, noise, output } = setup(configFor('hold_to_record'));

    controller.onActivate();
    controller.onDeactivate();
    await controller.whenSettled();

    expect(output).toHaveBeenCalledWith('Hello. ');
    expect(noise).not.toHaveBeenCalled();
  });

  it('applies the configured post-processing', async () => {
    const { controller, output } = setup(
      configFor('press_to_toggle', (cfg) => {
        cfg.post_processing = { remove_trailing_period: true, add_trailing_space: true, remove_capitalization: true };
      })
    );

    controller.onActivate();
    controller.onActivate();
    await controller.whenSettled();

    expect(output).toHaveBeenCalledWith('hello ');
  });

  it('ends continuous captures on trailing silence and starts the next one', async () => {
    vi.useFakeTimers();
    const { controller, sources, transcribe, output } = setup(
      configFor('continuous', (cfg) => {
        cfg.recording_options.sample_rate = 1000;
        cfg.recording_options.silence_duration = 100;
        cfg.recording_options.silence_threshold = 500;
      })
    );

    controller.onActivate();
    sources[0].queue.push(...new Array<number>(20).fill(3000));
    vi.advanceTimersByTime(10);
    sources[0].queue.push(...new Array<number>(100).fill(0));
    vi.advanceTimersByTime(10);
    await controller.whenSettled();

    expect(transcribe.mock.calls[0][0].samples.length).toBe(120);
    expect(output).toHaveBeenCalledWith('Hello. ');
    expect(sources).toHaveLength(2);
    expect(controller.getState().session?.state).toBe('recording');

    controller.stop();
    expect(controller.getState().loopActive).toBe(false);
  });
});
