import { EventEmitter } from 'node:events';
import { beforeEach, describe, expect, it, vi } from 'vitest';

const { spawnMock } = vi.hoisted(() => ({
  spawnMock: vi.fn()
}));

vi.mock('node:child_process', () => ({
  spawn: spawnMock,
  default: {
    spawn: spawnMock
  }
}));

import {
  CommandAudioSource,
  decodePcm16,
  defaultCaptureCommand,
  parseCaptureCommand
} from '../audio/capture-source.js';

class FakeCapture extends EventEmitter {
  stdout = new EventEmitter();
  stderr = new EventEmitter();
  exitCode: number | null = null;
  kill = vi.fn();
}

function pcm(...samples: number[]): Buffer {
  const buf = Buffer.alloc(samples.length * 2);
  samples.forEach((sample, i) => buf.writeInt16LE(sample, i * 2));
  return buf;
}

beforeEach(() => {
  spawnMock.mockReset();
});

describe('capture command', () => {
  it('uses arecord on linux and sox elsewhere', () => {
    expect(defaultCaptureCommand(16000, 'linux')).toEqual({
      command: 'arecord',
      args: ['-q', '-t', 'raw', '-f', 'S16_LE', '-c', '1', '-r', '16000']
    });
    expect(defaultCaptureCommand(22050, 'darwin').command).toBe('sox');
    expect(defaultCaptureCommand(22050, 'darwin').args).toContain('22050');
  });

  it('substitutes the sample rate into a configured command', () => {
    expect(parseCaptureCommand('  ffmpeg -f pulse -i default -ar {sample_rate} -f s16le - ', 8000)).toEqual({
      command: 'ffmpeg',
      args: ['-f', 'pulse', '-i', 'default', '-ar', '8000', '-f', 's16le', '-']
    });
    expect(parseCaptureCommand('   ', 8000)).toBeNull();
  });
});

describe('decodePcm16', () => {
  it('keeps an odd trailing byte for the next read', () => {
    const bytes = Buffer.concat([pcm(1, -2), Buffer.from([0x7f])]);
    const { samples, rest } = decodePcm16(bytes);
    expect(Array.from(samples)).toEqual([1, -2]);
    expect(Array.from(rest)).toEqual([0x7f]);
  });
});

describe('CommandAudioSource', () => {
  it('buffers stdout and returns samples across split chunks', () => {
    const proc = new FakeCapture();
    spawnMock.mockReturnValue(proc);
    const source = new CommandAudioSource({ command: 'arecord', args: ['-q'] });

    source.open();
    expect(spawnMock).toHaveBeenCalledWith('arecord', ['-q'], { stdio: ['ignore', 'pipe', 'pipe'] });
    expect(source.readAvailableSamples().length).toBe(0);

    const bytes = pcm(100, -100, 7);
    proc.stdout.emit('data', bytes.subarray(0, 3));
    expect(Array.from(source.readAvailableSamples())).toEqual([100]);
    proc.stdout.emit('data', bytes.subarray(3));
    expect(Array.from(source.readAvailableSamples())).toEqual([-100, 7]);

    source.close();
    expect(proc.kill).toHaveBeenCalledWith('SIGTERM');
  });

  it('throws from reads once the capture program failed to start', () => {
    const proc = new FakeCapture();
    spawnMock.mockReturnValue(proc);
    const source = new CommandAudioSource({ command: 'missing-recorder', args: [] });

    source.open();
    proc.emit('error', new Error('spawn missing-recorder ENOENT'));

    expect(() => source.readAvailableSamples()).toThrow('ENOENT');
  });

  it('throws from reads after the capture program exits on its own', () => {
    const proc = new FakeCapture();
    spawnMock.mockReturnValue(proc);
    const source = new CommandAudioSource({ command: 'arecord', args: [] });

    source.open();
    proc.stdout.emit('data', pcm(9));
    proc.emit('exit', 1, null);

    expect(Array.from(source.readAvailableSamples())).toEqual([9]);
    expect(() => source.readAvailableSamples()).toThrow('capture program exited (code 1, signal none)');
  });

  it('does not report a failure when the source was closed', () => {
    const proc = new FakeCapture();
    spawnMock.mockReturnValue(proc);
    const source = new CommandAudioSource({ command: 'arecord', args: [] });

    source.open();
    source.close();
    proc.emit('exit', null, 'SIGTERM');

    expect(source.readAvailableSamples().length).toBe(0);
  });
});
