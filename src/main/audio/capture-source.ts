import { spawn, type ChildProcess } from 'node:child_process';

/** Pull-based sample producer, opened once per recording session. */
export interface AudioSource {
  open(): void;
  /**
   * Samples captured since the previous call; empty when nothing new arrived.
   * Throws once the underlying device or process has failed.
   */
  readAvailableSamples(): Int16Array;
  close(): void;
}

export type CaptureCommand = {
  command: string;
  args: string[];
};

export function defaultCaptureCommand(sampleRate: number, platform: NodeJS.Platform = process.platform): CaptureCommand {
  const rate = String(sampleRate);
  if (platform === 'linux') {
    return { command: 'arecord', args: ['-q', '-t', 'raw', '-f', 'S16_LE', '-c', '1', '-r', rate] };
  }
  return {
    command: 'sox',
    args: ['-q', '-d', '-t', 'raw', '-b', '16', '-e', 'signed-integer', '-c', '1', '-r', rate, '-']
  };
}

/**
 * Splits a configured capture command line on whitespace. `{sample_rate}`
 * is replaced by the configured rate.
 */
export function parseCaptureCommand(commandLine: string, sampleRate: number): CaptureCommand | null {
  const parts = commandLine
    .trim()
    .split(/\s+/)
    .filter(Boolean)
    .map((part) => part.replace(/\{sample_rate\}/g, String(sampleRate)));
  if (!parts.length) return null;
  const [command, ...args] = parts;
  return { command, args };
}

export function resolveCaptureCommand(commandLine: string, sampleRate: number): CaptureCommand {
  return parseCaptureCommand(commandLine, sampleRate) ?? defaultCaptureCommand(sampleRate);
}

/** Decodes little-endian s16 bytes; a trailing odd byte is returned as `rest`. */
export function decodePcm16(bytes: Buffer): { samples: Int16Array; rest: Buffer } {
  const usable = bytes.length - (bytes.length % 2);
  const samples = new Int16Array(usable / 2);
  for (let i = 0; i < samples.length; i++) {
    samples[i] = bytes.readInt16LE(i * 2);
  }
  return { samples, rest: bytes.subarray(usable) };
}

/**
 * Runs an external recorder (arecord, sox, ffmpeg…) that streams raw PCM to
 * stdout and buffers its output until the session reads it.
 */
export class CommandAudioSource implements AudioSource {
  private proc: ChildProcess | null = null;
  private pending: Buffer[] = [];
  private carry: Buffer = Buffer.alloc(0);
  private failure: Error | null = null;

  constructor(private readonly capture: CaptureCommand) {}

  open(): void {
    if (this.proc) return;
    this.pending = [];
    this.carry = Buffer.alloc(0);
    this.failure = null;
    console.debug('[audio] starting capture', this.capture.command, this.capture.args.join(' '));
    const proc = spawn(this.capture.command, this.capture.args, { stdio: ['ignore', 'pipe', 'pipe'] });
    proc.stdout?.on('data', (chunk: Buffer) => {
      this.pending.push(chunk);
    });
    proc.stderr?.on('data', (chunk: Buffer) => {
      console.debug('[audio]', String(chunk).trimEnd());
    });
    proc.on('error', (err) => {
      console.error('[audio] capture process failed:', err.message);
      if (this.proc === proc) this.proc = null;
      this.failure = err;
    });
    proc.on('exit', (code, signal) => {
      // close() detaches the process before killing it, so any exit seen here is unexpected.
      if (this.proc !== proc) return;
      console.error('[audio] capture exited', { code, signal });
      this.proc = null;
      if (!this.failure) this.failure = new Error(`capture program exited (code ${code ?? 'null'}, signal ${signal ?? 'none'})`);
    });
    this.proc = proc;
  }

  readAvailableSamples(): Int16Array {
    if (!this.pending.length) {
      if (this.failure) throw this.failure;
      return new Int16Array(0);
    }
    const bytes = Buffer.concat([this.carry, ...this.pending]);
    this.pending = [];
    const { samples, rest } = decodePcm16(bytes);
    this.carry = Buffer.from(rest);
    return samples;
  }

  close(): void {
    const proc = this.proc;
    this.proc = null;
    if (proc && proc.exitCode === null) proc.kill('SIGTERM');
  }
}
