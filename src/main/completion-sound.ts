import path from 'node:path';
import fs from 'node:fs';
import os from 'node:os';
import { encodeWav } from './audio/wav.js';
import { hasCmd, runCommand } from './system-command.js';

const TONE_SAMPLE_RATE = 16000;

let soundPath: string | null = null;

/** A short sine beep with a linear fade-out. */
export function synthesizeTone(sampleRate = TONE_SAMPLE_RATE, durationMs = 150, frequency = 880, amplitude = 0.3): Int16Array {
  const count = Math.round((sampleRate * durationMs) / 1000);
  const samples = new Int16Array(count);
  for (let i = 0; i < count; i++) {
    const fade = 1 - i / count;
    samples[i] = Math.round(Math.sin((2 * Math.PI * frequency * i) / sampleRate) * amplitude * fade * 32767);
  }
  return samples;
}

export function ensureCompletionSoundFile(dir = os.tmpdir()): string {
  if (soundPath && fs.existsSync(soundPath)) return soundPath;
  const target = path.join(dir, 'voice-dictation-beep.wav');
  fs.writeFileSync(target, encodeWav(synthesizeTone(), TONE_SAMPLE_RATE));
  soundPath = target;
  return target;
}

export function playerCommands(filePath: string, platform: NodeJS.Platform = process.platform): Array<{ cmd: string; args: string[] }> {
  if (platform === 'darwin') return [{ cmd: 'afplay', args: [filePath] }];
  if (platform === 'win32') {
    const escaped = filePath.replace(/'/g, "''");
    return [{ cmd: 'powershell', args: ['-NoProfile', '-Command', `(New-Object Media.SoundPlayer '${escaped}').PlaySync()`] }];
  }
  return [
    { cmd: 'paplay', args: [filePath] },
    { cmd: 'aplay', args: ['-q', filePath] }
  ];
}

export async function playCompletionSound(platform: NodeJS.Platform = process.platform): Promise<boolean> {
  const file = ensureCompletionSoundFile();
  for (const { cmd, args } of playerCommands(file, platform)) {
    if (platform === 'linux' && !(await hasCmd(cmd))) continue;
    const result = await runCommand(cmd, args);
    if (result.ok) return true;
    console.debug('[sound] player failed', { cmd, reason: result.reason });
  }
  console.warn('[sound] no audio player could play the completion sound');
  return false;
}
