export const WAV_HEADER_SIZE = 44;

/**
 * Encodes 16-bit PCM samples as a canonical RIFF/WAVE file.
 */
export function encodeWav(samples: Int16Array, sampleRate: number, channels = 1): Buffer {
  const bitDepth = 16;
  const bytesPerSample = bitDepth / 8;
  const dataSize = samples.length * bytesPerSample;
  const byteRate = sampleRate * channels * bytesPerSample;
  const blockAlign = channels * bytesPerSample;
  const out = Buffer.alloc(WAV_HEADER_SIZE + dataSize);

  // RIFF chunk descriptor
  out.write('RIFF', 0);
  out.writeUInt32LE(36 + dataSize, 4);
  out.write('WAVE', 8);

  // fmt sub-chunk
  out.write('fmt ', 12);
  out.writeUInt32LE(16, 16); // PCM
  out.writeUInt16LE(1, 20);
  out.writeUInt16LE(channels, 22);
  out.writeUInt32LE(sampleRate, 24);
  out.writeUInt32LE(byteRate, 28);
  out.writeUInt16LE(blockAlign, 32);
  out.writeUInt16LE(bitDepth, 34);

  // data sub-chunk
  out.write('data', 36);
  out.writeUInt32LE(dataSize, 40);

  for (let i = 0; i < samples.length; i++) {
    out.writeInt16LE(samples[i], WAV_HEADER_SIZE + i * bytesPerSample);
  }
  return out;
}
