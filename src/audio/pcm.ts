/** Energy gate shared by barge-in and follow-up detection, on a [-1, 1] scale. */
export const DEFAULT_SPEECH_THRESHOLD = 0.02;

/** Mean absolute amplitude of a normalized frame; 0 for an empty frame. */
export function meanAbsoluteAmplitude(frame: Float32Array): number {
  if (frame.length === 0) return 0;
  let sum = 0;
  for (let i = 0; i < frame.length; i++) {
    sum += Math.abs(frame[i]);
  }
  return sum / frame.length;
}

export function pcm16ToFloat32(pcm: Int16Array): Float32Array {
  const out = new Float32Array(pcm.length);
  for (let i = 0; i < pcm.length; i++) {
    out[i] = pcm[i] / 32768;
  }
  return out;
}

/** Clips to [-1, 1] before scaling. */
export function float32ToPcm16(samples: Float32Array): Int16Array {
  const out = new Int16Array(samples.length);
  for (let i = 0; i < samples.length; i++) {
    const s = Math.max(-1, Math.min(1, samples[i]));
    out[i] = Math.round(s * 32767);
  }
  return out;
}

/**
 * View little-endian PCM16 bytes as samples. Copies when the buffer is not
 * 2-byte aligned (Node pools small Buffers at odd offsets).
 */
export function bytesToPcm16(bytes: Uint8Array): Int16Array {
  const usable = bytes.byteLength - (bytes.byteLength % 2);
  if (bytes.byteOffset % 2 === 0) {
    return new Int16Array(bytes.buffer, bytes.byteOffset, usable / 2);
  }
  const aligned = new Uint8Array(usable);
  aligned.set(bytes.subarray(0, usable));
  return new Int16Array(aligned.buffer);
}

export function concatPcm16(chunks: Int16Array[]): Int16Array {
  const total = chunks.reduce((sum, c) => sum + c.length, 0);
  const out = new Int16Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}

/** Average interleaved channels into one. A trailing partial frame is dropped. */
export function downmixPcm16(pcm: Int16Array, channels: number): Int16Array {
  if (channels <= 1) return pcm;
  const frames = Math.floor(pcm.length / channels);
  const out = new Int16Array(frames);
  for (let i = 0; i < frames; i++) {
    let sum = 0;
    for (let c = 0; c < channels; c++) {
      sum += pcm[i * channels + c];
    }
    out[i] = Math.round(sum / channels);
  }
  return out;
}
