import { bytesToPcm16 } from './pcm';

export interface DecodedWav {
  pcm: Int16Array;
  sampleRate: number;
  channels: number;
}

/** Wrap mono PCM16 samples in a 44-byte RIFF/WAVE header. */
export function encodeWav(pcm: Int16Array, sampleRate: number): Buffer {
  const dataSize = pcm.byteLength;
  const header = Buffer.alloc(44);
  header.write('RIFF', 0);
  header.writeUInt32LE(36 + dataSize, 4);
  header.write('WAVE', 8);
  header.write('fmt ', 12);
  header.writeUInt32LE(16, 16);       // fmt chunk size
  header.writeUInt16LE(1, 20);        // PCM format
  header.writeUInt16LE(1, 22);        // mono
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(sampleRate * 2, 28); // byte rate
  header.writeUInt16LE(2, 32);        // block align
  header.writeUInt16LE(16, 34);       // bits per sample
  header.write('data', 36);
  header.writeUInt32LE(dataSize, 40);

  const data = Buffer.from(pcm.buffer, pcm.byteOffset, pcm.byteLength);
  return Buffer.concat([header, data]);
}

/**
 * Decode a PCM16 WAV file. Walks the chunk list rather than assuming a
 * 44-byte header, since some encoders add LIST/fact chunks. Multi-channel
 * data is returned interleaved as-is.
 */
export function decodeWav(bytes: Uint8Array): DecodedWav {
  const buf = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  if (buf.byteLength < 12 || buf.toString('ascii', 0, 4) !== 'RIFF' || buf.toString('ascii', 8, 12) !== 'WAVE') {
    throw new Error('Not a RIFF/WAVE file');
  }

  let sampleRate = 0;
  let channels = 0;
  let bitsPerSample = 0;
  let offset = 12;

  while (offset + 8 <= buf.byteLength) {
    const id = buf.toString('ascii', offset, offset + 4);
    const size = buf.readUInt32LE(offset + 4);
    const body = offset + 8;

    if (id === 'fmt ') {
      const format = buf.readUInt16LE(body);
      if (format !== 1) {
        throw new Error(`Unsupported WAV format ${format} (only PCM is supported)`);
      }
      channels = buf.readUInt16LE(body + 2);
      sampleRate = buf.readUInt32LE(body + 4);
      bitsPerSample = buf.readUInt16LE(body + 14);
    } else if (id === 'data') {
      if (!sampleRate) throw new Error('WAV data chunk precedes fmt chunk');
      if (bitsPerSample !== 16) {
        throw new Error(`Unsupported WAV bit depth ${bitsPerSample}`);
      }
      // Streaming encoders write 0 or 0xFFFFFFFF when the length is unknown
      const end = size === 0 || size === 0xffffffff ? buf.byteLength : Math.min(buf.byteLength, body + size);
      return { pcm: bytesToPcm16(buf.subarray(body, end)), sampleRate, channels };
    }

    // Chunks are word-aligned
    offset = body + size + (size % 2);
  }

  throw new Error('WAV file has no data chunk');
}
