import type { AudioCues, AudioPlayer, CueName } from '../core/types';
import { concatPcm16, float32ToPcm16 } from './pcm';
import { createLogger } from '../utils/logger';

const log = createLogger('ToneCues');

export const CUE_SAMPLE_RATE = 22050;

/** Linear frequency sweep with a fade-in / sustain / fade-out envelope. */
export function sweep(fromHz: number, toHz: number, seconds: number, sampleRate = CUE_SAMPLE_RATE, peak = 0.8): Float32Array {
  const n = Math.floor(sampleRate * seconds);
  const out = new Float32Array(n);
  const third = Math.floor(n / 3);
  let phase = 0;
  for (let i = 0; i < n; i++) {
    const freq = fromHz + (toHz - fromHz) * (i / n);
    phase += (2 * Math.PI * freq) / sampleRate;
    let env = peak;
    if (i < third) env = peak * (i / third);
    else if (i >= n - third) env = peak * ((n - i) / third);
    out[i] = Math.sin(phase) * env;
  }
  return out;
}

/** Sine beep with 10ms squared fades. */
export function beep(freq: number, seconds: number, sampleRate = CUE_SAMPLE_RATE, volume = 0.6): Float32Array {
  const n = Math.floor(sampleRate * seconds);
  const out = new Float32Array(n);
  const fade = Math.min(Math.floor(sampleRate * 0.01), Math.floor(n / 2));
  for (let i = 0; i < n; i++) {
    let env = 1;
    if (fade > 0 && i < fade) env = (i / fade) ** 2;
    else if (fade > 0 && i >= n - fade) env = ((n - i) / fade) ** 2;
    out[i] = Math.sin((2 * Math.PI * freq * i) / sampleRate) * env * volume;
  }
  return out;
}

function silence(seconds: number, sampleRate = CUE_SAMPLE_RATE): Float32Array {
  return new Float32Array(Math.floor(sampleRate * seconds));
}

function render(...parts: Float32Array[]): Int16Array {
  return concatPcm16(parts.map(float32ToPcm16));
}

const RENDERERS: Record<CueName, () => Int16Array> = {
  listening: () => render(sweep(400, 800, 0.4)),
  processing: () => render(sweep(800, 500, 0.35)),
  thinking: () => render(beep(600, 0.12)),
  speaking: () => render(beep(900, 0.08, CUE_SAMPLE_RATE, 0.4)),
  error: () => render(beep(300, 0.12), silence(0.08), beep(300, 0.12)),
};

/**
 * Short synthesized tones marking assistant state changes. Rendered
 * lazily on first use, then cached.
 */
export class ToneCues implements AudioCues {
  private readonly player: AudioPlayer;
  private readonly cache = new Map<CueName, Int16Array>();

  constructor(player: AudioPlayer) {
    this.player = player;
  }

  /** PCM16 samples of a cue at CUE_SAMPLE_RATE. */
  samples(cue: CueName): Int16Array {
    let pcm = this.cache.get(cue);
    if (!pcm) {
      pcm = RENDERERS[cue]();
      this.cache.set(cue, pcm);
    }
    return pcm;
  }

  async play(cue: CueName): Promise<void> {
    log.debug(`Cue: ${cue}`);
    await this.player.play(this.samples(cue), CUE_SAMPLE_RATE);
  }
}
