/**
 * PiperTextToSpeech — local synthesis with the `piper` binary.
 *
 * Runs `piper --model <model> --output-raw [--speaker <id>]` per utterance,
 * writes the text to stdin and plays the raw PCM16 it prints.
 */

import { spawn, type ChildProcess } from 'child_process';
import type { AudioPlayer, TextToSpeech } from '../core/types';
import { SpeechSynthesisError } from '../core/errors';
import { bytesToPcm16 } from '../audio/pcm';
import { createLogger } from '../utils/logger';

const log = createLogger('PiperTTS');

export interface PiperTextToSpeechOptions {
  /** Path to the voice's .onnx model */
  model: string;
  player: AudioPlayer;
  /** Executable name or path (default: 'piper') */
  binary?: string;
  /** Speaker id for multi-speaker models */
  speaker?: string;
  /** Rate of the model's output (default: 22050) */
  sampleRate?: number;
}

export class PiperTextToSpeech implements TextToSpeech {
  private readonly model: string;
  private readonly player: AudioPlayer;
  private readonly binary: string;
  private readonly speaker: string | undefined;
  private readonly sampleRate: number;
  private current: ChildProcess | null = null;
  private generation = 0;

  constructor(options: PiperTextToSpeechOptions) {
    if (!options.model) {
      throw new Error('PiperTextToSpeech requires a model path');
    }
    this.model = options.model;
    this.player = options.player;
    this.binary = options.binary ?? 'piper';
    this.speaker = options.speaker;
    this.sampleRate = options.sampleRate ?? 22050;
  }

  async speak(text: string): Promise<void> {
    if (!text.trim()) return;
    const generation = this.generation;

    const audio = await this.synthesize(text);
    if (generation !== this.generation) return;
    if (audio.length < 2) {
      throw new SpeechSynthesisError('Piper produced no audio');
    }

    const pcm = bytesToPcm16(audio);
    log.debug(`Playing ${(pcm.length / this.sampleRate).toFixed(2)}s of speech`);
    await this.player.play(pcm, this.sampleRate);
  }

  stop(): void {
    this.generation++;
    this.current?.kill();
    this.player.stop();
  }

  private synthesize(text: string): Promise<Buffer> {
    const args = ['--model', this.model, '--output-raw'];
    if (this.speaker) args.push('--speaker', this.speaker);

    return new Promise<Buffer>((resolve, reject) => {
      const proc = spawn(this.binary, args, { stdio: ['pipe', 'pipe', 'pipe'] });
      this.current = proc;
      const generation = this.generation;
      const chunks: Buffer[] = [];
      let stderr = '';

      proc.stdout?.on('data', (data: Buffer) => chunks.push(data));
      proc.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      // EPIPE when piper dies before reading its input
      proc.stdin?.on('error', (err) => log.debug('Piper stdin error:', err.message));

      proc.on('error', (err) => {
        if (this.current === proc) this.current = null;
        reject(new SpeechSynthesisError(`Could not start ${this.binary}: ${err.message}`, { cause: err }));
      });

      proc.on('close', (code) => {
        if (this.current === proc) this.current = null;
        if (code === 0 || generation !== this.generation) {
          resolve(Buffer.concat(chunks));
        } else {
          reject(new SpeechSynthesisError(`Piper exited with code ${code}: ${stderr.trim()}`));
        }
      });

      proc.stdin?.end(`${text.trim()}\n`);
    });
  }
}
