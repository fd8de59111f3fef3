/**
 * Audio I/O through external commands speaking raw PCM16 mono on stdio.
 *
 * Defaults target ALSA (`arecord` / `aplay`); any tool that reads or writes
 * headerless S16_LE works (sox, ffmpeg, parec/pacat). Argument lists may use
 * `{rate}`, which is replaced with the sample rate.
 */

import { spawn, type ChildProcess } from 'child_process';
import type { AudioFrameSource, AudioInputDevice, AudioPlayer } from '../core/types';
import { FrameQueue } from './frame-queue';
import { bytesToPcm16, pcm16ToFloat32 } from './pcm';
import { createLogger } from '../utils/logger';

const log = createLogger('CommandAudio');

export const DEFAULT_RECORD_COMMAND = ['arecord', '-q', '-t', 'raw', '-f', 'S16_LE', '-c', '1', '-r', '{rate}'];
export const DEFAULT_PLAY_COMMAND = ['aplay', '-q', '-t', 'raw', '-f', 'S16_LE', '-c', '1', '-r', '{rate}'];

/** Split a configured command line on whitespace. */
export function parseCommand(line: string): string[] {
  return line.trim().split(/\s+/).filter(Boolean);
}

function expand(command: string[], sampleRate: number): [string, string[]] {
  if (command.length === 0) {
    throw new Error('Audio command is empty');
  }
  const argv = command.map((arg) => arg.replace(/\{rate\}/g, String(sampleRate)));
  return [argv[0], argv.slice(1)];
}

export interface CommandAudioInputOptions {
  /** Capture command and arguments (default: arecord) */
  command?: string[];
  /** Capture rate in Hz (default: 16000) */
  sampleRate?: number;
  /** Samples per frame (default: 512) */
  blockSize?: number;
  /** Frames buffered per open stream (default: 64) */
  capacity?: number;
}

/** Longest wait for the previous capture process to release the device. */
const RELEASE_WAIT_MS = 1000;

function waitForExit(proc: ChildProcess, timeoutMs: number): Promise<void> {
  if (proc.exitCode !== null || proc.signalCode !== null) return Promise.resolve();
  return new Promise<void>((resolve) => {
    const done = () => {
      clearTimeout(timer);
      proc.off('exit', done);
      resolve();
    };
    const timer = setTimeout(done, timeoutMs);
    proc.once('exit', done);
  });
}

/**
 * Microphone backed by a capture process. Every open() starts a fresh
 * process; closing the returned source stops it. A capture process that is
 * still shutting down holds the device, so the next one starts after it
 * exits.
 */
export class CommandAudioInput implements AudioInputDevice {
  readonly sampleRate: number;
  private readonly command: string[];
  private readonly blockSize: number;
  private readonly capacity: number | undefined;
  private last: ChildProcess | null = null;

  constructor(options: CommandAudioInputOptions = {}) {
    this.command = options.command ?? DEFAULT_RECORD_COMMAND;
    this.sampleRate = options.sampleRate ?? 16000;
    this.blockSize = options.blockSize ?? 512;
    this.capacity = options.capacity;
  }

  open(): AudioFrameSource {
    const [file, args] = expand(this.command, this.sampleRate);

    let proc: ChildProcess | null = null;
    const queue = new FrameQueue({
      capacity: this.capacity,
      onClose: () => {
        if (proc && proc.exitCode === null && !proc.killed) proc.kill();
      },
    });

    const start = () => {
      if (queue.closed) return;
      proc = this.capture(file, args, queue);
    };

    const previous = this.last;
    if (previous && previous.exitCode === null && previous.signalCode === null) {
      log.debug('Waiting for the previous capture process to exit');
      waitForExit(previous, RELEASE_WAIT_MS)
        .then(start)
        .catch((err: unknown) => {
          log.warn('Capture command failed:', err);
          queue.close();
        });
    } else {
      start();
    }

    return queue;
  }

  private capture(file: string, args: string[], queue: FrameQueue): ChildProcess {
    const proc = spawn(file, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    this.last = proc;
    log.debug(`Capture started: ${file} (pid ${proc.pid ?? '?'})`);

    const frameBytes = this.blockSize * 2;
    let pending: Buffer = Buffer.alloc(0);

    proc.stdout?.on('data', (data: Buffer) => {
      pending = pending.length > 0 ? Buffer.concat([pending, data]) : data;
      while (pending.length >= frameBytes) {
        const frame = pending.subarray(0, frameBytes);
        pending = pending.subarray(frameBytes);
        queue.push(pcm16ToFloat32(bytesToPcm16(frame)));
      }
    });

    proc.stderr?.on('data', (data: Buffer) => {
      log.debug(`${file}: ${data.toString().trim()}`);
    });

    proc.on('error', (err) => {
      log.warn(`Capture command failed: ${err.message}`);
      if (this.last === proc) this.last = null;
      queue.close();
    });

    proc.on('close', (code) => {
      if (!queue.closed) {
        log.debug(`Capture process exited (${code})`);
        queue.close();
      }
    });

    return proc;
  }
}

export interface CommandAudioPlayerOptions {
  /** Playback command and arguments (default: aplay) */
  command?: string[];
}

/** Speaker backed by a playback process fed through stdin. */
export class CommandAudioPlayer implements AudioPlayer {
  private readonly command: string[];
  private current: ChildProcess | null = null;
  private stopped = false;

  constructor(options: CommandAudioPlayerOptions = {}) {
    this.command = options.command ?? DEFAULT_PLAY_COMMAND;
  }

  get playing(): boolean {
    return this.current !== null;
  }

  play(pcm: Int16Array, sampleRate: number): Promise<void> {
    if (this.current) {
      return Promise.reject(new Error('CommandAudioPlayer is already playing'));
    }
    if (pcm.length === 0) return Promise.resolve();

    const [file, args] = expand(this.command, sampleRate);
    this.stopped = false;

    return new Promise<void>((resolve, reject) => {
      const proc = spawn(file, args, { stdio: ['pipe', 'ignore', 'pipe'] });
      this.current = proc;
      let stderr = '';

      proc.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      // EPIPE when the player is killed mid-write
      proc.stdin?.on('error', (err) => {
        if (!this.stopped) log.debug('Playback stdin error:', err);
      });

      proc.on('error', (err) => {
        this.current = null;
        reject(new Error(`Playback command failed: ${err.message}`));
      });

      proc.on('close', (code) => {
        this.current = null;
        if (code === 0 || this.stopped) {
          resolve();
        } else {
          reject(new Error(`Playback exited with code ${code}: ${stderr.trim()}`));
        }
      });

      proc.stdin?.end(Buffer.from(pcm.buffer, pcm.byteOffset, pcm.byteLength));
    });
  }

  stop(): void {
    if (!this.current) return;
    this.stopped = true;
    log.debug('Stopping playback');
    this.current.kill();
  }
}
