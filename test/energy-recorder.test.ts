import { describe, it, expect, vi } from 'vitest';
import { EnergyRecorder } from '../src/providers/energy-recorder';
import { RecordingError } from '../src/core/errors';
import { FakeAudioInput, frame } from './helpers/mock-providers';

vi.mock('../src/utils/logger', () => ({
  createLogger: () => ({
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
  }),
}));

// 100-sample frames at 1kHz: each frame is 0.1s
const loud = () => frame(0.5, 100);
const quiet = () => frame(0.001, 100);

describe('EnergyRecorder', () => {
  it('captures from the first loud frame until enough silence follows', async () => {
    const input = new FakeAudioInput([[quiet(), loud(), loud(), quiet(), quiet(), loud()]]);
    const recorder = new EnergyRecorder({ input, sampleRate: 1000, silenceSeconds: 0.2, pollIntervalMs: 5 });

    const { pcm, sampleRate } = await recorder.record();

    expect(sampleRate).toBe(1000);
    expect(pcm.length).toBe(400);
    expect(pcm[0]).toBe(16384);
    expect(pcm[399]).toBe(33);
    expect(input.current?.closed).toBe(true);
  });

  it('stops at the maximum duration', async () => {
    const input = new FakeAudioInput([[loud(), loud(), loud(), loud(), loud()]]);
    const recorder = new EnergyRecorder({ input, sampleRate: 1000, maxSeconds: 0.3, pollIntervalMs: 5 });

    const { pcm } = await recorder.record();

    expect(pcm.length).toBe(300);
  });

  it('returns what it has when the input ends', async () => {
    const input = new FakeAudioInput([[quiet(), loud()]]);
    const recorder = new EnergyRecorder({ input, sampleRate: 1000, pollIntervalMs: 5 });

    const recording = recorder.record();
    input.current?.close();
    const { pcm } = await recording;

    expect(pcm.length).toBe(100);
  });

  it('returns an empty utterance when nobody speaks', async () => {
    const input = new FakeAudioInput([[quiet(), quiet()]]);
    const recorder = new EnergyRecorder({ input, sampleRate: 1000, pollIntervalMs: 5 });

    const recording = recorder.record();
    input.current?.close();

    expect((await recording).pcm.length).toBe(0);
  });

  it('raises RecordingError when the device cannot be opened', async () => {
    const input = new FakeAudioInput();
    input.failOpen = true;
    const recorder = new EnergyRecorder({ input });

    const err = await recorder.record().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RecordingError);
    expect(err).toHaveProperty('message', 'Could not open audio input: device unavailable');
  });
});
