import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { access, mkdtemp, mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ClickpackError, RenderCancelledError } from '@clicksynth/core';
import { decodeWav, encodeWav } from '@clicksynth/clickpack';
import { parseRenderConfig } from './config.js';
import { runRenderJob, type RenderJobProgress } from './job.js';

let root: string;

const config = parseRenderConfig({
  sampleRate: 1000,
  pitch: { enabled: false },
  volume: { volumeVar: 0, spamEnabled: false },
});

describe('runRenderJob', () => {
  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'render-job-'));
    await mkdir(join(root, 'pack', 'player1', 'clicks'), { recursive: true });
    await writeFile(
      join(root, 'pack', 'player1', 'clicks', 'a.wav'),
      encodeWav([Float32Array.from([0.5, 0.5, 0.5, 0.5])], 1000)
    );
    await writeFile(join(root, 'macro.txt'), '100\n0 1 1\n50 1 1\n');
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('renders a replay file to a stereo WAV', async () => {
    const stages: RenderJobProgress['stage'][] = [];

    const result = await runRenderJob({
      replayPath: join(root, 'macro.txt'),
      clickpackDir: join(root, 'pack'),
      outputPath: join(root, 'out', 'render.wav'),
      config,
      onProgress: (progress) => stages.push(progress.stage),
    });

    expect(stages).toEqual(['replay', 'clickpack', 'render', 'output', 'done']);
    expect(result).toMatchObject({ format: 'plaintext', fps: 100, warnings: [] });
    expect(result.stats).toMatchObject({ actions: 2, placed: 2, skipped: 0, frames: 504 });

    const wav = decodeWav(await readFile(join(root, 'out', 'render.wav')), 'render.wav');
    expect(wav.sampleRate).toBe(1000);
    expect(wav.channels).toHaveLength(2);
    expect(wav.channels[0]).toHaveLength(504);
    expect(wav.channels[1][500]).toBe(0.5);
    expect(result.bytesWritten).toBe(44 + 504 * 2 * 4);
  });

  it('writes 16-bit output on request', async () => {
    const result = await runRenderJob({
      replayPath: join(root, 'macro.txt'),
      clickpackDir: join(root, 'pack'),
      outputPath: join(root, 'render16.wav'),
      config,
      bitDepth: 16,
    });

    expect(result.bytesWritten).toBe(44 + 504 * 2 * 2);
  });

  it('fails before rendering when the clickpack is missing', async () => {
    await expect(
      runRenderJob({
        replayPath: join(root, 'macro.txt'),
        clickpackDir: join(root, 'missing'),
        outputPath: join(root, 'never.wav'),
        config,
      })
    ).rejects.toThrow(ClickpackError);
  });

  it('writes nothing when cancelled during the render', async () => {
    const controller = new AbortController();
    const outputPath = join(root, 'cancelled.wav');

    await expect(
      runRenderJob({
        replayPath: join(root, 'macro.txt'),
        clickpackDir: join(root, 'pack'),
        outputPath,
        config,
        signal: controller.signal,
        onProgress: (progress) => {
          if (progress.stage === 'render') {
            controller.abort();
          }
        },
      })
    ).rejects.toThrow(RenderCancelledError);
    await expect(access(outputPath)).rejects.toThrow();
  });

  it('reports actions whose expression failed', async () => {
    const result = await runRenderJob({
      replayPath: join(root, 'macro.txt'),
      clickpackDir: join(root, 'pack'),
      outputPath: join(root, 'expr.wav'),
      config: parseRenderConfig({
        sampleRate: 1000,
        pitch: { enabled: false },
        expression: { variable: 'value', source: 'x(1)' },
      }),
    });

    expect(result.warnings).toEqual(['Volume expression failed on 2 actions (first #0), they used 0']);
  });
});
