import { spawn } from 'child_process';
import { promises as fs } from 'fs';
import { log } from '../log';
import type { VoiceModelFiles } from '../models/types';
import type { ModelHandle, SynthesisEngine, VoiceConfig } from './types';

const STDERR_LIMIT_BYTES = 4096;

export interface PiperEngineOptions {
  binary: string;
  timeoutMs: number;
  lengthScale?: number;
  noiseScale?: number;
  speaker?: number;
}

export class PiperProcessError extends Error {
  constructor(
    message: string,
    readonly exitCode: number | null,
    readonly stderr: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'PiperProcessError';
  }
}

export function buildPiperArgs(handle: ModelHandle, options: PiperEngineOptions): string[] {
  const args = ['--model', handle.files.modelPath, '--config', handle.files.configPath, '--output_raw'];
  if (options.lengthScale !== undefined) {
    args.push('--length_scale', String(options.lengthScale));
  }
  if (options.noiseScale !== undefined) {
    args.push('--noise_scale', String(options.noiseScale));
  }
  if (options.speaker !== undefined && handle.voice.numSpeakers > 1) {
    args.push('--speaker', String(options.speaker));
  }
  return args;
}

/**
 * Runs the Piper CLI once per utterance: text on stdin, raw s16le PCM at the
 * voice's native rate on stdout.
 */
export class PiperEngine implements SynthesisEngine {
  readonly id = 'piper';

  constructor(private readonly options: PiperEngineOptions) {}

  async load(modelId: string, files: VoiceModelFiles, voice: VoiceConfig): Promise<ModelHandle> {
    await fs.access(files.modelPath);
    await fs.access(files.configPath);
    return { engineId: this.id, modelId, files, voice };
  }

  synthesize(handle: ModelHandle, text: string): Promise<Buffer> {
    const args = buildPiperArgs(handle, this.options);

    return new Promise<Buffer>((resolve, reject) => {
      const piper = spawn(this.options.binary, args, { stdio: ['pipe', 'pipe', 'pipe'] });
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let stderrBytes = 0;
      let timedOut = false;

      const timeout = setTimeout(() => {
        timedOut = true;
        piper.kill('SIGKILL');
      }, this.options.timeoutMs);

      piper.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
      piper.stderr.on('data', (chunk: Buffer) => {
        if (stderrBytes < STDERR_LIMIT_BYTES) {
          stderr.push(chunk);
          stderrBytes += chunk.length;
        }
      });
      piper.stdin.on('error', (error) => {
        log.debug({ err: error, model_id: handle.modelId }, 'piper stdin error');
      });
      piper.on('error', (error) => {
        clearTimeout(timeout);
        reject(new PiperProcessError(`piper failed to start: ${error.message}`, null, '', { cause: error }));
      });
      piper.on('close', (code) => {
        clearTimeout(timeout);
        const stderrText = Buffer.concat(stderr).toString('utf8').slice(0, STDERR_LIMIT_BYTES);
        if (timedOut) {
          reject(new PiperProcessError(`piper timed out after ${this.options.timeoutMs}ms`, code, stderrText));
          return;
        }
        if (code !== 0) {
          reject(new PiperProcessError(`piper exited with code ${code}`, code, stderrText));
          return;
        }
        resolve(Buffer.concat(stdout));
      });

      piper.stdin.end(`${text}\n`, 'utf8');
    });
  }
}
