const LOWPASS_HALF_WIDTH = 16;

function clampInt16(n: number): number {
  if (n > 32767) return 32767;
  if (n < -32768) return -32768;
  return n | 0;
}

/** Reads s16le samples; a trailing odd byte is ignored. */
export function pcm16FromBuffer(pcm: Buffer): Int16Array {
  const count = Math.floor(pcm.length / 2);
  const samples = new Int16Array(count);
  for (let i = 0; i < count; i += 1) {
    samples[i] = pcm.readInt16LE(i * 2);
  }
  return samples;
}

export function pcm16ToBuffer(samples: Int16Array): Buffer {
  const out = Buffer.alloc(samples.length * 2);
  for (let i = 0; i < samples.length; i += 1) {
    out.writeInt16LE(samples[i] ?? 0, i * 2);
  }
  return out;
}

export function resampledLength(inputSamples: number, sourceRateHz: number, targetRateHz: number): number {
  if (inputSamples <= 0) return 0;
  return Math.max(1, Math.round(inputSamples * (targetRateHz / sourceRateHz)));
}

// Hann-windowed sinc; cutoff is a fraction of the sample rate (0 < cutoff <= 0.5).
function lowPassKernel(cutoff: number): Float64Array {
  const size = LOWPASS_HALF_WIDTH * 2 + 1;
  const kernel = new Float64Array(size);
  let sum = 0;

  for (let k = -LOWPASS_HALF_WIDTH; k <= LOWPASS_HALF_WIDTH; k += 1) {
    const sinc = k === 0 ? 2 * cutoff : Math.sin(2 * Math.PI * cutoff * k) / (Math.PI * k);
    const window = 0.5 * (1 + Math.cos((Math.PI * k) / (LOWPASS_HALF_WIDTH + 1)));
    const tap = sinc * window;
    kernel[k + LOWPASS_HALF_WIDTH] = tap;
    sum += tap;
  }

  for (let i = 0; i < size; i += 1) {
    kernel[i] = (kernel[i] ?? 0) / sum;
  }
  return kernel;
}

function lowPass(samples: Int16Array, cutoff: number): Float64Array {
  const kernel = lowPassKernel(cutoff);
  const last = samples.length - 1;
  const out = new Float64Array(samples.length);

  for (let i = 0; i < samples.length; i += 1) {
    let acc = 0;
    for (let k = -LOWPASS_HALF_WIDTH; k <= LOWPASS_HALF_WIDTH; k += 1) {
      const index = Math.min(last, Math.max(0, i + k));
      acc += (kernel[k + LOWPASS_HALF_WIDTH] ?? 0) * (samples[index] ?? 0);
    }
    out[i] = acc;
  }
  return out;
}

function interpolateLinear(source: ArrayLike<number>, outputLength: number, ratio: number): Int16Array {
  const output = new Int16Array(outputLength);
  const last = source.length - 1;

  for (let i = 0; i < outputLength; i += 1) {
    const position = i * ratio;
    const index = Math.min(Math.floor(position), last);
    const nextIndex = Math.min(index + 1, last);
    const frac = position - index;
    const s0 = source[index] ?? 0;
    const s1 = source[nextIndex] ?? s0;
    output[i] = clampInt16(Math.round(s0 + (s1 - s0) * frac));
  }
  return output;
}

/**
 * Resamples raw s16le mono PCM. Output length is round(N * target / source).
 * Downsampling low-pass filters at the target Nyquist first.
 */
export function convertSampleRate(pcm: Buffer, sourceRateHz: number, targetRateHz: number): Buffer {
  if (!Number.isFinite(sourceRateHz) || !Number.isFinite(targetRateHz) || sourceRateHz <= 0 || targetRateHz <= 0) {
    throw new RangeError(`invalid sample rates: ${sourceRateHz} -> ${targetRateHz}`);
  }
  if (sourceRateHz === targetRateHz) {
    return pcm;
  }

  const samples = pcm16FromBuffer(pcm);
  if (samples.length === 0) {
    return Buffer.alloc(0);
  }

  const outputLength = resampledLength(samples.length, sourceRateHz, targetRateHz);
  const ratio = sourceRateHz / targetRateHz;
  const source = targetRateHz < sourceRateHz ? lowPass(samples, (0.5 * targetRateHz) / sourceRateHz) : samples;

  return pcm16ToBuffer(interpolateLinear(source, outputLength, ratio));
}
