/**
 * Fetches and verifies every configured voice into TTS_ASSETS_DIR, e.g. during
 * an image build, so the service starts without downloading anything.
 *
 *   TTS_ALLOWED_MODELS=en_US-kathleen-low,en_US-ryan-medium npm run models:download
 */
import { env } from '../src/env';
import { log } from '../src/log';
import { createRuntime } from '../src/runtime';

async function main(): Promise<void> {
  const runtime = createRuntime({ ...env, ENABLE_CACHE: false });
  const ids = [...new Set([env.TTS_DEFAULT_MODEL, ...env.TTS_ALLOWED_MODELS])];

  log.info({ assets_dir: runtime.registry.assetsDir, models: ids }, 'downloading models');

  let failures = 0;
  for (const id of ids) {
    try {
      const model = await runtime.registry.resolve(id);
      log.info({ model_id: id, sample_rate: model.nativeSampleRate }, 'model available');
    } catch (error) {
      failures += 1;
      log.error({ err: error, model_id: id }, 'model download failed');
    }
  }

  await runtime.close();
  process.exitCode = failures > 0 ? 1 : 0;
}

main().catch((error: unknown) => {
  log.error({ err: error }, 'model download crashed');
  process.exitCode = 1;
});
