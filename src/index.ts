import { env } from './env';
import { log } from './log';
import { createRuntime, preloadModels } from './runtime';
import { buildServer } from './server';

const runtime = createRuntime();
const { server } = buildServer({
  orchestrator: runtime.orchestrator,
  registry: runtime.registry,
  allowedUserToken: env.ALLOWED_USER_TOKEN,
});

server.listen(env.PORT, () => {
  log.info({ port: env.PORT }, 'server listening');
});

if (env.TTS_PRELOAD_MODELS) {
  void preloadModels(runtime.registry, env.TTS_DEFAULT_MODEL);
}

function shutdown(signal: NodeJS.Signals): void {
  log.info({ signal }, 'shutting down');
  server.close(() => {
    runtime
      .close()
      .catch((error: unknown) => {
        log.error({ err: error }, 'runtime close failed');
      })
      .finally(() => {
        process.exit(0);
      });
  });
}

process.once('SIGTERM', shutdown);
process.once('SIGINT', shutdown);
