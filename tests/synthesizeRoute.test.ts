import assert from 'node:assert/strict';
import { test } from 'node:test';
import { makeTempDir, MemoryCacheStore, StubEngine, StubModelSource } from './fakes';
import { setTestEnv } from './testEnv';

setTestEnv();

const MODEL_ID = 'en_US-test-low';
const USER_TOKEN = 'test-token';

async function startServer() {
  const { ModelRegistry } = await import('../src/models/modelRegistry');
  const { ModelNotFoundError } = await import('../src/models/modelSource');
  const { SynthesisOrchestrator } = await import('../src/tts/synthesisOrchestrator');
  const { buildServer } = await import('../src/server');

  const source = new StubModelSource();
  source.failWith = (modelId) => (modelId === MODEL_ID ? null : new ModelNotFoundError(modelId, 'no such voice'));
  const engine = new StubEngine();
  const registry = new ModelRegistry({ assetsDir: await makeTempDir(), source, engine });
  const orchestrator = new SynthesisOrchestrator({
    registry,
    engine,
    cache: new MemoryCacheStore(),
    defaultModelId: MODEL_ID,
    cacheTtlSeconds: 60,
    maxTextLength: 100,
    maxSampleRate: 48000,
  });
  const { server } = buildServer({ orchestrator, registry, allowedUserToken: USER_TOKEN });

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('server is not listening on a tcp port');
  }
  const { port } = address;

  return {
    engine,
    baseUrl: `http://127.0.0.1:${port}`,
    close: () => new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve()))),
  };
}

function synthesize(baseUrl: string, body: unknown, token = USER_TOKEN): Promise<Response> {
  return fetch(`${baseUrl}/synthesize`, {
    method: 'POST',
    headers: { 'content-type': 'application/json', 'user-token': token },
    body: typeof body === 'string' ? body : JSON.stringify(body),
  });
}

test('POST /synthesize streams raw pcm with synthesis headers', async () => {
  const ctx = await startServer();
  try {
    const first = await synthesize(ctx.baseUrl, { text: 'hi', sampleRate: 16000 });
    const audio = Buffer.from(await first.arrayBuffer());

    assert.equal(first.status, 200);
    assert.equal(first.headers.get('content-type'), 'audio/x-raw; format=S16LE; channels=1; rate=16000');
    assert.equal(first.headers.get('content-length'), '290');
    assert.equal(first.headers.get('x-model'), MODEL_ID);
    assert.equal(first.headers.get('x-sample-rate'), '16000');
    assert.equal(first.headers.get('x-cache'), 'MISS');
    assert.equal(first.headers.get('x-resampling'), 'APPLIED');
    assert.match(first.headers.get('x-total-time') ?? '', /^\d+ms$/);
    assert.equal(audio.length, 290);

    const second = await synthesize(ctx.baseUrl, { text: 'hi', sample_rate: 16000 });
    await second.arrayBuffer();

    assert.equal(second.headers.get('x-cache'), 'HIT');
    assert.equal(ctx.engine.calls.length, 1);
  } finally {
    await ctx.close();
  }
});

test('POST /synthesizeSpeech serves the same handler', async () => {
  const ctx = await startServer();
  try {
    const res = await fetch(`${ctx.baseUrl}/synthesizeSpeech`, {
      method: 'POST',
      headers: { 'content-type': 'application/json', 'user-token': USER_TOKEN },
      body: JSON.stringify({ text: 'hi', sample_rate: 16000 }),
    });
    const audio = Buffer.from(await res.arrayBuffer());

    assert.equal(res.status, 200);
    assert.equal(res.headers.get('x-sample-rate'), '16000');
    assert.equal(audio.length, 290);
    assert.equal(ctx.engine.calls.length, 1);
  } finally {
    await ctx.close();
  }
});

test('POST /synthesize rejects a wrong user token', async () => {
  const ctx = await startServer();
  try {
    const res = await synthesize(ctx.baseUrl, { text: 'hi' }, 'other-token');

    assert.equal(res.status, 403);
    assert.deepEqual(await res.json(), { detail: 'forbidden' });
    assert.equal(ctx.engine.calls.length, 0);
  } finally {
    await ctx.close();
  }
});

test('POST /synthesize maps bad input to 400', async () => {
  const ctx = await startServer();
  try {
    const blank = await synthesize(ctx.baseUrl, { text: '  ' });
    assert.equal(blank.status, 400);
    assert.deepEqual(await blank.json(), { detail: 'text must not be empty' });

    const missing = await synthesize(ctx.baseUrl, {});
    assert.equal(missing.status, 400);
    assert.deepEqual(await missing.json(), { detail: 'text: text is required' });

    const malformed = await synthesize(ctx.baseUrl, '{"text":');
    assert.equal(malformed.status, 400);
    assert.deepEqual(await malformed.json(), { detail: 'invalid json body' });
  } finally {
    await ctx.close();
  }
});

test('POST /synthesize maps model and engine failures', async () => {
  const ctx = await startServer();
  try {
    const unknown = await synthesize(ctx.baseUrl, { text: 'hi', model: 'en_US-missing-low', sampleRate: 16000 });
    assert.equal(unknown.status, 404);
    assert.deepEqual(await unknown.json(), { detail: "Model 'en_US-missing-low' not found" });

    ctx.engine.failWith = new Error('onnx runtime crashed');
    const failed = await synthesize(ctx.baseUrl, { text: 'hi', sampleRate: 16000 });
    assert.equal(failed.status, 500);
    assert.deepEqual(await failed.json(), { detail: 'Audio synthesis failed' });
  } finally {
    await ctx.close();
  }
});

test('GET /health and /models describe the service', async () => {
  const ctx = await startServer();
  try {
    const health = await fetch(`${ctx.baseUrl}/health`);
    assert.equal(health.status, 200);
    assert.deepEqual(await health.json(), { status: 'healthy' });

    await synthesize(ctx.baseUrl, { text: 'hi' }).then((res) => res.arrayBuffer());
    const models = await fetch(`${ctx.baseUrl}/models`);
    assert.deepEqual(await models.json(), {
      default: MODEL_ID,
      allowed: [],
      models: [{ id: MODEL_ID, state: 'ready', sampleRate: 22050, attempts: 1 }],
    });
  } finally {
    await ctx.close();
  }
});
