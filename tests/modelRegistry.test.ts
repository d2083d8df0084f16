import assert from 'node:assert/strict';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { test } from 'node:test';
import { makeTempDir, StubEngine, StubModelSource, voiceConfigJson } from './fakes';
import { setTestEnv } from './testEnv';

setTestEnv();

const MODEL_ID = 'en_US-test-low';

async function setup(options: { allowedModels?: string[]; maxModels?: number } = {}) {
  const { ModelRegistry } = await import('../src/models/modelRegistry');
  const assetsDir = await makeTempDir();
  const source = new StubModelSource();
  const engine = new StubEngine();
  const registry = new ModelRegistry({ assetsDir, source, engine, ...options });
  return { registry, source, engine, assetsDir };
}

test('concurrent resolves for one unresolved id fetch and load once', async () => {
  const { registry, source, engine, assetsDir } = await setup();
  source.delayMs = 20;

  const models = await Promise.all(Array.from({ length: 20 }, () => registry.resolve(MODEL_ID)));

  assert.equal(source.fetches.length, 1);
  assert.equal(engine.loads, 1);
  assert.ok(models.every((model) => model === models[0]));
  assert.equal(registry.state(MODEL_ID), 'ready');
  assert.equal(models[0]?.nativeSampleRate, 22050);
  assert.equal(await fs.readFile(path.join(assetsDir, `${MODEL_ID}.onnx`), 'utf8'), 'onnx-weights');
  assert.deepEqual(await fs.readdir(path.join(assetsDir, '.staging')), []);
});

test('a ready model is returned without another acquisition', async () => {
  const { registry, source, engine } = await setup();

  const first = await registry.resolve(MODEL_ID);
  const second = await registry.resolve(MODEL_ID);

  assert.equal(first, second);
  assert.equal(source.fetches.length, 1);
  assert.equal(engine.loads, 1);
});

test('voices already on disk are loaded without fetching', async () => {
  const { registry, source, engine, assetsDir } = await setup();
  await fs.writeFile(path.join(assetsDir, `${MODEL_ID}.onnx`), 'onnx-weights');
  await fs.writeFile(path.join(assetsDir, `${MODEL_ID}.onnx.json`), voiceConfigJson(16000));

  const model = await registry.resolve(MODEL_ID);

  assert.equal(source.fetches.length, 0);
  assert.equal(engine.loads, 1);
  assert.equal(model.nativeSampleRate, 16000);
});

test('an unknown id fails after the fetch, stays failed and can be retried', async () => {
  const { ModelNotFoundError } = await import('../src/models/modelSource');
  const { ModelUnavailableError } = await import('../src/errors');
  const { registry, source } = await setup();
  source.failWith = (modelId) => new ModelNotFoundError(modelId, 'no such voice');

  await assert.rejects(registry.resolve('en_US-missing-low'), (error: unknown) => {
    assert.ok(error instanceof ModelUnavailableError);
    assert.equal(error.reason, 'not_found');
    assert.equal(error.status, 404);
    assert.equal(error.message, "Model 'en_US-missing-low' not found");
    return true;
  });
  assert.deepEqual(source.fetches, ['en_US-missing-low']);
  assert.equal(registry.state('en_US-missing-low'), 'failed');
  assert.equal(registry.peek('en_US-missing-low'), undefined);

  source.failWith = null;
  const model = await registry.resolve('en_US-missing-low');

  assert.equal(source.fetches.length, 2);
  assert.equal(model.attempts, 2);
  assert.equal(registry.state('en_US-missing-low'), 'ready');
});

test('waiters on a failing acquisition all see the failure from one fetch', async () => {
  const { registry, source } = await setup();
  source.delayMs = 10;
  source.failWith = () => new Error('socket hang up');

  const outcomes = await Promise.allSettled(Array.from({ length: 5 }, () => registry.resolve(MODEL_ID)));

  assert.ok(outcomes.every((outcome) => outcome.status === 'rejected'));
  assert.equal(source.fetches.length, 1);
  const record = registry.get(MODEL_ID);
  assert.equal(record?.state, 'failed');
  assert.equal(record?.state === 'failed' ? record.error : '', 'socket hang up');
});

test('an unreadable voice config fails the load', async () => {
  const { ModelUnavailableError } = await import('../src/errors');
  const { registry, source, engine } = await setup();
  source.sampleRate = 0;

  await assert.rejects(registry.resolve(MODEL_ID), (error: unknown) => {
    assert.ok(error instanceof ModelUnavailableError);
    assert.equal(error.reason, 'load_failed');
    assert.equal(error.status, 500);
    return true;
  });
  assert.equal(engine.loads, 0);
  assert.equal(registry.state(MODEL_ID), 'failed');
});

test('ids outside the allow-list are rejected without fetching', async () => {
  const { ModelUnavailableError } = await import('../src/errors');
  const { registry, source } = await setup({ allowedModels: [MODEL_ID] });

  await assert.rejects(registry.resolve('en_US-other-low'), (error: unknown) => {
    assert.ok(error instanceof ModelUnavailableError);
    assert.equal(error.reason, 'not_allowed');
    assert.equal(error.message, `Model 'en_US-other-low' not available. Available models: ${MODEL_ID}`);
    return true;
  });
  assert.equal(source.fetches.length, 0);
  assert.equal(registry.state('en_US-other-low'), 'unresolved');
});

test('the number of tracked models is bounded', async () => {
  const { ModelUnavailableError } = await import('../src/errors');
  const { registry, source } = await setup({ maxModels: 1 });
  await registry.resolve(MODEL_ID);

  await assert.rejects(registry.resolve('en_US-second-low'), (error: unknown) => {
    assert.ok(error instanceof ModelUnavailableError);
    assert.equal(error.reason, 'capacity');
    assert.equal(error.status, 503);
    return true;
  });
  assert.equal(source.fetches.length, 1);
  assert.deepEqual(
    registry.list().map((model) => [model.id, model.state]),
    [[MODEL_ID, 'ready']],
  );
});

test('concurrent resolves of distinct ids never exceed the model limit', async () => {
  const { ModelUnavailableError } = await import('../src/errors');
  const { registry, source, engine } = await setup({ maxModels: 1 });
  source.delayMs = 10;

  const outcomes = await Promise.allSettled(
    ['en_US-a-low', 'en_US-b-low', 'en_US-c-low'].map((id) => registry.resolve(id)),
  );

  assert.deepEqual(
    outcomes.map((outcome) => outcome.status),
    ['fulfilled', 'rejected', 'rejected'],
  );
  for (const outcome of outcomes.slice(1)) {
    assert.ok(outcome.status === 'rejected' && outcome.reason instanceof ModelUnavailableError);
    assert.equal(outcome.reason.reason, 'capacity');
  }
  assert.deepEqual(source.fetches, ['en_US-a-low']);
  assert.equal(engine.loads, 1);
  assert.deepEqual(
    registry.list().map((model) => model.id),
    ['en_US-a-low'],
  );
});

test('failed models do not use up the model limit', async () => {
  const { ModelNotFoundError } = await import('../src/models/modelSource');
  const { registry, source } = await setup({ maxModels: 2 });
  source.failWith = (modelId) => (modelId === MODEL_ID ? null : new ModelNotFoundError(modelId, 'no such voice'));

  await assert.rejects(registry.resolve('bogus1'));
  await assert.rejects(registry.resolve('bogus2'));
  const model = await registry.resolve(MODEL_ID);

  assert.equal(model.state, 'ready');
  assert.equal(registry.state('bogus1'), 'failed');
  assert.equal(registry.state('bogus2'), 'failed');
});
