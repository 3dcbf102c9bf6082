import test from 'node:test';
import assert from 'node:assert/strict';

import { StorageError } from '../../data/errors.js';
import { SettingsController } from '../settings/settingsController.js';
import type { SettingsState } from '../settings/settingsState.js';
import { resolveSettingsView } from '../settings/settingsView.js';
import {
  FakeUserSettingsRepository,
  RecordingLogger,
  createDeferred,
} from './helpers/fakes.js';

function createController(repository = new FakeUserSettingsRepository()) {
  const logger = new RecordingLogger();
  const controller = new SettingsController(repository, { logger });
  return { controller, repository, logger };
}

test('a fresh settings controller starts in the loading state', () => {
  const { controller } = createController();

  assert.deepEqual(controller.state, { isSaving: false, apiKey: null, errorMessage: null });
  assert.equal(resolveSettingsView(controller.state).kind, 'loading');
});

test('initialize loads the stored api key', async () => {
  const { controller, repository } = createController(new FakeUserSettingsRepository({ apiKey: 'abc' }));
  const views: string[] = [];
  controller.subscribe((state) => views.push(resolveSettingsView(state).kind));

  await controller.initialize();

  assert.deepEqual(controller.state, { isSaving: false, apiKey: 'abc', errorMessage: null });
  assert.equal(repository.loadCalls, 1);
  assert.deepEqual(views, ['loading', 'ready']);
});

test('initialize failure keeps the api key unloaded and surfaces the message', async () => {
  const repository = new FakeUserSettingsRepository();
  repository.loadFailure = new StorageError('disk full');
  const { controller, logger } = createController(repository);

  await controller.initialize();

  assert.deepEqual(controller.state, { isSaving: false, apiKey: null, errorMessage: 'disk full' });
  assert.deepEqual(resolveSettingsView(controller.state), { kind: 'error', message: 'disk full' });
  assert.equal(logger.warnings.length, 1);
  assert.equal(logger.warnings[0][0], '[settings] failed to load user settings');
  assert.equal(logger.warnings[0][1], repository.loadFailure);
});

test('initialize falls back to a generic message for failures without one', async () => {
  const repository = new FakeUserSettingsRepository();
  repository.loadFailure = new Error('');
  const { controller } = createController(repository);

  await controller.initialize();

  assert.equal(controller.state.errorMessage, '設定の読み込みに失敗しました');
});

test('a listener failure while applying loaded settings is not reported as a load failure', async () => {
  const { controller, logger } = createController(new FakeUserSettingsRepository({ apiKey: 'abc' }));
  controller.subscribe((state) => {
    if (state.apiKey !== null) {
      throw new Error('render failed');
    }
  });

  await assert.rejects(controller.initialize(), { message: 'render failed' });

  assert.deepEqual(controller.state, { isSaving: false, apiKey: 'abc', errorMessage: null });
  assert.deepEqual(logger.warnings, []);
});

test('updateApiKey replaces the key without validation and is idempotent', async () => {
  const { controller } = createController(new FakeUserSettingsRepository({ apiKey: 'abc' }));
  await controller.initialize();
  let notifications = 0;
  controller.subscribe(() => {
    notifications += 1;
  });

  controller.updateApiKey('');
  const once = controller.state;
  controller.updateApiKey('');

  assert.equal(controller.state, once);
  assert.deepEqual(once, { isSaving: false, apiKey: '', errorMessage: null });
  assert.equal(notifications, 2);
});

test('retry clears only the error and does not reload', async () => {
  const repository = new FakeUserSettingsRepository();
  repository.loadFailure = new StorageError('disk full');
  const { controller } = createController(repository);
  await controller.initialize();
  const before = controller.state;

  controller.retry();

  assert.deepEqual(controller.state, { ...before, errorMessage: null });
  assert.equal(repository.loadCalls, 1);
  assert.equal(resolveSettingsView(controller.state).kind, 'loading');
});

test('retry keeps a previously loaded key so the ready view comes back', async () => {
  const repository = new FakeUserSettingsRepository({ apiKey: 'abc' });
  const { controller } = createController(repository);
  await controller.initialize();
  repository.saveFailure = new StorageError('read-only file system');
  await controller.saveSettings();

  assert.equal(resolveSettingsView(controller.state).kind, 'error');

  controller.retry();

  assert.deepEqual(resolveSettingsView(controller.state), {
    kind: 'ready',
    apiKey: 'abc',
    isSaving: false,
    canSave: true,
  });
});

test('initialize can be re-run by the caller after retry', async () => {
  const repository = new FakeUserSettingsRepository({ apiKey: 'abc' });
  repository.loadFailure = new StorageError('disk full');
  const { controller } = createController(repository);
  await controller.initialize();

  repository.loadFailure = undefined;
  controller.retry();
  await controller.initialize();

  assert.deepEqual(controller.state, { isSaving: false, apiKey: 'abc', errorMessage: null });
  assert.equal(repository.loadCalls, 2);
});

test('saveSettings marks saving while the write runs and calls onFinished once afterwards', async () => {
  const repository = new FakeUserSettingsRepository({ apiKey: 'abc' });
  const { controller } = createController(repository);
  await controller.initialize();
  controller.updateApiKey('new-key');

  const savingDuringWrite: boolean[] = [];
  repository.onSave = () => savingDuringWrite.push(controller.state.isSaving);
  const savingAtFinish: boolean[] = [];

  await controller.saveSettings(() => savingAtFinish.push(controller.state.isSaving));

  assert.deepEqual(repository.saveCalls, ['new-key']);
  assert.deepEqual(savingDuringWrite, [true]);
  assert.deepEqual(savingAtFinish, [false]);
  assert.deepEqual(controller.state, { isSaving: false, apiKey: 'new-key', errorMessage: null });
  assert.deepEqual(repository.stored, { apiKey: 'new-key' });
});

test('saveSettings exposes the saving view until the write settles', async () => {
  const repository = new FakeUserSettingsRepository({ apiKey: 'abc' });
  const gate = createDeferred<void>();
  repository.saveGate = gate.promise;
  const { controller } = createController(repository);
  await controller.initialize();

  const pending = controller.saveSettings();

  assert.deepEqual(resolveSettingsView(controller.state), {
    kind: 'ready',
    apiKey: 'abc',
    isSaving: true,
    canSave: false,
  });

  gate.resolve();
  await pending;

  assert.equal(controller.state.isSaving, false);
});

test('saveSettings writes an empty string when nothing was loaded', async () => {
  const repository = new FakeUserSettingsRepository({ apiKey: 'stale' });
  const { controller } = createController(repository);

  await controller.saveSettings();

  assert.deepEqual(repository.saveCalls, ['']);
});

test('saveSettings failure sets the error and skips onFinished', async () => {
  const repository = new FakeUserSettingsRepository({ apiKey: 'abc' });
  repository.saveFailure = new StorageError('write failed');
  const { controller, logger } = createController(repository);
  await controller.initialize();
  let finished = 0;

  await controller.saveSettings(() => {
    finished += 1;
  });

  assert.equal(finished, 0);
  assert.deepEqual(controller.state, { isSaving: false, apiKey: 'abc', errorMessage: 'write failed' });
  assert.equal(logger.warnings[0][0], '[settings] failed to save user settings');
});

test('a load that completes after dispose is not applied', async () => {
  const repository = new FakeUserSettingsRepository({ apiKey: 'abc' });
  const gate = createDeferred<void>();
  repository.loadGate = gate.promise;
  const { controller } = createController(repository);
  const seen: SettingsState[] = [];
  controller.subscribe((state) => seen.push(state));

  const pending = controller.initialize();
  controller.dispose();
  gate.resolve();
  await pending;

  assert.equal(controller.isActive, false);
  assert.equal(controller.state.apiKey, null);
  assert.equal(seen.length, 1);
});

test('a save that completes after dispose does not call onFinished', async () => {
  const repository = new FakeUserSettingsRepository({ apiKey: 'abc' });
  const gate = createDeferred<void>();
  repository.saveGate = gate.promise;
  const { controller } = createController(repository);
  await controller.initialize();
  let finished = 0;

  const pending = controller.saveSettings(() => {
    finished += 1;
  });
  controller.dispose();
  gate.resolve();
  await pending;

  assert.equal(finished, 0);
  assert.deepEqual(repository.saveCalls, ['abc']);
});

test('intents issued after dispose never reach the repository', async () => {
  const { controller, repository } = createController();
  controller.dispose();

  await controller.initialize();
  await controller.saveSettings();

  assert.equal(repository.loadCalls, 0);
  assert.deepEqual(repository.saveCalls, []);
});

test('waitForIdle settles once every launched intent finished', async () => {
  const repository = new FakeUserSettingsRepository({ apiKey: 'abc' });
  const gate = createDeferred<void>();
  repository.loadGate = gate.promise;
  const { controller } = createController(repository);

  void controller.initialize();
  const idle = controller.waitForIdle();
  gate.resolve();
  await idle;

  assert.equal(controller.state.apiKey, 'abc');
});
