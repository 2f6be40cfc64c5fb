import { describe, it, expect } from 'vitest';
import { createRobotDispatcher } from '../../../src/application/robot-dispatcher.js';
import type { RobotDispatcherDeps } from '../../../src/application/robot-dispatcher.js';
import { commandWithDefaults } from '../../../src/domain/brain/robodog-brain.js';
import { noopMetrics } from '../../../src/infrastructure/metrics/brain-metrics.js';
import { LIVE_MODE, SIMULATE_MODE } from '../../../src/runtime/operating-mode.js';
import { FakeLogger } from '../../helpers/FakeLogger.js';
import { ManualClock, createFakeFetch, jsonResponse } from '../../helpers/fakes.js';
import { LIVE_ENV, makeConfig, makeSettings } from '../../helpers/fixtures.js';

function routedFetch() {
  return createFakeFetch((url) =>
    url.endsWith('/trigger') ? jsonResponse({ ok: true }) : new Response(new Uint8Array(0), { status: 200 })
  );
}

function makeDeps(env: Record<string, string | undefined>, fetch = routedFetch(), lines: string[] = []): RobotDispatcherDeps {
  return {
    config: makeConfig(env),
    settings: makeSettings(),
    fetch,
    clock: new ManualClock(),
    logger: new FakeLogger().logger,
    metrics: noopMetrics,
    write: (line) => lines.push(line),
  };
}

describe('createRobotDispatcher', () => {
  describe('simulate mode', () => {
    it('answers commands without any network call, even with live credentials set', async () => {
      const fetch = routedFetch();
      const lines: string[] = [];
      const created = createRobotDispatcher(SIMULATE_MODE, makeDeps({ ...LIVE_ENV }, fetch, lines));
      if (created.kind !== 'ok') throw new Error('expected dispatcher');

      const outcome = await created.value.dispatch({ kind: 'command', command: commandWithDefaults('sit'), source: 'api' });

      expect(outcome).toMatchObject({ action: 'SIT', rewarded: true });
      expect(fetch).not.toHaveBeenCalled();
      expect(lines).toEqual(['[TTS] Дія: SIT score=0.64 ✅ винагорода']);
    });

    it('starts without live prerequisites', () => {
      expect(createRobotDispatcher(SIMULATE_MODE, makeDeps({})).kind).toBe('ok');
    });

    it('routes audio requests through the rule-based recogniser', async () => {
      const created = createRobotDispatcher(SIMULATE_MODE, makeDeps({}));
      if (created.kind !== 'ok') throw new Error('expected dispatcher');

      const outcome = await created.value.dispatch({ kind: 'audio', wavPath: '/clips/do_mene.wav' });

      expect(outcome.action).toBe('COME');
    });
  });

  describe('live mode', () => {
    it('refuses to build without prerequisites and makes no call', () => {
      const fetch = routedFetch();

      const created = createRobotDispatcher(LIVE_MODE, makeDeps({ VCT_API_KEY: 'test-secret' }, fetch));

      expect(created.kind).toBe('err');
      if (created.kind !== 'err') return;
      expect(created.error.phase).toBe('live-prerequisites');
      expect(created.error.missing).toEqual(['OPENAI_API_KEY', 'VCT_ACTUATOR_URL']);
      expect(fetch).not.toHaveBeenCalled();
    });

    it('calls the dispenser controller, then the speech API', async () => {
      const fetch = routedFetch();
      const lines: string[] = [];
      const created = createRobotDispatcher(LIVE_MODE, makeDeps({ ...LIVE_ENV }, fetch, lines));
      if (created.kind !== 'ok') throw new Error('expected dispatcher');

      const outcome = await created.value.dispatch({ kind: 'command', command: commandWithDefaults('sit'), source: 'api' });

      expect(outcome).toMatchObject({ action: 'SIT', rewarded: true });
      expect(fetch.mock.calls.map(([url]) => url)).toEqual([
        'http://dispenser.test/trigger',
        'https://api.openai.com/v1/audio/speech',
      ]);
      expect(fetch.mock.calls[0]?.[1]?.headers).toEqual({
        'Content-Type': 'application/json',
        Authorization: 'Bearer test-secret',
      });
      // An empty clip falls back to the console line.
      expect(lines).toEqual(['[alloy] Дія: SIT score=0.64 ✅ винагорода']);
    });
  });
});
