import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import {
  parseSettings,
  loadSettings,
  saveSettings,
  applyKeyPath,
  updateSettings,
  splitKeyPath,
  parseTypedValue,
  policyConfig,
  settingsFormatOf,
} from '../../../src/config/robodog-settings.js';
import { makeSettings } from '../../helpers/fixtures.js';

describe('parseSettings', () => {
  it('fills defaults for an empty document', () => {
    const result = parseSettings({});

    expect(result._unsafeUnwrap()).toEqual({
      latency_budget_ms: 300,
      reward_cooldown_s: 3,
      weights: {},
      behavior_policy: null,
      policy: null,
      commands_map: {},
      reward_triggers: {},
      environment_context: {},
      mood_initial: null,
    });
  });

  it('normalises command phrases and actions', () => {
    const settings = makeSettings({ commands_map: { " 'Sit' ": 'lie_down', 'ДО МЕНЕ': ' come ', Speak: 7 } });

    expect(settings.commands_map).toEqual({ sit: 'LIE_DOWN', 'до мене': 'COME', speak: '7' });
  });

  it('upper-cases reward trigger names and coerces numeric flags', () => {
    const settings = makeSettings({ reward_triggers: { sit: 1, down: 0, come: true } });

    expect(settings.reward_triggers).toEqual({ SIT: true, DOWN: false, COME: true });
  });

  it('coerces numeric strings in weights', () => {
    expect(makeSettings({ weights: { stimulus: '0.7' } }).weights).toEqual({ stimulus: 0.7 });
  });

  it('accepts null sections as empty', () => {
    const settings = makeSettings({ commands_map: null, weights: null, environment_context: null });

    expect(settings.commands_map).toEqual({});
    expect(settings.weights).toEqual({});
    expect(settings.environment_context).toEqual({});
  });

  it('rejects an empty command phrase', () => {
    const result = parseSettings({ commands_map: { '  ': 'SIT' } });

    const error = result._unsafeUnwrapErr();
    expect(error.code).toBe('SETTINGS_INVALID');
    expect(error.message).toBe('commands_map: Command map keys must be non-empty strings');
  });

  it('rejects a negative cooldown', () => {
    const error = parseSettings({ reward_cooldown_s: -1 })._unsafeUnwrapErr();

    expect(error.code).toBe('SETTINGS_INVALID');
    if (error.code !== 'SETTINGS_INVALID') return;
    expect(error.issues.map((i) => i.path)).toEqual(['reward_cooldown_s']);
  });
});

describe('policyConfig', () => {
  it('prefers behavior_policy, then policy, then weights', () => {
    expect(policyConfig(makeSettings({ behavior_policy: { seed: 1 }, policy: { seed: 2 }, weights: { stimulus: 1 } }))).toEqual({ seed: 1 });
    expect(policyConfig(makeSettings({ policy: { seed: 2 }, weights: { stimulus: 1 } }))).toEqual({ seed: 2 });
    expect(policyConfig(makeSettings({ weights: { stimulus: 1 } }))).toEqual({ stimulus: 1 });
    expect(policyConfig(makeSettings({}))).toEqual({});
  });
});

describe('settings files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'vct-settings-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('loads a JSON file', async () => {
    const file = path.join(dir, 'robodog.json');
    await fs.writeFile(file, JSON.stringify({ reward_cooldown_s: 1.5, commands_map: { sit: 'SIT' } }));

    const settings = (await loadSettings(file))._unsafeUnwrap();

    expect(settings.reward_cooldown_s).toBe(1.5);
    expect(settings.commands_map).toEqual({ sit: 'SIT' });
  });

  it('treats an empty file as an empty document', async () => {
    const file = path.join(dir, 'empty.json');
    await fs.writeFile(file, '  \n');

    expect((await loadSettings(file))._unsafeUnwrap().latency_budget_ms).toBe(300);
  });

  it('reports a missing file', async () => {
    const file = path.join(dir, 'missing.json');

    expect((await loadSettings(file))._unsafeUnwrapErr()).toEqual({
      code: 'SETTINGS_NOT_FOUND',
      message: `Configuration file not found: ${file}`,
    });
  });

  it('reports malformed JSON', async () => {
    const file = path.join(dir, 'broken.json');
    await fs.writeFile(file, '{ "weights": ');

    const error = (await loadSettings(file))._unsafeUnwrapErr();

    expect(error.code).toBe('SETTINGS_PARSE_ERROR');
    expect(error.message.startsWith(`${file}: `)).toBe(true);
  });

  it('loads a YAML file', async () => {
    const file = path.join(dir, 'robodog.yaml');
    await fs.writeFile(file, 'reward_cooldown_s: 2\ncommands_map:\n  "До мене": come\nreward_triggers:\n  come: true\n');

    const settings = (await loadSettings(file))._unsafeUnwrap();

    expect(settings.reward_cooldown_s).toBe(2);
    expect(settings.commands_map).toEqual({ 'до мене': 'COME' });
    expect(settings.reward_triggers).toEqual({ COME: true });
  });

  it('reads a path without a suffix as YAML', async () => {
    const file = path.join(dir, 'robodog');
    await fs.writeFile(file, 'latency_budget_ms: 120\n');

    expect((await loadSettings(file))._unsafeUnwrap().latency_budget_ms).toBe(120);
  });

  it('loads a TOML file', async () => {
    const file = path.join(dir, 'robodog.toml');
    await fs.writeFile(file, 'reward_cooldown_s = 4.5\n\n[commands_map]\nsit = "SIT"\n');

    const settings = (await loadSettings(file))._unsafeUnwrap();

    expect(settings.reward_cooldown_s).toBe(4.5);
    expect(settings.commands_map).toEqual({ sit: 'SIT' });
  });

  it('reports malformed YAML', async () => {
    const file = path.join(dir, 'broken.yml');
    await fs.writeFile(file, 'weights: [0.1, 0.2\n');

    const error = (await loadSettings(file))._unsafeUnwrapErr();

    expect(error.code).toBe('SETTINGS_PARSE_ERROR');
    expect(error.message.startsWith(`${file}: `)).toBe(true);
  });

  it('refuses an unknown suffix without touching the disk', async () => {
    const error = (await loadSettings(path.join(dir, 'robodog.ini')))._unsafeUnwrapErr();

    expect(error).toEqual({ code: 'SETTINGS_UNSUPPORTED_FORMAT', message: 'Unsupported configuration format: .ini' });
  });

  it('saves sorted YAML that loads back to the same settings', async () => {
    const file = path.join(dir, 'saved.yaml');
    const settings = makeSettings({ weights: { stimulus: 0.4 }, commands_map: { 'до мене': 'COME', sit: 'SIT' } });

    (await saveSettings(file, settings))._unsafeUnwrap();
    const lines = (await fs.readFile(file, 'utf8')).split('\n');

    expect(lines[0]).toBe('behavior_policy: null');
    expect(lines.slice(1, 4)).toEqual(['commands_map:', '  sit: SIT', '  до мене: COME']);
    expect((await loadSettings(file))._unsafeUnwrap()).toEqual(settings);
  });

  it('saves TOML without the unset sections and loads it back', async () => {
    const file = path.join(dir, 'saved.toml');
    const settings = makeSettings({ weights: { stimulus: 0.4 }, commands_map: { sit: 'SIT' } });

    (await saveSettings(file, settings))._unsafeUnwrap();
    const lines = (await fs.readFile(file, 'utf8')).split('\n');

    expect(lines.filter((line) => line.startsWith('latency_budget_ms = '))).toEqual(['latency_budget_ms = 300']);
    expect(lines.some((line) => line.startsWith('behavior_policy'))).toBe(false);
    expect((await loadSettings(file))._unsafeUnwrap()).toEqual(settings);
  });

  it('saves sorted, indented JSON that loads back to the same settings', async () => {
    const file = path.join(dir, 'saved.json');
    const settings = makeSettings({ weights: { stimulus: 0.4 }, commands_map: { sit: 'SIT' } });

    (await saveSettings(file, settings))._unsafeUnwrap();
    const text = await fs.readFile(file, 'utf8');

    expect(text.endsWith('}\n')).toBe(true);
    expect(text).toContain('\n  "commands_map": {\n    "sit": "SIT"\n  },\n');
    expect(Object.keys(JSON.parse(text))).toEqual([
      'behavior_policy',
      'commands_map',
      'environment_context',
      'latency_budget_ms',
      'mood_initial',
      'policy',
      'reward_cooldown_s',
      'reward_triggers',
      'weights',
    ]);
    expect((await loadSettings(file))._unsafeUnwrap()).toEqual(settings);
  });
});

describe('settingsFormatOf', () => {
  it('picks the format from the suffix, case-insensitively', () => {
    expect(settingsFormatOf('a/robodog.YML')._unsafeUnwrap()).toBe('yaml');
    expect(settingsFormatOf('a/robodog')._unsafeUnwrap()).toBe('yaml');
    expect(settingsFormatOf('a/robodog.json')._unsafeUnwrap()).toBe('json');
    expect(settingsFormatOf('a/robodog.toml')._unsafeUnwrap()).toBe('toml');
    expect(settingsFormatOf('a/robodog.txt').isErr()).toBe(true);
  });
});

describe('applyKeyPath', () => {
  it('sets a nested key and re-normalises', () => {
    const updated = applyKeyPath(makeSettings({}), ['commands_map', 'Sit'], 'sit')._unsafeUnwrap();

    expect(updated.commands_map).toEqual({ sit: 'SIT' });
  });

  it('replaces a non-object intermediate', () => {
    const updated = applyKeyPath(makeSettings({ mood_initial: 'calm' }), ['behavior_policy', 'seed'], 7)._unsafeUnwrap();

    expect(updated.behavior_policy).toEqual({ seed: 7 });
  });

  it('refuses an empty key path', () => {
    expect(applyKeyPath(makeSettings({}), [], 1)._unsafeUnwrapErr().code).toBe('SETTINGS_KEY_PATH_EMPTY');
  });

  it('refuses a value that breaks the schema', () => {
    expect(applyKeyPath(makeSettings({}), ['reward_cooldown_s'], 'soon')._unsafeUnwrapErr().code).toBe('SETTINGS_INVALID');
  });
});

describe('updateSettings', () => {
  it('merges top-level keys', () => {
    const updated = updateSettings(makeSettings({}), { reward_cooldown_s: 5, mood_initial: 'happy' })._unsafeUnwrap();

    expect(updated.reward_cooldown_s).toBe(5);
    expect(updated.mood_initial).toBe('happy');
  });
});

describe('splitKeyPath', () => {
  it('drops empty segments and whitespace', () => {
    expect(splitKeyPath(' commands_map . sit ')).toEqual(['commands_map', 'sit']);
    expect(splitKeyPath('a..b.')).toEqual(['a', 'b']);
    expect(splitKeyPath('...')).toEqual([]);
  });
});

describe('parseTypedValue', () => {
  it('parses each type', () => {
    expect(parseTypedValue(' 42 ', 'int')._unsafeUnwrap()).toBe(42);
    expect(parseTypedValue('-3', 'int')._unsafeUnwrap()).toBe(-3);
    expect(parseTypedValue('0.25', 'float')._unsafeUnwrap()).toBe(0.25);
    expect(parseTypedValue('Yes', 'bool')._unsafeUnwrap()).toBe(true);
    expect(parseTypedValue('off', 'bool')._unsafeUnwrap()).toBe(false);
    expect(parseTypedValue('{"SIT":true}', 'json')._unsafeUnwrap()).toEqual({ SIT: true });
    expect(parseTypedValue(' raw ', 'str')._unsafeUnwrap()).toBe(' raw ');
  });

  it('explains what could not be parsed', () => {
    expect(parseTypedValue('4.5', 'int')._unsafeUnwrapErr()).toBe("Cannot parse integer value from '4.5'");
    expect(parseTypedValue('', 'float')._unsafeUnwrapErr()).toBe("Cannot parse float value from ''");
    expect(parseTypedValue('maybe', 'bool')._unsafeUnwrapErr()).toBe("Cannot parse boolean value from 'maybe'");
    expect(parseTypedValue('{', 'json').isErr()).toBe(true);
  });
});
