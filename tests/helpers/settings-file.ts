import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { TEST_SETTINGS_PAYLOAD } from './fixtures.js';

export interface TempSettings {
  readonly file: string;
  remove(): Promise<void>;
}

export async function writeTempSettings(payload: unknown = TEST_SETTINGS_PAYLOAD): Promise<TempSettings> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'vct-startup-'));
  const file = path.join(dir, 'robodog.json');
  await fs.writeFile(file, JSON.stringify(payload));
  return { file, remove: () => fs.rm(dir, { recursive: true, force: true }) };
}

/** Collects pino lines written through a container's log destination. */
export function memoryDestination() {
  const lines: Array<Record<string, unknown>> = [];
  return {
    lines,
    write(line: string): void {
      const parsed: unknown = JSON.parse(line);
      if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
        lines.push(Object.fromEntries(Object.entries(parsed)));
      }
    },
  };
}
