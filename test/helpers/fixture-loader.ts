import fs from 'node:fs';
import path from 'node:path';

export const FIXTURES_DIR = path.resolve(
  new URL('.', import.meta.url).pathname,
  '..',
  'fixtures',
);

export function fixturePath(...parts: string[]): string {
  return path.join(FIXTURES_DIR, ...parts);
}

export function loadFixture(...parts: string[]): string {
  return fs.readFileSync(fixturePath(...parts), 'utf-8');
}

export function loadJsonFixture(...parts: string[]): unknown {
  return JSON.parse(loadFixture(...parts));
}
