import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const HELPERS_DIR = path.dirname(fileURLToPath(import.meta.url));
const FIXTURES_DIR = path.resolve(HELPERS_DIR, '..', 'fixtures');

export const REFERENCE_DATA_PATH = path.resolve(HELPERS_DIR, '..', '..', 'data', 'reference.json');

export function loadFixture(source: string, filename: string): string {
  return fs.readFileSync(path.join(FIXTURES_DIR, source, filename), 'utf-8');
}

export function loadJsonFixture(source: string, filename: string): unknown {
  return JSON.parse(loadFixture(source, filename));
}
