import { describe, it, expect } from 'vitest';
import { readFile } from 'node:fs/promises';

describe('CLI entry point', () => {
  it('loads .env before any module that reads LOG_LEVEL', async () => {
    const source = await readFile(new URL('./index.ts', import.meta.url), 'utf8');
    const imports = source.split('\n').filter((line) => line.startsWith('import '));

    expect(imports[0]).toBe("import 'dotenv/config';");
  });
});
