import { mkdirSync, mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

export function makeTempDir(prefix = 'classifier-evals-test-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

/**
 * Write `root/{className}/{file}` for every entry. Each file holds its own
 * name so copies can be told apart.
 */
export function writeDataset(root: string, layout: Record<string, string[]>): void {
  for (const [className, files] of Object.entries(layout)) {
    const dir = join(root, className);
    mkdirSync(dir, { recursive: true });
    for (const file of files) {
      writeFileSync(join(dir, file), `${className}/${file}`);
    }
  }
}
