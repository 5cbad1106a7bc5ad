/**
 * Atomic file replacement
 * Write to a sibling temp file, then rename over the target.
 */

import fs from 'fs-extra';
import path from 'path';

let counter = 0;

function tempPathFor(target: string): string {
  counter += 1;
  const base = path.basename(target);
  return path.join(path.dirname(target), `.${base}.${process.pid}.${Date.now()}.${counter}.tmp`);
}

/**
 * Replace `target` with `content` so that readers only ever see the old or
 * the new version. The temp file lives in the same directory, keeping the
 * rename on one filesystem.
 */
export async function writeFileAtomic(
  target: string,
  content: string,
  options: { mode?: number } = {}
): Promise<void> {
  await fs.ensureDir(path.dirname(target));
  const temp = tempPathFor(target);

  try {
    await fs.writeFile(temp, content, { encoding: 'utf-8', mode: options.mode ?? 0o600 });
    await fs.rename(temp, target);
  } catch (error) {
    await fs.remove(temp);
    throw error;
  }
}

export async function writeJsonAtomic(target: string, data: unknown): Promise<void> {
  await writeFileAtomic(target, JSON.stringify(data, null, 2) + '\n');
}
