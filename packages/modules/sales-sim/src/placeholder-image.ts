import { promises as fs } from 'node:fs';
import path from 'node:path';

/** Path stored on catalog items, relative to the media root. */
export const PLACEHOLDER_IMAGE_PATH = 'products/placeholder.png';

// 1×1 transparent PNG.
const PLACEHOLDER_PNG = Buffer.from(
  'iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAQAAAC1HAwCAAAAC0lEQVR42mNkYAAAAAYAAjCB0C8AAAAASUVORK5CYII=',
  'base64',
);

/**
 * Makes sure the placeholder exists under `mediaRoot` and returns its relative
 * path. An existing file is left alone.
 */
export async function ensurePlaceholderImage(mediaRoot: string): Promise<string> {
  const target = path.join(mediaRoot, PLACEHOLDER_IMAGE_PATH);
  await fs.mkdir(path.dirname(target), { recursive: true });
  try {
    await fs.writeFile(target, PLACEHOLDER_PNG, { flag: 'wx' });
  } catch (err) {
    if (!(err instanceof Error && 'code' in err && err.code === 'EEXIST')) {
      throw err;
    }
  }
  return PLACEHOLDER_IMAGE_PATH;
}
