import path from 'path';
import { promises as fs } from 'fs';
import { logger } from '@telemetry/index';

const UNSAFE_NAME = /[^A-Za-z0-9._ -]/g;

const safeSegment = (value: string, fallback: string) => {
  const cleaned = path.basename(value).replace(UNSAFE_NAME, '_').replace(/^\.+/, '');
  return cleaned || fallback;
};

/**
 * Stores uploaded files as `<root>/<category>/<filename>`. An existing file is
 * never overwritten; the new one gets a ` (n)` suffix.
 */
export class CategoryDirectoryStore {
  constructor(private readonly root: string) {}

  async store(category: string, filename: string, bytes: Buffer): Promise<string> {
    const directory = path.join(this.root, safeSegment(category, 'uncategorized'));
    await fs.mkdir(directory, { recursive: true });

    const name = safeSegment(filename, 'upload');
    const ext = path.extname(name);
    const stem = name.slice(0, name.length - ext.length);
    for (let attempt = 0; ; attempt++) {
      const candidate = path.join(directory, attempt === 0 ? name : `${stem} (${attempt})${ext}`);
      try {
        await fs.writeFile(candidate, bytes, { flag: 'wx' });
        logger.debug({ path: candidate }, 'Stored upload');
        return candidate;
      } catch (err) {
        if (!isAlreadyExists(err)) throw err;
      }
    }
  }
}

const isAlreadyExists = (error: unknown) =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 'EEXIST';
