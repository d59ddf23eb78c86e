import { writeFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';

import { fileExists } from '../utils/fs.js';

export type WriteOutcome = 'created' | 'modified';

/** Writes generated artifacts, creating parent directories as needed. */
export class FileWriter {
  async write(filePath: string, content: string): Promise<WriteOutcome> {
    const existed = await fileExists(filePath);
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, content, 'utf-8');
    return existed ? 'modified' : 'created';
  }
}
