/**
 * URL File Extractor
 * Reads *.url files dropped into the watched folder and deletes the ones it consumed
 */

import { mkdirSync } from 'node:fs';
import { readdir, readFile, stat, unlink } from 'node:fs/promises';
import path from 'node:path';
import { logDebug } from '../observability/logger';
import type { UrlItem } from './types';

export const URL_FILE_EXTENSION = '.url';

export class UrlFileExtractor {
  readonly folderPath: string;

  /**
   * Creates the folder (and parents) if it does not exist yet
   */
  constructor(folderPath: string) {
    this.folderPath = folderPath;
    mkdirSync(folderPath, { recursive: true });
  }

  /**
   * Extract one URL per *.url file.
   *
   * A file is deleted only after its trimmed content was read and found non-empty.
   * Empty or unreadable files stay in place for the next pass. Only regular files
   * and symlinks to regular files are read. A failure to list the folder itself
   * is thrown.
   */
  async extract(): Promise<UrlItem[]> {
    const entries = await readdir(this.folderPath, { withFileTypes: true });
    const items: UrlItem[] = [];

    for (const entry of entries) {
      if (!entry.isFile() && !entry.isSymbolicLink()) continue;
      if (!entry.name.endsWith(URL_FILE_EXTENSION)) continue;

      const item = await this.consumeFile(entry.name);
      if (item) items.push(item);
    }

    return items;
  }

  private async consumeFile(fileName: string): Promise<UrlItem | null> {
    const filePath = path.join(this.folderPath, fileName);

    try {
      // FIFOs and devices would block readFile
      if (!(await stat(filePath)).isFile()) {
        logDebug('Skipping URL entry that is not a regular file', { file: fileName });
        return null;
      }

      const rawUrl = (await readFile(filePath, 'utf-8')).trim();
      if (!rawUrl) {
        logDebug('Skipping empty URL file', { file: fileName });
        return null;
      }

      await unlink(filePath);
      logDebug('Consumed URL file', { file: fileName, url: rawUrl });

      return { rawUrl, sourceFile: fileName };
    } catch (error) {
      logDebug('Error processing URL file', {
        file: fileName,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }
}
