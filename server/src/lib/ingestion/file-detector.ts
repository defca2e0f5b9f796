import type { Dirent } from 'node:fs';
import { extname, join, resolve } from 'node:path';
import { readdir, realpath, stat } from 'node:fs/promises';
import { pathExists } from 'fs-extra/esm';
import type { Logger } from '../logger';
import { SUPPORTED_EXTENSIONS, toErrorMessage } from './types';

const SUPPORTED_EXTENSION_SET = new Set<string>(SUPPORTED_EXTENSIONS);

type EntryKind = 'file' | 'directory' | 'other';

export function isSupportedExtension(filePath: string): boolean {
  return SUPPORTED_EXTENSION_SET.has(extname(filePath).toLowerCase());
}

export class FileDetector {
  private readonly logger: Logger;

  constructor(
    private readonly watchDirectories: string[],
    logger: Logger
  ) {
    this.logger = logger.child({ component: 'detector' });
  }

  /**
   * Lists supported files under every watch directory, in directory order and
   * then name order. Missing or unreadable directories are skipped with a
   * warning. A file reachable through several paths (symlinks, overlapping
   * watch directories) is reported once, under the first path found.
   */
  async detect(recursive: boolean): Promise<string[]> {
    const seen = new Set<string>();
    const detected: string[] = [];

    for (const directory of this.watchDirectories) {
      if (!(await pathExists(directory))) {
        this.logger.warn({ directory }, 'Directory does not exist');
        continue;
      }

      if (!(await stat(directory)).isDirectory()) {
        this.logger.warn({ directory }, 'Path is not a directory');
        continue;
      }

      for (const filePath of await this.walk(resolve(directory), recursive)) {
        const identity = await this.identify(filePath);
        if (seen.has(identity)) {
          continue;
        }
        seen.add(identity);
        detected.push(filePath);
      }
    }

    this.logger.info({ count: detected.length, recursive }, `Detected ${detected.length} files`);
    return detected;
  }

  private async walk(directory: string, recursive: boolean): Promise<string[]> {
    let entries: Dirent[];
    try {
      entries = await readdir(directory, { withFileTypes: true });
    } catch (error) {
      this.logger.warn({ directory, error: toErrorMessage(error) }, 'Skipping unreadable directory');
      return [];
    }
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    const files: string[] = [];
    for (const entry of entries) {
      const entryPath = join(directory, entry.name);
      const kind = await this.classify(entry, entryPath);

      if (kind === 'directory') {
        if (recursive) {
          files.push(...(await this.walk(entryPath, recursive)));
        }
        continue;
      }

      if (kind === 'file' && isSupportedExtension(entry.name)) {
        files.push(entryPath);
      }
    }

    return files;
  }

  // Symlinks count when they point at a regular file. Linked directories are
  // not descended into, so a link cycle cannot loop the walk.
  private async classify(entry: Dirent, entryPath: string): Promise<EntryKind> {
    if (entry.isFile()) {
      return 'file';
    }
    if (entry.isDirectory()) {
      return 'directory';
    }
    if (!entry.isSymbolicLink()) {
      return 'other';
    }

    try {
      return (await stat(entryPath)).isFile() ? 'file' : 'other';
    } catch (error) {
      this.logger.warn({ path: entryPath, error: toErrorMessage(error) }, 'Skipping broken symlink');
      return 'other';
    }
  }

  private async identify(filePath: string): Promise<string> {
    try {
      return await realpath(filePath);
    } catch (error) {
      this.logger.debug({ filePath, error: toErrorMessage(error) }, 'Could not resolve real path');
      return filePath;
    }
  }
}
