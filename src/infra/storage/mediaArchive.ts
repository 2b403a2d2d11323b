import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { MediaArchive } from '../../app/ports/mediaArchive';

/** Stores submission media as plain files below one directory. */
export class FileMediaArchive implements MediaArchive {
  private readonly root: string;

  constructor(directory: string) {
    this.root = path.resolve(directory);
  }

  async save(fileName: string, bytes: Buffer): Promise<string> {
    const target = path.join(this.root, path.basename(fileName));
    await mkdir(this.root, { recursive: true });
    await writeFile(target, bytes);
    return target;
  }
}
