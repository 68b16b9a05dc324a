import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { SourceReader, WorkspaceWriter } from '@fixgate/domain';

export class PathOutsideProjectError extends Error {
  constructor(readonly filePath: string) {
    super(`Path escapes the project root: ${filePath}`);
    this.name = 'PathOutsideProjectError';
  }
}

const SKIPPED_DIRS = new Set(['.git', '.gradle', '.idea', 'build', 'node_modules', 'target']);

/** Project-relative file access confined to one checkout. */
export class ProjectFiles implements SourceReader, WorkspaceWriter {
  private readonly root: string;

  constructor(projectRoot: string) {
    this.root = path.resolve(projectRoot);
  }

  resolve(filePath: string): string {
    const absolute = path.resolve(this.root, filePath);
    const relative = path.relative(this.root, absolute);
    if (relative === '' || relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
      throw new PathOutsideProjectError(filePath);
    }
    return absolute;
  }

  async read(filePath: string): Promise<string | null> {
    const absolute = this.resolve(filePath);
    try {
      return await readFile(absolute, 'utf8');
    } catch {
      return null;
    }
  }

  async write(filePath: string, content: string): Promise<void> {
    const absolute = this.resolve(filePath);
    await mkdir(path.dirname(absolute), { recursive: true });
    await writeFile(absolute, content, 'utf8');
  }

  /** Project-relative paths of every Java source, sorted; build output is skipped. */
  async listJavaSources(): Promise<string[]> {
    const found: string[] = [];
    await this.walk(this.root, found);
    return found.sort();
  }

  private async walk(directory: string, found: string[]): Promise<void> {
    const entries = await readdir(directory, { withFileTypes: true });
    for (const entry of entries) {
      const absolute = path.join(directory, entry.name);
      if (entry.isDirectory()) {
        if (!SKIPPED_DIRS.has(entry.name)) {
          await this.walk(absolute, found);
        }
      } else if (entry.isFile() && entry.name.endsWith('.java')) {
        found.push(path.relative(this.root, absolute).split(path.sep).join('/'));
      }
    }
  }
}
