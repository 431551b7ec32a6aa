import { access, mkdir, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';

export interface FileSystem {
  readText(path: string): Promise<string>;
  readJSON<T>(path: string): Promise<T>;
  writeText(path: string, content: string): Promise<void>;
  writeJSON(path: string, data: unknown): Promise<void>;
  exists(path: string): Promise<boolean>;
  /** Names of the subdirectories of `path`; empty when it does not exist. */
  listDirs(path: string): Promise<string[]>;
  mkdir(path: string): Promise<void>;
  remove(path: string): Promise<void>;
}

export class NodeFileSystem implements FileSystem {
  async readText(filePath: string): Promise<string> {
    return readFile(filePath, 'utf8');
  }

  async readJSON<T>(filePath: string): Promise<T> {
    return JSON.parse(await this.readText(filePath)) as T;
  }

  async writeText(filePath: string, content: string): Promise<void> {
    await writeFile(filePath, content, 'utf8');
  }

  async writeJSON(filePath: string, data: unknown): Promise<void> {
    await writeFile(filePath, JSON.stringify(data, null, 2), 'utf8');
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      await access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  async listDirs(dirPath: string): Promise<string[]> {
    if (!(await this.exists(dirPath))) return [];
    const entries = await readdir(dirPath, { withFileTypes: true });
    return entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name);
  }

  async mkdir(dirPath: string): Promise<void> {
    await mkdir(dirPath, { recursive: true });
  }

  async remove(filePath: string): Promise<void> {
    await rm(filePath, { recursive: true, force: true });
  }
}

export class MockFileSystem implements FileSystem {
  private files = new Map<string, string>();

  async readText(filePath: string): Promise<string> {
    const content = this.files.get(filePath);
    if (content === undefined) throw new Error(`ENOENT: ${filePath}`);
    return content;
  }

  async readJSON<T>(filePath: string): Promise<T> {
    return JSON.parse(await this.readText(filePath)) as T;
  }

  async writeText(filePath: string, content: string): Promise<void> {
    this.files.set(filePath, content);
  }

  async writeJSON(filePath: string, data: unknown): Promise<void> {
    this.files.set(filePath, JSON.stringify(data, null, 2));
  }

  async exists(filePath: string): Promise<boolean> {
    if (this.files.has(filePath)) return true;
    const prefix = `${filePath}/`;
    return [...this.files.keys()].some((k) => k.startsWith(prefix));
  }

  async listDirs(dirPath: string): Promise<string[]> {
    const prefix = `${dirPath}/`;
    const dirs = new Set<string>();
    for (const key of this.files.keys()) {
      if (!key.startsWith(prefix)) continue;
      const rest = key.slice(prefix.length);
      const [first, ...others] = rest.split(path.posix.sep);
      if (first && others.length > 0) dirs.add(first);
    }
    return [...dirs];
  }

  async mkdir(_path: string): Promise<void> {}

  async remove(filePath: string): Promise<void> {
    this.files.delete(filePath);
  }

  setFile(filePath: string, content: string): void {
    this.files.set(filePath, content);
  }

  getFiles(): Map<string, string> {
    return new Map(this.files);
  }
}
