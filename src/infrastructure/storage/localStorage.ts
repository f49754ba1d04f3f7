import { promises as fs } from "node:fs";
import path from "node:path";
import { randomUUID } from "node:crypto";
import type { StoragePort } from "../../interfaces/ports";

export class LocalStorage implements StoragePort {
  constructor(private readonly baseDir: string) {}

  resolvePath(target: string) {
    return path.resolve(this.baseDir, target);
  }

  async ensureDir(dir: string) {
    const resolved = this.resolvePath(dir);
    await fs.mkdir(resolved, { recursive: true });
    return resolved;
  }

  // Readers of the destination never see a partially written file.
  async writeFile(target: string, data: Buffer) {
    const resolved = this.resolvePath(target);
    await fs.mkdir(path.dirname(resolved), { recursive: true });
    const tmpPath = `${resolved}.${randomUUID()}.tmp`;
    try {
      await fs.writeFile(tmpPath, data);
      await fs.rename(tmpPath, resolved);
    } catch (error) {
      await fs.rm(tmpPath, { force: true });
      throw error;
    }
  }

  async readFile(target: string) {
    return fs.readFile(this.resolvePath(target));
  }

  async exists(target: string) {
    return fileExists(this.resolvePath(target));
  }

  async size(target: string) {
    const stats = await fs.stat(this.resolvePath(target));
    return stats.size;
  }
}

export async function fileExists(filePath: string) {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}
