import { promises as fs } from "fs";
import path from "path";
import type { StoragePort } from "../../ports/sys/StoragePort";

/** Stores each key as one file under `rootDir`. Keys are URI-encoded into file names. */
export class FileStorage implements StoragePort {
  private writes = 0;

  constructor(private readonly rootDir: string) {}

  async write(key: string, value: Buffer | string): Promise<void> {
    await fs.mkdir(this.rootDir, { recursive: true });
    const target = this.pathFor(key);
    const temp = `${target}.${process.pid}.${++this.writes}.tmp`;
    await fs.writeFile(temp, value);
    await fs.rename(temp, target);
  }

  async read(key: string): Promise<Buffer | null> {
    try {
      return await fs.readFile(this.pathFor(key));
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  async remove(key: string): Promise<void> {
    try {
      await fs.unlink(this.pathFor(key));
    } catch (err) {
      if (!isNotFound(err)) throw err;
    }
  }

  private pathFor(key: string): string {
    return path.join(this.rootDir, encodeURIComponent(key));
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
