import { randomUUID } from "node:crypto";
import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { basename, join, resolve } from "node:path";

export interface IFileStorage {
  /** Returns the path the bytes were written to. */
  save(tenant: string, fileName: string, data: Uint8Array): Promise<string>;
  read(path: string): Promise<Uint8Array>;
  /** False when nothing was there to remove. */
  remove(path: string): Promise<boolean>;
}

function safeSegment(value: string): string {
  const cleaned = value.replace(/[^\w.-]+/g, "_").replace(/^\.+/, "");
  return cleaned.length > 0 ? cleaned : "file";
}

function isMissingFile(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

/**
 * Original uploads under `<root>/<tenant>/<uuid>-<name>`.
 */
export class LocalFileStorage implements IFileStorage {
  private readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  async save(tenant: string, fileName: string, data: Uint8Array): Promise<string> {
    const dir = join(this.root, safeSegment(tenant));
    await mkdir(dir, { recursive: true });
    const path = join(dir, `${randomUUID()}-${safeSegment(basename(fileName))}`);
    await writeFile(path, data);
    return path;
  }

  async read(path: string): Promise<Uint8Array> {
    return new Uint8Array(await readFile(path));
  }

  async remove(path: string): Promise<boolean> {
    try {
      await rm(path);
      return true;
    } catch (err) {
      if (isMissingFile(err)) return false;
      throw err;
    }
  }
}
