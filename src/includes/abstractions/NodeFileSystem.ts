import * as fs from "node:fs/promises";
import { IFileSystem } from "./IFileSystem";

/**
 * latin1 maps every byte to one code unit and back, so bytes that are not
 * valid UTF-8 survive a rewrite. Markers, fences and comment prefixes are ASCII.
 */
const ENCODING: BufferEncoding = "latin1";

export class NodeFileSystem implements IFileSystem {
  async readFile(path: string): Promise<string> {
    return fs.readFile(path, ENCODING);
  }

  async writeFile(path: string, content: string): Promise<void> {
    await fs.writeFile(path, content, ENCODING);
  }

  async rename(from: string, to: string): Promise<void> {
    await fs.rename(from, to);
  }

  async unlink(path: string): Promise<void> {
    await fs.unlink(path);
  }

  async exists(path: string): Promise<boolean> {
    try {
      await fs.access(path);
      return true;
    } catch {
      return false;
    }
  }
}
