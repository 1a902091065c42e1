import { IClock } from "../abstractions/IClock";
import { IFileSystem } from "../abstractions/IFileSystem";
import { ILogger } from "../../logging";

export class AtomicFileWriter {
  constructor(
    private readonly fs: IFileSystem,
    private readonly clock: IClock,
    private readonly logger: ILogger,
    private readonly pid: number = process.pid
  ) {}

  tempPathFor(path: string): string {
    return `${path}.${this.pid}.${this.clock.now().getTime()}.tmp`;
  }

  /** Writes to a sibling temp file, then renames it over `path`. */
  async write(path: string, content: string): Promise<void> {
    const tempPath = this.tempPathFor(path);
    try {
      await this.fs.writeFile(tempPath, content);
      await this.fs.rename(tempPath, path);
    } catch (err) {
      await this.removeTemp(tempPath);
      throw err;
    }
  }

  private async removeTemp(tempPath: string): Promise<void> {
    try {
      if (await this.fs.exists(tempPath)) {
        await this.fs.unlink(tempPath);
      }
    } catch (cleanupErr) {
      const reason = cleanupErr instanceof Error ? cleanupErr.message : String(cleanupErr);
      this.logger.debug(`Could not remove temporary file ${tempPath}: ${reason}`);
    }
  }
}
