import { randomBytes } from "node:crypto";
import type { Dirent } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { ArtifactNotFoundError, ExitCodes, MirrorError } from "./errors.js";
import { artifactFilename, datePath, sanitizeFolderPath } from "./filenames.js";
import type { ArtifactStore, Logger } from "./types.js";

export const ARTIFACT_DIR = "eml";
export const QUARANTINE_DIR = "_Quarantine";
export const MAX_COLLISIONS = 1000;

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

function toPosix(relativePath: string): string {
  return relativePath.split(path.sep).join("/");
}

/**
 * Stores raw message artifacts under `<root>/eml/...`. Every write lands in a
 * temp file first and is hard-linked into place, so a final name is never
 * half-written and never overwritten.
 */
export class FileArtifactStore implements ArtifactStore {
  private readonly rootDir: string;
  private readonly logger: Logger | undefined;

  constructor(rootDir: string, logger?: Logger) {
    this.rootDir = path.resolve(rootDir);
    this.logger = logger;
  }

  /** Absolute path for `relativePath`; rejects anything outside the root. */
  resolve(relativePath: string): string {
    const full = path.resolve(this.rootDir, relativePath);
    const rel = path.relative(this.rootDir, full);
    if (rel === "" || rel.startsWith("..") || path.isAbsolute(rel)) {
      throw new ArtifactNotFoundError(relativePath);
    }
    return full;
  }

  async storeArtifact(
    content: Buffer,
    folderPath: string,
    subject: string | null,
    receivedAt: Date,
  ): Promise<string> {
    const dirRel = path.posix.join(
      ARTIFACT_DIR,
      sanitizeFolderPath(folderPath),
      datePath(receivedAt),
    );
    const dirAbs = this.resolve(dirRel);
    await fs.mkdir(dirAbs, { recursive: true });

    const baseName = artifactFilename(subject, receivedAt);
    const tmp = path.join(dirAbs, `${baseName}.${randomBytes(6).toString("hex")}.tmp`);

    try {
      await fs.writeFile(tmp, content);
      const written = (await fs.stat(tmp)).size;
      if (written !== content.length) {
        throw new MirrorError(
          `Size mismatch writing ${baseName}: expected ${content.length} bytes, wrote ${written}`,
          ExitCodes.fileSystem,
        );
      }

      for (let counter = 0; counter < MAX_COLLISIONS; counter++) {
        const name = artifactFilename(subject, receivedAt, counter);
        if (await this.linkIfFree(tmp, path.join(dirAbs, name))) {
          return `${dirRel}/${name}`;
        }
      }
      throw new MirrorError(
        `No free filename for ${baseName} after ${MAX_COLLISIONS} attempts`,
        ExitCodes.fileSystem,
      );
    } finally {
      await fs.rm(tmp, { force: true });
    }
  }

  async moveArtifact(fromPath: string, toFolderPath: string): Promise<string> {
    const source = await this.requireExisting(fromPath);

    // eml/<folder...>/<YYYY>/<MM>/<file>: keep the date part and file name.
    const segments = fromPath.split("/");
    const tail = segments.slice(-3);
    const dirRel = path.posix.join(
      ARTIFACT_DIR,
      sanitizeFolderPath(toFolderPath),
      ...tail.slice(0, -1),
    );
    const fileName = tail[tail.length - 1] ?? path.basename(fromPath);
    const targetRel = `${dirRel}/${fileName}`;
    if (targetRel === fromPath) return fromPath;

    return this.relocate(source, dirRel, fileName);
  }

  async moveToQuarantine(fromPath: string): Promise<string> {
    const source = await this.requireExisting(fromPath);
    const dirRel = path.posix.join(QUARANTINE_DIR, path.posix.dirname(fromPath));
    return this.relocate(source, dirRel, path.posix.basename(fromPath));
  }

  async getSize(relativePath: string): Promise<number> {
    const full = await this.requireExisting(relativePath);
    return (await fs.stat(full)).size;
  }

  async removeArtifact(relativePath: string): Promise<void> {
    await fs.rm(this.resolve(relativePath), { force: true });
  }

  /** Remove `*.tmp` files older than `maxAgeMs` left behind by an interrupted run. */
  async sweepTempFiles(maxAgeMs: number): Promise<number> {
    const cutoff = Date.now() - maxAgeMs;
    let removed = 0;

    await this.walkFiles(ARTIFACT_DIR, async (full, name) => {
      if (!name.endsWith(".tmp")) return;
      const stat = await fs.stat(full);
      if (stat.mtimeMs < cutoff) {
        await fs.rm(full, { force: true });
        removed++;
        this.logger?.debug("Removed stale temp file", {
          path: toPosix(path.relative(this.rootDir, full)),
        });
      }
    });
    return removed;
  }

  /** Relative paths of every `.eml` file, quarantined ones included, sorted. */
  async listArtifacts(): Promise<string[]> {
    const found: string[] = [];
    for (const top of [ARTIFACT_DIR, QUARANTINE_DIR]) {
      await this.walkFiles(top, async (full, name) => {
        if (name.endsWith(".eml")) found.push(toPosix(path.relative(this.rootDir, full)));
      });
    }
    return found.sort();
  }

  private async walkFiles(
    topDir: string,
    visit: (full: string, name: string) => Promise<void>,
  ): Promise<void> {
    const walk = async (dir: string): Promise<void> => {
      let entries: Dirent[];
      try {
        entries = await fs.readdir(dir, { withFileTypes: true });
      } catch (err) {
        if (isErrnoException(err) && err.code === "ENOENT") return;
        throw err;
      }
      for (const entry of entries) {
        const full = path.join(dir, entry.name);
        if (entry.isDirectory()) {
          await walk(full);
        } else if (entry.isFile()) {
          await visit(full, entry.name);
        }
      }
    };
    await walk(path.join(this.rootDir, topDir));
  }

  private async requireExisting(relativePath: string): Promise<string> {
    const full = this.resolve(relativePath);
    try {
      await fs.access(full);
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") {
        throw new ArtifactNotFoundError(relativePath);
      }
      throw err;
    }
    return full;
  }

  private async linkIfFree(source: string, target: string): Promise<boolean> {
    try {
      await fs.link(source, target);
      return true;
    } catch (err) {
      if (isErrnoException(err) && err.code === "EEXIST") return false;
      throw err;
    }
  }

  /** Link `source` into `dirRel` under a free name, then drop the source. */
  private async relocate(
    source: string,
    dirRel: string,
    fileName: string,
  ): Promise<string> {
    const dirAbs = this.resolve(dirRel);
    await fs.mkdir(dirAbs, { recursive: true });

    const ext = path.posix.extname(fileName);
    const stem = fileName.slice(0, fileName.length - ext.length);
    for (let counter = 0; counter < MAX_COLLISIONS; counter++) {
      const name = counter === 0 ? fileName : `${stem}_${counter}${ext}`;
      if (await this.linkIfFree(source, path.join(dirAbs, name))) {
        await fs.unlink(source);
        return `${dirRel}/${name}`;
      }
    }
    throw new MirrorError(
      `No free filename for ${fileName} in ${dirRel} after ${MAX_COLLISIONS} attempts`,
      ExitCodes.fileSystem,
    );
  }
}

export function createArtifactStore(rootDir: string, logger?: Logger): FileArtifactStore {
  return new FileArtifactStore(rootDir, logger);
}
