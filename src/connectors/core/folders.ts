import { minimatch } from "minimatch";
import type { Retrier } from "./retry.js";
import type { StateDatabase } from "./state.js";
import type {
  DirectoryFolder,
  FolderRecord,
  Logger,
  RemoteFolder,
  RemoteMessageSource,
} from "./types.js";

interface ParentLinked {
  id: string;
  parentId: string | null;
}

// ─── Ordering ───

/**
 * Order folders so a parent in the set always precedes its children.
 * Folders whose parent is outside the set are ready immediately. A cycle or
 * other malformed input stops after n² dequeues; whatever is left is
 * appended in its original order.
 */
export function orderFoldersForPersistence<T extends ParentLinked>(
  folders: readonly T[],
  logger?: Logger,
): T[] {
  const ids = new Set(folders.map((f) => f.id));
  const emitted = new Set<string>();
  const result: T[] = [];
  const queue = [...folders];
  const budget = folders.length * folders.length;

  let iterations = 0;
  while (queue.length > 0 && iterations < budget) {
    iterations++;
    const folder = queue.shift();
    if (!folder) break;
    const parentId = folder.parentId;
    if (!parentId || !ids.has(parentId) || emitted.has(parentId)) {
      result.push(folder);
      emitted.add(folder.id);
    } else {
      queue.push(folder);
    }
  }

  if (queue.length > 0) {
    logger?.warn("Folder hierarchy has unresolved parents, appending in listing order", {
      unresolved: queue.length,
    });
    for (const folder of folders) {
      if (!emitted.has(folder.id)) {
        result.push(folder);
        emitted.add(folder.id);
      }
    }
  }
  return result;
}

// ─── Paths ───

function pathSegment(displayName: string): string {
  const name = displayName.replace(/\//g, "_").trim();
  return name || "Unnamed";
}

/**
 * Give every folder a slash-separated path built from its ancestors' names.
 * Siblings that would share a path (case-insensitive) get ` (2)`, ` (3)`...
 */
export function buildFolderPaths(
  folders: readonly RemoteFolder[],
  logger?: Logger,
): DirectoryFolder[] {
  const ordered = orderFoldersForPersistence(folders, logger);
  const pathById = new Map<string, string>();
  const taken = new Set<string>();
  const result: DirectoryFolder[] = [];

  for (const folder of ordered) {
    // A parent that has no path yet is missing or part of a cycle.
    const parentPath = folder.parentId ? pathById.get(folder.parentId) : undefined;
    const base = parentPath
      ? `${parentPath}/${pathSegment(folder.displayName)}`
      : pathSegment(folder.displayName);

    let candidate = base;
    for (let n = 2; taken.has(candidate.toLowerCase()); n++) {
      candidate = `${base} (${n})`;
    }
    taken.add(candidate.toLowerCase());
    pathById.set(folder.id, candidate);
    result.push({ ...folder, path: candidate });
  }
  return result;
}

// ─── Exclusion ───

function hasGlobMagic(pattern: string): boolean {
  return /[*?[\]{}]/.test(pattern);
}

/** Build a predicate that is true for folder paths matching any pattern. */
export function createFolderMatcher(patterns: readonly string[]): (folderPath: string) => boolean {
  const active = patterns.map((p) => p.trim()).filter((p) => p.length > 0);
  return (folderPath) => {
    if (!folderPath) return false;
    const lower = folderPath.toLowerCase();
    return active.some((pattern) => {
      if (!hasGlobMagic(pattern)) {
        const plain = pattern.toLowerCase();
        return lower === plain || lower.startsWith(`${plain}/`);
      }
      return minimatch(folderPath, pattern, { nocase: true, dot: true });
    });
  };
}

export function filterExcludedFolders<T extends { path: string }>(
  folders: readonly T[],
  patterns: readonly string[],
): T[] {
  if (patterns.length === 0) return [...folders];
  const isExcluded = createFolderMatcher(patterns);
  return folders.filter((f) => !isExcluded(f.path));
}

/** Folders matching any pattern, with their descendants; every folder when there are none. */
export function filterIncludedFolders<T extends { path: string }>(
  folders: readonly T[],
  patterns: readonly string[],
): T[] {
  if (patterns.length === 0) return [...folders];
  const isIncluded = createFolderMatcher(patterns);
  return folders.filter((f) => isIncluded(f.path));
}

// ─── Directory ───

export interface FolderDirectoryDeps {
  source: RemoteMessageSource;
  retry: Retrier;
  logger: Logger;
}

export class FolderDirectory {
  private readonly source: RemoteMessageSource;
  private readonly retry: Retrier;
  private readonly logger: Logger;

  constructor(deps: FolderDirectoryDeps) {
    this.source = deps.source;
    this.retry = deps.retry;
    this.logger = deps.logger;
  }

  /** Remote folders with local paths, exclusions applied, parents first. */
  async enumerate(
    excludePatterns: readonly string[],
    signal?: AbortSignal,
  ): Promise<DirectoryFolder[]> {
    const remote = await this.retry(
      "list folders",
      () => this.source.listFolders(signal),
      signal,
    );
    const withPaths = buildFolderPaths(remote, this.logger);
    const kept = filterExcludedFolders(withPaths, excludePatterns);
    if (kept.length < withPaths.length) {
      this.logger.info(`Excluded ${withPaths.length - kept.length} folder(s)`);
    }
    return kept;
  }

  /**
   * Upsert folders in order. Change cursors and sync times already stored
   * for a folder are kept. A parent not persisted earlier in the same pass
   * (outside the working set, or part of a cycle) is stored as null.
   */
  persist(folders: readonly DirectoryFolder[], state: StateDatabase, now: Date): void {
    const persisted = new Set<string>();
    const timestamp = now.toISOString();

    for (const folder of orderFoldersForPersistence(folders, this.logger)) {
      const existing = state.getFolder(folder.id);
      const record: FolderRecord = {
        id: folder.id,
        parentId: folder.parentId && persisted.has(folder.parentId) ? folder.parentId : null,
        localPath: folder.path,
        displayName: folder.displayName,
        totalItemCount: folder.totalItemCount,
        unreadItemCount: folder.unreadItemCount,
        deltaToken: existing?.deltaToken ?? null,
        lastSyncAt: existing?.lastSyncAt ?? null,
        createdAt: existing?.createdAt ?? timestamp,
        updatedAt: timestamp,
      };
      state.upsertFolder(record);
      persisted.add(folder.id);
    }
  }
}
