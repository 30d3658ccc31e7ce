import type {
  DeltaPage,
  ItemChange,
  Logger,
  RemoteFolder,
  RemoteItem,
  RemoteMessageSource,
} from "../../../src/connectors/core/types.js";

export const RECEIVED_AT = new Date("2024-03-05T10:30:00Z");

export function remoteFolder(
  id: string,
  displayName: string,
  parentId: string | null = null,
): RemoteFolder {
  return { id, parentId, displayName, totalItemCount: 0, unreadItemCount: 0 };
}

export interface ItemOverrides {
  mutableId?: string;
  subject?: string | null;
  receivedAt?: Date;
  change?: ItemChange;
  recipients?: string[];
}

export function remoteItem(immutableId: string, overrides: ItemOverrides = {}): RemoteItem {
  return {
    identity: { mutableId: overrides.mutableId ?? `m-${immutableId}`, immutableId },
    subject: overrides.subject === undefined ? `Message ${immutableId}` : overrides.subject,
    sender: "alice@example.com",
    recipients: overrides.recipients ?? ["bob@example.com"],
    receivedAt: overrides.receivedAt ?? RECEIVED_AT,
    size: 0,
    hasAttachments: false,
    conversationId: null,
    inReplyTo: null,
    change: overrides.change ?? { kind: "upsert" },
  };
}

export function deltaPage(
  items: RemoteItem[],
  cursors: { next?: string; final?: string } = {},
): DeltaPage {
  const more = cursors.next !== undefined;
  return {
    items,
    hasMorePages: more,
    nextPageCursor: cursors.next ?? null,
    finalCursor: more ? null : (cursors.final ?? null),
  };
}

export function rawMessage(mutableId: string): Buffer {
  return Buffer.from(`Message-ID: <${mutableId}@example.com>\r\nSubject: test\r\n\r\nbody\r\n`);
}

/** Collects every log call; tests assert on the lines they care about. */
export class RecordingLogger implements Logger {
  readonly lines: Array<{ level: string; msg: string }> = [];

  debug(msg: string): void {
    this.lines.push({ level: "debug", msg });
  }
  info(msg: string): void {
    this.lines.push({ level: "info", msg });
  }
  warn(msg: string): void {
    this.lines.push({ level: "warn", msg });
  }
  error(msg: string): void {
    this.lines.push({ level: "error", msg });
  }
  progress(): void {}

  messages(level: string): string[] {
    return this.lines.filter((l) => l.level === level).map((l) => l.msg);
  }
}

/**
 * In-process message source. Delta pages are keyed by folder and cursor;
 * a stored `Error` is thrown instead of returned.
 */
export class FakeMessageSource implements RemoteMessageSource {
  folders: RemoteFolder[] = [];
  readonly deltaCalls: Array<{ folderId: string; cursor: string | null }> = [];
  readonly sinceCalls: Array<{ folderId: string; since: Date }> = [];
  readonly downloads: string[] = [];

  private readonly pages = new Map<string, DeltaPage | Error>();
  private readonly sinceItems = new Map<string, RemoteItem[]>();
  private readonly downloadErrors = new Map<string, Error>();

  constructor(readonly mailbox = "user@example.com") {}

  setPage(folderId: string, cursor: string | null, result: DeltaPage | Error): this {
    this.pages.set(pageKey(folderId, cursor), result);
    return this;
  }

  setSinceItems(folderId: string, items: RemoteItem[]): this {
    this.sinceItems.set(folderId, items);
    return this;
  }

  failDownload(mutableId: string, err: Error): this {
    this.downloadErrors.set(mutableId, err);
    return this;
  }

  async getMailboxIdentity(): Promise<string> {
    return this.mailbox;
  }

  async listFolders(): Promise<RemoteFolder[]> {
    return this.folders;
  }

  async fetchDeltaPage(folderId: string, cursor: string | null): Promise<DeltaPage> {
    this.deltaCalls.push({ folderId, cursor });
    const result = this.pages.get(pageKey(folderId, cursor));
    if (!result) throw new Error(`No page for ${folderId} at ${cursor ?? "start"}`);
    if (result instanceof Error) throw result;
    return result;
  }

  async fetchSinceDate(folderId: string, since: Date): Promise<RemoteItem[]> {
    this.sinceCalls.push({ folderId, since });
    return this.sinceItems.get(folderId) ?? [];
  }

  async fetchRawContent(mutableId: string): Promise<Buffer> {
    this.downloads.push(mutableId);
    const err = this.downloadErrors.get(mutableId);
    if (err) throw err;
    return rawMessage(mutableId);
  }
}

function pageKey(folderId: string, cursor: string | null): string {
  return `${folderId}\u0000${cursor ?? ""}`;
}
