/**
 * Microsoft Graph implementation of the remote message source.
 *
 * Every request acquires a rate-limiter slot first and asks for immutable
 * ids, so an item keeps its id when it moves between folders. Retrying is
 * the caller's job; this layer only turns HTTP failures into
 * `RemoteApiError`s the retry classifier understands.
 */

import type { z } from "zod";
import {
  MirrorError,
  parseRetryAfter,
  RemoteApiError,
  SyncCancelledError,
} from "../core/index.js";
import type {
  DeltaPage,
  ItemChange,
  Logger,
  RateLimiter,
  RemoteFolder,
  RemoteItem,
  RemoteMessageSource,
} from "../core/index.js";
import {
  type FetchLike,
  type GraphFolder,
  GraphFolderCollectionSchema,
  type GraphMailClientOptions,
  type GraphMessage,
  GraphMessageCollectionSchema,
  type GraphRecipient,
  GraphErrorBodySchema,
  GraphUserSchema,
  type TokenProvider,
} from "./types.js";

export const GRAPH_BASE_URL = "https://graph.microsoft.com/v1.0";
export const IMMUTABLE_ID_PREFERENCE = 'IdType="ImmutableId"';

const FOLDER_FIELDS = "id,displayName,parentFolderId,totalItemCount,unreadItemCount,childFolderCount";
const MESSAGE_FIELDS =
  "id,subject,from,toRecipients,ccRecipients,receivedDateTime,hasAttachments,parentFolderId,conversationId,internetMessageId";

// ─── Mapping ───

function addressOf(recipient: GraphRecipient | null | undefined): string | null {
  return recipient?.emailAddress?.address ?? null;
}

export function toRemoteFolder(folder: GraphFolder): RemoteFolder {
  return {
    id: folder.id,
    parentId: folder.parentFolderId ?? null,
    displayName: folder.displayName ?? "Unknown",
    totalItemCount: folder.totalItemCount ?? 0,
    unreadItemCount: folder.unreadItemCount ?? 0,
  };
}

function changeOf(message: GraphMessage): ItemChange {
  const removed = message["@removed"];
  if (!removed) return { kind: "upsert" };
  if (removed.reason?.toLowerCase() === "deleted") return { kind: "deleted" };
  // "changed": the item left this folder; parentFolderId names where it went.
  return { kind: "moved", newParentId: message.parentFolderId ?? null };
}

export function toRemoteItem(message: GraphMessage): RemoteItem {
  const recipients = [...(message.toRecipients ?? []), ...(message.ccRecipients ?? [])]
    .map(addressOf)
    .filter((address): address is string => address !== null);

  return {
    // With the ImmutableId preference the Graph id is already stable.
    identity: { mutableId: message.id, immutableId: message.id },
    subject: message.subject ?? null,
    sender: addressOf(message.from),
    recipients,
    receivedAt: message.receivedDateTime ? new Date(message.receivedDateTime) : new Date(0),
    size: 0,
    hasAttachments: message.hasAttachments ?? false,
    conversationId: message.conversationId ?? null,
    inReplyTo: null,
    change: changeOf(message),
  };
}

/** `2024-03-05T10:30:00Z`: second precision, as `$filter` expects. */
export function formatFilterDate(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

// ─── Client ───

export class GraphMailClient implements RemoteMessageSource {
  private readonly baseUrl: string;
  private readonly scope: string;
  private readonly pageSize: number;
  private readonly tokenProvider: TokenProvider;
  private readonly fetchImpl: FetchLike;
  private readonly rateLimiter: RateLimiter;
  private readonly logger: Logger;
  private readonly mailbox: string | undefined;

  constructor(opts: GraphMailClientOptions, rateLimiter: RateLimiter, logger: Logger) {
    this.baseUrl = (opts.baseUrl ?? GRAPH_BASE_URL).replace(/\/+$/, "");
    this.mailbox = opts.mailbox;
    this.scope = opts.mailbox ? `users/${encodeURIComponent(opts.mailbox)}` : "me";
    this.pageSize = opts.pageSize ?? 50;
    this.tokenProvider = opts.tokenProvider;
    this.fetchImpl = opts.fetch ?? ((url, init) => fetch(url, init));
    this.rateLimiter = rateLimiter;
    this.logger = logger;
  }

  // ── Identity ──

  async getMailboxIdentity(signal?: AbortSignal): Promise<string> {
    if (this.mailbox) return this.mailbox;
    const user = await this.getJson(
      `${this.baseUrl}/me?$select=mail,userPrincipalName`,
      GraphUserSchema,
      signal,
    );
    const identity = user.mail ?? user.userPrincipalName;
    if (!identity) {
      throw new MirrorError("Could not determine the mailbox address of the signed-in user");
    }
    return identity;
  }

  // ── Folders ──

  async listFolders(signal?: AbortSignal): Promise<RemoteFolder[]> {
    const folders: RemoteFolder[] = [];
    const roots = await this.collectFolders(
      `${this.baseUrl}/${this.scope}/mailFolders?includeHiddenFolders=true&$top=100&$select=${FOLDER_FIELDS}`,
      signal,
    );
    for (const root of roots) {
      await this.walkFolder(root, folders, signal);
    }
    this.logger.debug(`Found ${folders.length} mail folder(s)`);
    return folders;
  }

  private async walkFolder(
    folder: GraphFolder,
    into: RemoteFolder[],
    signal?: AbortSignal,
  ): Promise<void> {
    into.push(toRemoteFolder(folder));
    if (folder.childFolderCount === 0) return;

    let children: GraphFolder[];
    try {
      children = await this.collectFolders(
        `${this.baseUrl}/${this.scope}/mailFolders/${encodeURIComponent(folder.id)}/childFolders?includeHiddenFolders=true&$top=100&$select=${FOLDER_FIELDS}`,
        signal,
      );
    } catch (err) {
      if (err instanceof RemoteApiError && err.status === 404) return;
      throw err;
    }
    for (const child of children) {
      await this.walkFolder(child, into, signal);
    }
  }

  private async collectFolders(url: string, signal?: AbortSignal): Promise<GraphFolder[]> {
    const all: GraphFolder[] = [];
    let next: string | null = url;
    while (next) {
      const page: z.infer<typeof GraphFolderCollectionSchema> = await this.getJson(
        next,
        GraphFolderCollectionSchema,
        signal,
      );
      all.push(...page.value);
      next = page["@odata.nextLink"] ?? null;
    }
    return all;
  }

  // ── Messages ──

  /**
   * One page of the folder's delta round. A null cursor starts a new round;
   * otherwise the cursor is the next/delta link from an earlier page.
   */
  async fetchDeltaPage(
    folderId: string,
    cursor: string | null,
    signal?: AbortSignal,
  ): Promise<DeltaPage> {
    const url =
      cursor ??
      `${this.baseUrl}/${this.scope}/mailFolders/${encodeURIComponent(folderId)}/messages/delta?$select=${MESSAGE_FIELDS}`;
    const page = await this.getJson(url, GraphMessageCollectionSchema, signal, [
      `odata.maxpagesize=${this.pageSize}`,
    ]);

    const nextLink = page["@odata.nextLink"] ?? null;
    const deltaLink = page["@odata.deltaLink"] ?? null;
    return {
      items: page.value.map(toRemoteItem),
      hasMorePages: nextLink !== null,
      nextPageCursor: nextLink,
      finalCursor: nextLink === null ? deltaLink : null,
    };
  }

  async fetchSinceDate(
    folderId: string,
    since: Date,
    signal?: AbortSignal,
  ): Promise<RemoteItem[]> {
    const filter = encodeURIComponent(`receivedDateTime ge ${formatFilterDate(since)}`);
    const orderBy = encodeURIComponent("receivedDateTime desc");
    let next: string | null =
      `${this.baseUrl}/${this.scope}/mailFolders/${encodeURIComponent(folderId)}/messages` +
      `?$select=${MESSAGE_FIELDS}&$filter=${filter}&$orderby=${orderBy}&$top=100`;

    const items: RemoteItem[] = [];
    while (next) {
      const page: z.infer<typeof GraphMessageCollectionSchema> = await this.getJson(
        next,
        GraphMessageCollectionSchema,
        signal,
      );
      items.push(...page.value.map(toRemoteItem));
      next = page["@odata.nextLink"] ?? null;
    }
    return items;
  }

  async fetchRawContent(mutableId: string, signal?: AbortSignal): Promise<Buffer> {
    const res = await this.request(
      `${this.baseUrl}/${this.scope}/messages/${encodeURIComponent(mutableId)}/$value`,
      signal,
      "message/rfc822",
    );
    const content = Buffer.from(await this.readBody(() => res.arrayBuffer(), signal));
    if (content.length === 0) {
      throw new MirrorError(`No MIME content returned for message ${mutableId}`);
    }
    return content;
  }

  // ── HTTP ──

  private async getJson<T>(
    url: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    signal?: AbortSignal,
    preferences: string[] = [],
  ): Promise<T> {
    const res = await this.request(url, signal, "application/json", preferences);
    const body: unknown = await this.readBody(() => res.json(), signal);
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new MirrorError(
        `Unexpected response shape from ${new URL(url).pathname}: ${parsed.error.issues[0]?.message ?? "invalid body"}`,
      );
    }
    return parsed.data;
  }

  private async request(
    url: string,
    signal: AbortSignal | undefined,
    accept: string,
    preferences: string[] = [],
  ): Promise<Response> {
    this.assertSameOrigin(url);
    await this.rateLimiter.acquire(signal);
    const token = await this.tokenProvider();

    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        method: "GET",
        headers: {
          Authorization: `Bearer ${token}`,
          Accept: accept,
          Prefer: [IMMUTABLE_ID_PREFERENCE, ...preferences].join(", "),
        },
        signal,
      });
    } catch (err) {
      if (signal?.aborted) throw new SyncCancelledError();
      throw err;
    }

    if (!res.ok) throw await this.toApiError(res, signal);
    return res;
  }

  /** The body streams after `fetch` resolves, so an abort can still land here. */
  private async readBody<T>(read: () => Promise<T>, signal: AbortSignal | undefined): Promise<T> {
    try {
      return await read();
    } catch (err) {
      if (signal?.aborted) throw new SyncCancelledError();
      throw err;
    }
  }

  private async toApiError(res: Response, signal: AbortSignal | undefined): Promise<RemoteApiError> {
    const retryAfterMs = parseRetryAfter(res.headers.get("retry-after"));
    if (res.status === 429) this.rateLimiter.updateFromHeaders(res.headers);

    let code: string | null = null;
    let message = `${res.status} ${res.statusText}`.trim();
    const text = await this.readBody(() => res.text(), signal);
    if (text) {
      try {
        const parsed = GraphErrorBodySchema.safeParse(JSON.parse(text));
        if (parsed.success) {
          code = parsed.data.error.code ?? null;
          message = parsed.data.error.message ?? message;
        }
      } catch {
        message = text.slice(0, 200);
      }
    }
    return new RemoteApiError(`Graph API error (${res.status}): ${message}`, res.status, code, retryAfterMs);
  }

  /** Cursors are server-issued URLs; never send the token anywhere else. */
  private assertSameOrigin(url: string): void {
    if (new URL(url).origin !== new URL(this.baseUrl).origin) {
      throw new MirrorError(`Refusing to call ${new URL(url).origin}: not the Graph endpoint`);
    }
  }
}
