/**
 * Microsoft Graph wire shapes used by the mail client. Only the fields the
 * mirror reads are declared; everything else in a response is ignored.
 */

import { z } from "zod";

// ─── Responses ───

const GraphRecipientSchema = z.object({
  emailAddress: z
    .object({
      address: z.string().nullish(),
      name: z.string().nullish(),
    })
    .nullish(),
});

export const GraphUserSchema = z.object({
  mail: z.string().nullish(),
  userPrincipalName: z.string().nullish(),
});

export const GraphFolderSchema = z.object({
  id: z.string(),
  displayName: z.string().nullish(),
  parentFolderId: z.string().nullish(),
  totalItemCount: z.number().nullish(),
  unreadItemCount: z.number().nullish(),
  childFolderCount: z.number().nullish(),
});

export const GraphMessageSchema = z.object({
  id: z.string(),
  subject: z.string().nullish(),
  from: GraphRecipientSchema.nullish(),
  toRecipients: z.array(GraphRecipientSchema).nullish(),
  ccRecipients: z.array(GraphRecipientSchema).nullish(),
  receivedDateTime: z.string().nullish(),
  hasAttachments: z.boolean().nullish(),
  parentFolderId: z.string().nullish(),
  conversationId: z.string().nullish(),
  internetMessageId: z.string().nullish(),
  "@removed": z.object({ reason: z.string().nullish() }).nullish(),
});

export function graphCollectionSchema<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    value: z.array(item).default([]),
    "@odata.nextLink": z.string().nullish(),
    "@odata.deltaLink": z.string().nullish(),
  });
}

export const GraphFolderCollectionSchema = graphCollectionSchema(GraphFolderSchema);
export const GraphMessageCollectionSchema = graphCollectionSchema(GraphMessageSchema);

export const GraphErrorBodySchema = z.object({
  error: z.object({
    code: z.string().nullish(),
    message: z.string().nullish(),
  }),
});

export type GraphRecipient = z.infer<typeof GraphRecipientSchema>;
export type GraphFolder = z.infer<typeof GraphFolderSchema>;
export type GraphMessage = z.infer<typeof GraphMessageSchema>;

// ─── Client configuration ───

/** Returns a bearer token for each request; acquisition and refresh live elsewhere. */
export type TokenProvider = () => string | Promise<string>;

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface GraphMailClientOptions {
  tokenProvider: TokenProvider;
  /** Mailbox to read; the signed-in user's mailbox when omitted. */
  mailbox?: string;
  baseUrl?: string;
  /** `odata.maxpagesize` for delta requests. */
  pageSize?: number;
  fetch?: FetchLike;
}
