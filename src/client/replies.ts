import type { ThreadsClient } from "./index.js";
import { MEDIA_FIELDS } from "./posts.js";
import type { ThreadsPost, PaginatedResult, RequestParams } from "./types.js";

/** Get the immediate replies to a thread */
export async function getReplies(
  client: ThreadsClient,
  threadId: string,
): Promise<PaginatedResult<ThreadsPost>> {
  return client.request<PaginatedResult<ThreadsPost>>("GET", `${threadId}/replies`, { fields: MEDIA_FIELDS });
}

/** Get conversation (all nested replies, flattened) */
export async function getConversation(
  client: ThreadsClient,
  threadId: string,
  options?: { after?: string; before?: string },
): Promise<PaginatedResult<ThreadsPost>> {
  const params: RequestParams = { fields: MEDIA_FIELDS };
  if (options?.after) params.after = options.after;
  if (options?.before) params.before = options.before;
  return client.request<PaginatedResult<ThreadsPost>>("GET", `${threadId}/conversation`, params);
}

async function manageReply(client: ThreadsClient, replyId: string, hide: boolean): Promise<boolean> {
  const res = await client.request<{ success?: boolean }>("POST", `${replyId}/manage_reply`, { hide });
  return Boolean(res.success);
}

/** Hide a top-level reply (and everything nested under it) */
export async function hideReply(client: ThreadsClient, replyId: string): Promise<boolean> {
  return manageReply(client, replyId, true);
}

/** Unhide a reply */
export async function unhideReply(client: ThreadsClient, replyId: string): Promise<boolean> {
  return manageReply(client, replyId, false);
}
