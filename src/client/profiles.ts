import type { ThreadsClient } from "./index.js";
import type { PublishingLimit, ThreadsUser } from "./types.js";

const PROFILE_FIELDS = "id,username,threads_profile_picture_url,threads_biography";
const QUOTA_FIELDS = "config,quota_usage,reply_config,reply_quota_usage";

/** Get a user's profile; defaults to the authenticated user */
export async function account(client: ThreadsClient, userId = "me"): Promise<ThreadsUser> {
  return client.request<ThreadsUser>("GET", userId, { fields: PROFILE_FIELDS });
}

/** Current publishing quota usage */
export async function publishingLimit(client: ThreadsClient): Promise<{ data: PublishingLimit[] }> {
  return client.request<{ data: PublishingLimit[] }>("GET", `${client.userId}/threads_publishing_limit`, {
    fields: QUOTA_FIELDS,
  });
}
