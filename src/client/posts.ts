import type { ThreadsClient } from "./index.js";
import { PublishingError, ResponseError, ValidationError } from "../errors.js";
import {
  CONTAINER_STATUSES,
  type Attachment,
  type ContainerState,
  type ContainerStatus,
  type PaginatedResult,
  type ReplyControl,
  type RequestParams,
  type ThreadsPost,
} from "./types.js";

const DEFAULT_POLL_INTERVAL_MS = 2000;
const DEFAULT_POLL_TIMEOUT_MS = 300_000;

export const CAROUSEL_MIN_ITEMS = 2;
export const CAROUSEL_MAX_ITEMS = 10;

const MEDIA_FIELDS = [
  "children",
  "id",
  "is_quote_post",
  "media_product_type",
  "media_type",
  "media_url",
  "owner",
  "permalink",
  "shortcode",
  "text",
  "thumbnail_url",
  "timestamp",
  "username",
].join(",");

export interface ReplyOptions {
  reply_control?: ReplyControl;
  reply_to_id?: string;
}

export interface ContainerOptions extends ReplyOptions {
  text?: string;
  media?: Attachment;
  is_carousel_item?: boolean;
}

export interface CarouselOptions extends ReplyOptions {
  text?: string;
}

export interface PublishOptions extends ReplyOptions {
  text?: string;
  attachments?: readonly Attachment[];
}

export interface PollOptions {
  pollIntervalMs?: number;
  timeoutMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  /** Called with every status read while waiting */
  onStatus?: (status: ContainerStatus) => void;
}

function delay(ms: number): Promise<void> {
  return new Promise<void>((r) => setTimeout(r, ms));
}

function isContainerState(value: string): value is ContainerState {
  return CONTAINER_STATUSES.some((s) => s === value);
}

function validateAttachment(media: Attachment): void {
  if (media.type !== "IMAGE" && media.type !== "VIDEO") {
    throw new ValidationError(`Unsupported media type: ${String(media.type)}. Use IMAGE or VIDEO.`);
  }
  let url: URL;
  try {
    url = new URL(media.url);
  } catch {
    throw new ValidationError(`Media URL is not a valid URL: ${media.url}`);
  }
  if (url.protocol !== "https:" && url.protocol !== "http:") {
    throw new ValidationError(`Media URL must be http(s): ${media.url}`);
  }
}

function validateContainer(options: ContainerOptions): void {
  const { text, media, is_carousel_item } = options;

  if (is_carousel_item) {
    if (!media) throw new ValidationError("A carousel item requires media.");
    if (text) throw new ValidationError("Carousel items carry no text; put it on the carousel container.");
    if (options.reply_to_id || options.reply_control) {
      throw new ValidationError("Reply settings belong on the carousel container, not its items.");
    }
  } else if (!text && !media) {
    throw new ValidationError("Provide text, media, or both.");
  }

  if (media) validateAttachment(media);
}

function idOf(response: { id?: unknown }, what: string): string {
  if (typeof response.id !== "string" || response.id === "") {
    throw new ResponseError(`${what} response did not include an id`, response);
  }
  return response.id;
}

/**
 * Create a media container.
 *
 * A container is exactly one of: a text post, a single-media post (text
 * optional), or a carousel item (media only). Text containers are FINISHED as
 * soon as they exist; media containers need polling.
 */
export async function createContainer(client: ThreadsClient, options: ContainerOptions): Promise<string> {
  validateContainer(options);

  const body: RequestParams = {
    media_type: options.media?.type ?? "TEXT",
  };

  if (options.text) body.text = options.text;
  if (options.media?.type === "IMAGE") body.image_url = options.media.url;
  if (options.media?.type === "VIDEO") body.video_url = options.media.url;
  if (options.reply_to_id) body.reply_to_id = options.reply_to_id;
  if (options.reply_control) body.reply_control = options.reply_control;
  if (options.is_carousel_item) body.is_carousel_item = true;

  const res = await client.request<{ id?: unknown }>("POST", `${client.userId}/threads`, body);
  return idOf(res, "Container creation");
}

/** Read a container's publishing status once */
export async function containerStatus(client: ThreadsClient, containerId: string): Promise<ContainerStatus> {
  const res = await client.request<{ id?: unknown; status?: unknown; error_message?: unknown }>("GET", containerId, {
    fields: "id,status,error_message",
  });

  const raw = typeof res.status === "string" ? res.status : "ERROR";
  if (!isContainerState(raw)) {
    throw new ResponseError(`Unknown container status "${raw}"`, res);
  }

  const status: ContainerStatus = {
    id: typeof res.id === "string" ? res.id : containerId,
    status: raw,
  };
  if (typeof res.error_message === "string" && res.error_message !== "") {
    status.error = res.error_message;
  }
  return status;
}

/** Poll a container until FINISHED. ERROR, EXPIRED and timeout reject. */
export async function waitForContainer(
  client: ThreadsClient,
  containerId: string,
  options: PollOptions = {},
): Promise<ContainerStatus> {
  const interval = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const timeout = options.timeoutMs ?? DEFAULT_POLL_TIMEOUT_MS;
  const sleep = options.sleep ?? delay;
  const now = options.now ?? Date.now;

  const start = now();
  for (;;) {
    const status = await containerStatus(client, containerId);
    options.onStatus?.(status);

    switch (status.status) {
      case "FINISHED":
        return status;
      case "ERROR":
        throw new PublishingError(`Container ${containerId} failed: ${status.error ?? "Unknown error"}`, {
          containerId,
          status: status.status,
        });
      case "EXPIRED":
        throw new PublishingError(`Container ${containerId} expired before publishing.`, {
          containerId,
          status: status.status,
        });
      case "PUBLISHED":
        throw new PublishingError(`Container ${containerId} is already published.`, {
          containerId,
          status: status.status,
        });
      case "IN_PROGRESS":
        break;
    }

    if (now() - start + interval > timeout) {
      throw new PublishingError(
        `Container ${containerId} still IN_PROGRESS after ${Math.round(timeout / 1000)}s.`,
        { containerId, status: status.status },
      );
    }
    await sleep(interval);
  }
}

/**
 * Create a carousel container from 2-10 child containers, in order. Every
 * child must already be FINISHED.
 */
export async function createCarouselContainer(
  client: ThreadsClient,
  containerIds: readonly string[],
  options: CarouselOptions = {},
): Promise<string> {
  if (containerIds.length < CAROUSEL_MIN_ITEMS || containerIds.length > CAROUSEL_MAX_ITEMS) {
    throw new ValidationError(
      `Carousel requires ${CAROUSEL_MIN_ITEMS}-${CAROUSEL_MAX_ITEMS} media items, got ${containerIds.length}.`,
    );
  }

  for (const id of containerIds) {
    const child = await containerStatus(client, id);
    if (child.status !== "FINISHED") {
      throw new ValidationError(`Carousel item ${id} is ${child.status}; every item must be FINISHED.`);
    }
  }

  return postCarousel(client, containerIds, options);
}

async function postCarousel(
  client: ThreadsClient,
  containerIds: readonly string[],
  options: CarouselOptions,
): Promise<string> {
  const body: RequestParams = {
    media_type: "CAROUSEL",
    children: containerIds.join(","),
  };
  if (options.text) body.text = options.text;
  if (options.reply_to_id) body.reply_to_id = options.reply_to_id;
  if (options.reply_control) body.reply_control = options.reply_control;

  const res = await client.request<{ id?: unknown }>("POST", `${client.userId}/threads`, body);
  return idOf(res, "Carousel creation");
}

async function postPublish(client: ThreadsClient, containerId: string): Promise<string> {
  const res = await client.request<{ id?: unknown }>("POST", `${client.userId}/threads_publish`, {
    creation_id: containerId,
  });
  const postId = idOf(res, "Publish");
  if (postId !== containerId) {
    throw new PublishingError(`Publish returned id ${postId} for container ${containerId}.`, { containerId });
  }
  return postId;
}

/**
 * Publish a container. The caller polls first: anything but FINISHED fails
 * without a publish call. Resolves with the post id, which is the container id.
 */
export async function publishContainer(client: ThreadsClient, containerId: string): Promise<string> {
  const current = await containerStatus(client, containerId);
  if (current.status !== "FINISHED") {
    throw new PublishingError(`Container ${containerId} is ${current.status}; only FINISHED containers can be published.`, {
      containerId,
      status: current.status,
    });
  }
  return postPublish(client, containerId);
}

/**
 * Create, wait for and publish a post in one call.
 *
 * - no attachments: text container, published directly
 * - one attachment: media container with the text, polled, published
 * - 2-10 attachments: one carousel item per attachment, each polled, then a
 *   carousel container with the text, polled, published
 *
 * Polling happens here; see {@link PollOptions}. Any ERROR or EXPIRED container
 * aborts the whole call. Containers already created are left on the server.
 */
export async function publish(
  client: ThreadsClient,
  options: PublishOptions,
  pollOptions: PollOptions = {},
): Promise<string> {
  const { text, reply_control, reply_to_id } = options;
  const attachments = options.attachments ?? [];

  if (attachments.length === 0) {
    if (!text) throw new ValidationError("Provide text or at least one attachment.");
    const id = await createContainer(client, { text, reply_control, reply_to_id });
    return publishContainer(client, id);
  }

  if (attachments.length === 1) {
    const id = await createContainer(client, { text, media: attachments[0], reply_control, reply_to_id });
    await waitForContainer(client, id, pollOptions);
    return postPublish(client, id);
  }

  if (attachments.length > CAROUSEL_MAX_ITEMS) {
    throw new ValidationError(`Carousel requires ${CAROUSEL_MIN_ITEMS}-${CAROUSEL_MAX_ITEMS} media items, got ${attachments.length}.`);
  }
  attachments.forEach(validateAttachment);

  const itemIds: string[] = [];
  for (const media of attachments) {
    itemIds.push(await createContainer(client, { media, is_carousel_item: true }));
  }
  for (const id of itemIds) {
    await waitForContainer(client, id, pollOptions);
  }

  const carouselId = await postCarousel(client, itemIds, { text, reply_control, reply_to_id });
  await waitForContainer(client, carouselId, pollOptions);
  return postPublish(client, carouselId);
}

/** Get user's threads */
export async function getUserThreads(
  client: ThreadsClient,
  options?: { since?: Date; until?: Date; limit?: number; after?: string; before?: string },
): Promise<PaginatedResult<ThreadsPost>> {
  const params: RequestParams = { fields: MEDIA_FIELDS };
  if (options?.since) params.since = options.since.toISOString().slice(0, 10);
  if (options?.until) params.until = options.until.toISOString().slice(0, 10);
  if (options?.limit) params.limit = options.limit;
  if (options?.after) params.after = options.after;
  if (options?.before) params.before = options.before;

  return client.request<PaginatedResult<ThreadsPost>>("GET", `${client.userId}/threads`, params);
}

/** Get a single thread (or any published container) */
export async function getThread(client: ThreadsClient, threadId: string): Promise<ThreadsPost> {
  return client.request<ThreadsPost>("GET", threadId, { fields: MEDIA_FIELDS });
}

export { MEDIA_FIELDS };
