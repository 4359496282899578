import { describe, it, expect, vi } from "vitest";
import { ThreadsClient } from "./index.js";
import {
  containerStatus,
  createCarouselContainer,
  createContainer,
  getUserThreads,
  publish,
  publishContainer,
  waitForContainer,
} from "./posts.js";
import type { Attachment } from "./types.js";
import { PublishingError, ResponseError, TokenExpiredError, ValidationError } from "../errors.js";
import { FakeTransport, makeCredentials } from "../testing/fake-transport.js";

const IMAGE: Attachment = { type: "IMAGE", url: "https://cdn.example.com/a.jpg" };
const VIDEO: Attachment = { type: "VIDEO", url: "https://cdn.example.com/b.mp4" };

function setup() {
  const transport = new FakeTransport();
  const client = new ThreadsClient(makeCredentials(), transport);
  return { transport, client };
}

const finished = (id: string) => ({ id, status: "FINISHED" });
const noSleep = { sleep: () => Promise.resolve() };

describe("createContainer", () => {
  it("creates a text container", async () => {
    const { transport, client } = setup();
    transport.on("POST", "user-1/threads", { id: "c1" });

    await expect(createContainer(client, { text: "hello" })).resolves.toBe("c1");
    expect(transport.calls[0]).toEqual({
      method: "POST",
      path: "user-1/threads",
      params: { media_type: "TEXT", text: "hello" },
      accessToken: "test-token",
    });
  });

  it("sends reply settings and video urls", async () => {
    const { transport, client } = setup();
    transport.on("POST", "user-1/threads", { id: "c1" });

    await createContainer(client, {
      text: "clip",
      media: VIDEO,
      reply_to_id: "999",
      reply_control: "mentioned_only",
    });
    expect(transport.calls[0].params).toEqual({
      media_type: "VIDEO",
      text: "clip",
      video_url: "https://cdn.example.com/b.mp4",
      reply_to_id: "999",
      reply_control: "mentioned_only",
    });
  });

  it("marks carousel items", async () => {
    const { transport, client } = setup();
    transport.on("POST", "user-1/threads", { id: "i1" });

    await createContainer(client, { media: IMAGE, is_carousel_item: true });
    expect(transport.calls[0].params).toEqual({
      media_type: "IMAGE",
      image_url: "https://cdn.example.com/a.jpg",
      is_carousel_item: true,
    });
  });

  it.each([
    ["no text and no media", {}],
    ["a carousel item without media", { is_carousel_item: true }],
    ["a carousel item with text", { text: "hi", media: IMAGE, is_carousel_item: true }],
    ["a carousel item with a reply target", { media: IMAGE, is_carousel_item: true, reply_to_id: "1" }],
    ["a relative media url", { media: { type: "IMAGE", url: "a.jpg" } }],
    ["a non-http media url", { media: { type: "IMAGE", url: "ftp://cdn.example.com/a.jpg" } }],
  ] as const)("rejects %s before calling the API", async (_label, options) => {
    const { transport, client } = setup();
    await expect(createContainer(client, options)).rejects.toBeInstanceOf(ValidationError);
    expect(transport.calls).toHaveLength(0);
  });

  it("rejects media types other than IMAGE and VIDEO", async () => {
    const { transport, client } = setup();
    const media: Attachment = JSON.parse('{"type":"GIF","url":"https://cdn.example.com/a.gif"}');
    await expect(createContainer(client, { media })).rejects.toThrow("Unsupported media type: GIF");
    expect(transport.calls).toHaveLength(0);
  });

  it("fails when the response has no id", async () => {
    const { transport, client } = setup();
    transport.on("POST", "user-1/threads", { error: "nope" });
    await expect(createContainer(client, { text: "hello" })).rejects.toBeInstanceOf(ResponseError);
  });

  it("fails with expired credentials without calling the API", async () => {
    const transport = new FakeTransport();
    const client = new ThreadsClient(makeCredentials({ expiresInSeconds: -60 }), transport);
    await expect(createContainer(client, { text: "hello" })).rejects.toBeInstanceOf(TokenExpiredError);
    expect(transport.calls).toHaveLength(0);
  });
});

describe("containerStatus", () => {
  it("reads status and error message", async () => {
    const { transport, client } = setup();
    transport.on("GET", "c1", { id: "c1", status: "ERROR", error_message: "FAILED_PROCESSING_VIDEO" });

    await expect(containerStatus(client, "c1")).resolves.toEqual({
      id: "c1",
      status: "ERROR",
      error: "FAILED_PROCESSING_VIDEO",
    });
    expect(transport.calls[0].params).toEqual({ fields: "id,status,error_message" });
  });

  it("omits an empty error message", async () => {
    const { transport, client } = setup();
    transport.on("GET", "c1", { id: "c1", status: "IN_PROGRESS", error_message: "" });
    await expect(containerStatus(client, "c1")).resolves.toEqual({ id: "c1", status: "IN_PROGRESS" });
  });

  it("treats a missing status as ERROR", async () => {
    const { transport, client } = setup();
    transport.on("GET", "c1", { id: "c1" });
    await expect(containerStatus(client, "c1")).resolves.toEqual({ id: "c1", status: "ERROR" });
  });

  it("rejects unknown statuses", async () => {
    const { transport, client } = setup();
    transport.on("GET", "c1", { id: "c1", status: "PAUSED" });
    await expect(containerStatus(client, "c1")).rejects.toBeInstanceOf(ResponseError);
  });
});

describe("waitForContainer", () => {
  it("polls until FINISHED", async () => {
    const { transport, client } = setup();
    transport.on("GET", "c1", { id: "c1", status: "IN_PROGRESS" }, { id: "c1", status: "IN_PROGRESS" }, finished("c1"));
    const sleep = vi.fn(() => Promise.resolve());
    const onStatus = vi.fn();

    await expect(waitForContainer(client, "c1", { sleep, pollIntervalMs: 10, onStatus })).resolves.toEqual(finished("c1"));
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(10);
    expect(onStatus).toHaveBeenCalledTimes(3);
  });

  it("does not sleep when the first read is FINISHED", async () => {
    const { transport, client } = setup();
    transport.on("GET", "c1", finished("c1"));
    const sleep = vi.fn(() => Promise.resolve());

    await waitForContainer(client, "c1", { sleep });
    expect(sleep).not.toHaveBeenCalled();
  });

  it.each(["ERROR", "EXPIRED"])("fails on %s", async (status) => {
    const { transport, client } = setup();
    transport.on("GET", "c1", { id: "c1", status });

    const err = await waitForContainer(client, "c1", noSleep).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(PublishingError);
    expect(err).toMatchObject({ containerId: "c1", status });
  });

  it("gives up after the timeout", async () => {
    const { transport, client } = setup();
    const pending = { id: "c1", status: "IN_PROGRESS" };
    transport.on("GET", "c1", pending, pending, pending);
    let t = 0;

    await expect(
      waitForContainer(client, "c1", {
        pollIntervalMs: 2000,
        timeoutMs: 5000,
        now: () => t,
        sleep: async (ms) => { t += ms; },
      }),
    ).rejects.toThrow("Container c1 still IN_PROGRESS after 5s.");
    expect(transport.calls).toHaveLength(3);
  });
});

describe("createCarouselContainer", () => {
  it("rejects a single child", async () => {
    const { transport, client } = setup();
    await expect(createCarouselContainer(client, ["i1"])).rejects.toBeInstanceOf(ValidationError);
    expect(transport.calls).toHaveLength(0);
  });

  it("rejects an 11th child", async () => {
    const { transport, client } = setup();
    const ids = Array.from({ length: 11 }, (_, i) => `i${i + 1}`);
    await expect(createCarouselContainer(client, ids)).rejects.toThrow("Carousel requires 2-10 media items, got 11.");
    expect(transport.calls).toHaveLength(0);
  });

  it("creates a carousel from 10 finished children in order", async () => {
    const { transport, client } = setup();
    const ids = Array.from({ length: 10 }, (_, i) => `i${i + 1}`);
    for (const id of ids) transport.on("GET", id, finished(id));
    transport.on("POST", "user-1/threads", { id: "car" });

    await expect(createCarouselContainer(client, ids, { text: "album" })).resolves.toBe("car");
    expect(transport.calls.at(-1)?.params).toEqual({
      media_type: "CAROUSEL",
      children: "i1,i2,i3,i4,i5,i6,i7,i8,i9,i10",
      text: "album",
    });
  });

  it("rejects children that are not FINISHED", async () => {
    const { transport, client } = setup();
    transport.on("GET", "i1", finished("i1"));
    transport.on("GET", "i2", { id: "i2", status: "IN_PROGRESS" });

    await expect(createCarouselContainer(client, ["i1", "i2"])).rejects.toThrow(
      "Carousel item i2 is IN_PROGRESS; every item must be FINISHED.",
    );
    expect(transport.log).toEqual(["GET i1", "GET i2"]);
  });
});

describe("publishContainer", () => {
  it("publishes a FINISHED container and returns its id", async () => {
    const { transport, client } = setup();
    transport.on("GET", "c1", finished("c1"));
    transport.on("POST", "user-1/threads_publish", { id: "c1" });

    await expect(publishContainer(client, "c1")).resolves.toBe("c1");
    expect(transport.calls[1].params).toEqual({ creation_id: "c1" });
  });

  it.each(["IN_PROGRESS", "ERROR", "EXPIRED", "PUBLISHED"])("refuses a %s container without a publish call", async (status) => {
    const { transport, client } = setup();
    transport.on("GET", "c1", { id: "c1", status });

    await expect(publishContainer(client, "c1")).rejects.toBeInstanceOf(PublishingError);
    expect(transport.log).toEqual(["GET c1"]);
  });

  it("fails when the post id differs from the container id", async () => {
    const { transport, client } = setup();
    transport.on("GET", "c1", finished("c1"));
    transport.on("POST", "user-1/threads_publish", { id: "other" });

    await expect(publishContainer(client, "c1")).rejects.toThrow("Publish returned id other for container c1.");
  });
});

describe("publish", () => {
  it("publishes a text post", async () => {
    const { transport, client } = setup();
    transport.on("POST", "user-1/threads", { id: "c1" });
    transport.on("GET", "c1", finished("c1"));
    transport.on("POST", "user-1/threads_publish", { id: "c1" });

    await expect(publish(client, { text: "hello" })).resolves.toBe("c1");
    expect(transport.log).toEqual(["POST user-1/threads", "GET c1", "POST user-1/threads_publish"]);
    expect(transport.calls[0].params).toEqual({ media_type: "TEXT", text: "hello" });
  });

  it("publishes a single image after it finishes processing", async () => {
    const { transport, client } = setup();
    transport.on("POST", "user-1/threads", { id: "m1" });
    transport.on("GET", "m1", finished("m1"));
    transport.on("POST", "user-1/threads_publish", { id: "m1" });

    await expect(publish(client, { text: "caption", attachments: [IMAGE] }, noSleep)).resolves.toBe("m1");
    expect(transport.log).toEqual(["POST user-1/threads", "GET m1", "POST user-1/threads_publish"]);
    expect(transport.calls[0].params).toEqual({
      media_type: "IMAGE",
      text: "caption",
      image_url: "https://cdn.example.com/a.jpg",
    });
    expect(transport.calls[2].params).toEqual({ creation_id: "m1" });
  });

  it("publishes a carousel", async () => {
    const { transport, client } = setup();
    transport.on("POST", "user-1/threads", { id: "i1" }, { id: "i2" }, { id: "car" });
    transport.on("GET", "i1", finished("i1"));
    transport.on("GET", "i2", { id: "i2", status: "IN_PROGRESS" }, finished("i2"));
    transport.on("GET", "car", finished("car"));
    transport.on("POST", "user-1/threads_publish", { id: "car" });

    await expect(
      publish(client, { text: "caption", attachments: [IMAGE, VIDEO], reply_control: "everyone" }, noSleep),
    ).resolves.toBe("car");

    expect(transport.log).toEqual([
      "POST user-1/threads",
      "POST user-1/threads",
      "GET i1",
      "GET i2",
      "GET i2",
      "POST user-1/threads",
      "GET car",
      "POST user-1/threads_publish",
    ]);
    expect(transport.calls[0].params).toEqual({
      media_type: "IMAGE",
      image_url: "https://cdn.example.com/a.jpg",
      is_carousel_item: true,
    });
    expect(transport.calls[1].params).toEqual({
      media_type: "VIDEO",
      video_url: "https://cdn.example.com/b.mp4",
      is_carousel_item: true,
    });
    expect(transport.calls[5].params).toEqual({
      media_type: "CAROUSEL",
      children: "i1,i2",
      text: "caption",
      reply_control: "everyone",
    });
    expect(transport.calls[7].params).toEqual({ creation_id: "car" });
  });

  it("aborts the carousel when a child fails", async () => {
    const { transport, client } = setup();
    transport.on("POST", "user-1/threads", { id: "i1" }, { id: "i2" });
    transport.on("GET", "i1", { id: "i1", status: "ERROR", error_message: "FAILED_DOWNLOADING_VIDEO" });

    await expect(publish(client, { attachments: [VIDEO, IMAGE] }, noSleep)).rejects.toThrow(
      "Container i1 failed: FAILED_DOWNLOADING_VIDEO",
    );
    expect(transport.log).toEqual(["POST user-1/threads", "POST user-1/threads", "GET i1"]);
  });

  it("aborts when the media container expires", async () => {
    const { transport, client } = setup();
    transport.on("POST", "user-1/threads", { id: "m1" });
    transport.on("GET", "m1", { id: "m1", status: "EXPIRED" });

    await expect(publish(client, { attachments: [VIDEO] }, noSleep)).rejects.toBeInstanceOf(PublishingError);
    expect(transport.log).not.toContain("POST user-1/threads_publish");
  });

  it("rejects an empty post", async () => {
    const { transport, client } = setup();
    await expect(publish(client, { attachments: [] })).rejects.toBeInstanceOf(ValidationError);
    expect(transport.calls).toHaveLength(0);
  });

  it("rejects more than 10 attachments before creating anything", async () => {
    const { transport, client } = setup();
    const attachments = Array.from({ length: 11 }, () => IMAGE);
    await expect(publish(client, { text: "too many", attachments })).rejects.toBeInstanceOf(ValidationError);
    expect(transport.calls).toHaveLength(0);
  });

  it("validates every carousel attachment before creating anything", async () => {
    const { transport, client } = setup();
    const bad: Attachment = { type: "IMAGE", url: "not a url" };
    await expect(publish(client, { attachments: [IMAGE, bad] })).rejects.toBeInstanceOf(ValidationError);
    expect(transport.calls).toHaveLength(0);
  });
});

describe("getUserThreads", () => {
  it("passes the window and cursors", async () => {
    const { transport, client } = setup();
    transport.on("GET", "user-1/threads", { data: [] });

    await getUserThreads(client, {
      since: new Date("2024-07-01T12:00:00Z"),
      until: new Date("2024-07-10T12:00:00Z"),
      limit: 5,
      after: "cursor-a",
    });
    expect(transport.calls[0].params).toMatchObject({
      since: "2024-07-01",
      until: "2024-07-10",
      limit: 5,
      after: "cursor-a",
    });
  });
});
