import type { ThreadsClient } from "./index.js";
import { ValidationError } from "../errors.js";
import type { DemographicBreakdown, RequestParams, ThreadsInsight, UserMetric } from "./types.js";

const MEDIA_METRICS = "likes,quotes,replies,reposts,views";

const USER_METRICS: ReadonlySet<string> = new Set<UserMetric>([
  "views",
  "likes",
  "replies",
  "reposts",
  "quotes",
  "followers_count",
  "follower_demographics",
]);

export function isUserMetric(value: string): value is UserMetric {
  return USER_METRICS.has(value);
}

const BREAKDOWNS: ReadonlySet<string> = new Set<DemographicBreakdown>(["age", "city", "country", "gender"]);

/** Get media-level insights */
export async function getMediaInsights(
  client: ThreadsClient,
  mediaId: string,
): Promise<{ data: ThreadsInsight[] }> {
  return client.request<{ data: ThreadsInsight[] }>("GET", `${mediaId}/insights`, {
    metric: MEDIA_METRICS,
  });
}

/**
 * Get account-level insights.
 *
 * `follower_demographics` is only served with a `breakdown`.
 */
export async function getUserInsights(
  client: ThreadsClient,
  metrics: UserMetric | readonly UserMetric[],
  options?: { since?: Date; until?: Date; breakdown?: DemographicBreakdown },
): Promise<{ data: ThreadsInsight[] }> {
  const requested: readonly string[] = typeof metrics === "string" ? [metrics] : metrics;

  if (requested.length === 0) throw new ValidationError("At least one metric is required.");
  const invalid = requested.filter((m) => !USER_METRICS.has(m));
  if (invalid.length > 0) {
    throw new ValidationError(`Invalid metrics provided: ${invalid.join(", ")}`);
  }
  if (options?.breakdown !== undefined && !BREAKDOWNS.has(options.breakdown)) {
    throw new ValidationError(`Invalid breakdown: ${String(options.breakdown)}`);
  }
  if (requested.includes("follower_demographics") && !options?.breakdown) {
    throw new ValidationError("follower_demographics metric requires a breakdown value");
  }

  const params: RequestParams = { metric: requested.join(",") };
  if (options?.since) params.since = Math.floor(options.since.getTime() / 1000);
  if (options?.until) params.until = Math.floor(options.until.getTime() / 1000);
  if (options?.breakdown) params.breakdown = options.breakdown;

  return client.request<{ data: ThreadsInsight[] }>("GET", `${client.userId}/threads_insights`, params);
}
