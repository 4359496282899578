// ─── Shared Types ───

export type RequestMethod = "GET" | "POST";

export type RequestParams = Record<string, string | number | boolean | null | undefined>;

export type MediaType = "TEXT" | "IMAGE" | "VIDEO" | "CAROUSEL";

/** Media kinds a post can attach */
export type AttachmentType = "IMAGE" | "VIDEO";

export const CONTAINER_STATUSES = ["IN_PROGRESS", "FINISHED", "ERROR", "EXPIRED", "PUBLISHED"] as const;

export type ContainerState = (typeof CONTAINER_STATUSES)[number];

export type ReplyControl = "everyone" | "accounts_you_follow" | "mentioned_only";

/** Processing failures the API reports in `error_message` */
export type PublishingErrorCode =
  | "FAILED_DOWNLOADING_VIDEO"
  | "FAILED_PROCESSING_AUDIO"
  | "FAILED_PROCESSING_VIDEO"
  | "INVALID_ASPEC_RATIO"
  | "INVALID_BIT_RATE"
  | "INVALID_DURATION"
  | "INVALID_FRAME_RATE"
  | "INVALID_AUDIO_CHANNELS"
  | "INVALID_AUDIO_CHANNEL_LAYOUT"
  | "UNKNOWN";

export interface Attachment {
  type: AttachmentType;
  /** Publicly fetchable URL; the API downloads the media itself */
  url: string;
}

export interface ContainerStatus {
  id: string;
  status: ContainerState;
  error?: PublishingErrorCode | (string & {});
}

export interface ThreadsPost {
  id: string;
  media_type?: MediaType;
  media_product_type?: string;
  media_url?: string;
  thumbnail_url?: string;
  text?: string;
  timestamp?: string;
  permalink?: string;
  shortcode?: string;
  username?: string;
  owner?: { id: string };
  is_quote_post?: boolean;
  children?: { data: Array<{ id: string }> };
}

export interface ThreadsUser {
  id: string;
  username?: string;
  threads_profile_picture_url?: string;
  threads_biography?: string;
}

export type UserMetric =
  | "views"
  | "likes"
  | "replies"
  | "reposts"
  | "quotes"
  | "followers_count"
  | "follower_demographics";

export type DemographicBreakdown = "age" | "city" | "country" | "gender";

export interface ThreadsInsight {
  name: string;
  title: string;
  description?: string;
  period: string;
  values?: Array<{ value: number; end_time?: string }>;
  total_value?: { value?: number; breakdowns?: unknown[] };
  id: string;
}

export interface PublishingLimit {
  config?: { quota_total: number; quota_duration: number };
  quota_usage?: number;
  reply_config?: { quota_total: number; quota_duration: number };
  reply_quota_usage?: number;
}

export interface PaginatedResult<T> {
  data: T[];
  paging?: {
    cursors?: {
      before?: string;
      after?: string;
    };
    next?: string;
    previous?: string;
  };
}

export interface GraphApiError {
  message?: string;
  type?: string;
  code?: number;
  fbtrace_id?: string;
}
