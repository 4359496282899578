export { Credentials } from "./credentials.js";
export type { CredentialsInit, CredentialsJson } from "./credentials.js";
export { OAuthFlow } from "./oauth.js";
export type { AuthorizationRequest } from "./oauth.js";
export { ALL_SCOPES, resolveOAuthConfig, resolveBaseUrl } from "./config.js";
export type { OAuthConfig } from "./config.js";
export {
  ThreadsError,
  ValidationError,
  AuthorizationError,
  TokenExpiredError,
  HttpError,
  ResponseError,
  PublishingError,
} from "./errors.js";
export * from "./client/index.js";
export {
  CAROUSEL_MIN_ITEMS,
  CAROUSEL_MAX_ITEMS,
  createContainer,
  containerStatus,
  waitForContainer,
  createCarouselContainer,
  publishContainer,
  publish,
  getUserThreads,
  getThread,
} from "./client/posts.js";
export type { ContainerOptions, CarouselOptions, PublishOptions, PollOptions, ReplyOptions } from "./client/posts.js";
export { getReplies, getConversation, hideReply, unhideReply } from "./client/replies.js";
export { account, publishingLimit } from "./client/profiles.js";
export { getMediaInsights, getUserInsights, isUserMetric } from "./client/insights.js";
