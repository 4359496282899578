import type { Credentials } from "../credentials.js";
import { TokenExpiredError } from "../errors.js";
import { FetchTransport, type Transport } from "./transport.js";
import type { RequestMethod, RequestParams } from "./types.js";

export type {
  RequestMethod,
  RequestParams,
  MediaType,
  AttachmentType,
  Attachment,
  ContainerState,
  ContainerStatus,
  ReplyControl,
  PublishingErrorCode,
  ThreadsPost,
  ThreadsUser,
  ThreadsInsight,
  UserMetric,
  DemographicBreakdown,
  PublishingLimit,
  PaginatedResult,
} from "./types.js";
export { FetchTransport, DEFAULT_BASE_URL } from "./transport.js";
export type { Transport, FetchTransportOptions } from "./transport.js";

/**
 * Binds a set of credentials to a transport. Every call checks the token's
 * expiry first and fails with {@link TokenExpiredError} without reaching the
 * network.
 */
export class ThreadsClient {
  readonly credentials: Credentials;
  readonly transport: Transport;

  constructor(credentials: Credentials, transport: Transport = new FetchTransport()) {
    this.credentials = credentials;
    this.transport = transport;
  }

  get userId(): string {
    return this.credentials.userId;
  }

  private accessToken(): string {
    if (this.credentials.expired()) {
      throw new TokenExpiredError();
    }
    return this.credentials.accessToken;
  }

  public async request<T>(method: RequestMethod, path: string, params?: RequestParams): Promise<T> {
    const token = this.accessToken();
    return this.transport.request<T>(method, path, params, token);
  }
}
