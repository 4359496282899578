import { z } from "zod";
import { ValidationError } from "./errors.js";

const CredentialsSchema = z.object({
  user_id: z.string().min(1),
  scopes: z.array(z.string()),
  short_lived: z.boolean(),
  access_token: z.string().min(1),
  // ISO-8601 with an explicit offset; a bare local time has no fixed instant
  expiration: z.string().datetime({ offset: true }),
});

/** Persisted JSON shape of a {@link Credentials} instance */
export type CredentialsJson = z.infer<typeof CredentialsSchema>;

export interface CredentialsInit {
  userId: string;
  scopes: Iterable<string>;
  shortLived: boolean;
  accessToken: string;
  expiration: Date;
}

/**
 * An access token plus what it grants and when it stops working.
 *
 * Instances are never changed after construction: an exchange or refresh
 * produces a new one. `expiration` is a `Date`, so it is an absolute instant
 * and always serializes as UTC.
 */
export class Credentials {
  readonly userId: string;
  readonly scopes: ReadonlySet<string>;
  readonly shortLived: boolean;
  readonly accessToken: string;
  readonly expiration: Date;

  constructor(init: CredentialsInit) {
    this.userId = init.userId;
    this.scopes = new Set(init.scopes);
    this.shortLived = init.shortLived;
    this.accessToken = init.accessToken;
    this.expiration = new Date(init.expiration.getTime());
  }

  /** Seconds until the token expires, never negative */
  expiresIn(now: Date = new Date()): number {
    const seconds = Math.floor((this.expiration.getTime() - now.getTime()) / 1000);
    return seconds > 0 ? seconds : 0;
  }

  expired(now: Date = new Date()): boolean {
    return now.getTime() >= this.expiration.getTime();
  }

  with(changes: Partial<CredentialsInit>): Credentials {
    return new Credentials({
      userId: this.userId,
      scopes: this.scopes,
      shortLived: this.shortLived,
      accessToken: this.accessToken,
      expiration: this.expiration,
      ...changes,
    });
  }

  toJSON(): CredentialsJson {
    return {
      user_id: this.userId,
      scopes: [...this.scopes],
      short_lived: this.shortLived,
      access_token: this.accessToken,
      expiration: this.expiration.toISOString(),
    };
  }

  toJson(): string {
    return JSON.stringify(this.toJSON());
  }

  static fromObject(value: unknown): Credentials {
    const parsed = CredentialsSchema.safeParse(value);
    if (!parsed.success) {
      const fields = parsed.error.issues.map((i) => i.path.join(".") || "(root)").join(", ");
      throw new ValidationError(`Invalid credentials: ${fields}`);
    }
    const data = parsed.data;
    return new Credentials({
      userId: data.user_id,
      scopes: data.scopes,
      shortLived: data.short_lived,
      accessToken: data.access_token,
      expiration: new Date(data.expiration),
    });
  }

  static fromJson(json: string): Credentials {
    let value: unknown;
    try {
      value = JSON.parse(json);
    } catch (err) {
      throw new ValidationError(`Credentials are not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }
    return Credentials.fromObject(value);
  }
}
