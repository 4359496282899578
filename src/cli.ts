#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import chalk from "chalk";
import { loadConfig, saveConfig, getConfigPath, resolveBaseUrl } from "./config.js";
import { ThreadsClient, FetchTransport } from "./client/index.js";
import type { Attachment, ContainerStatus, ReplyControl, UserMetric } from "./client/types.js";
import * as posts from "./client/posts.js";
import * as profiles from "./client/profiles.js";
import * as replies from "./client/replies.js";
import * as insights from "./client/insights.js";
import { OAuthFlow } from "./oauth.js";
import { authorizeInBrowser } from "./auth.js";
import { ValidationError } from "./errors.js";

let jsonOutput = process.argv.includes("--json");

function warn(message: string): void {
  if (!jsonOutput) console.warn(chalk.yellow("⚠"), message);
}

function getClient(): ThreadsClient {
  const { credentials } = loadConfig({ warn });
  if (!credentials) {
    throw new ValidationError(`No stored credentials in ${getConfigPath()}. Run 'threadkit auth' first.`);
  }
  const transport = new FetchTransport({
    baseUrl: resolveBaseUrl(),
    onRateLimit: jsonOutput ? undefined : warn,
  });
  return new ThreadsClient(credentials, transport);
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function positiveInt(value: string): number {
  const n = parseInt(value, 10);
  if (!Number.isFinite(n) || n <= 0) throw new InvalidArgumentError("Expected a positive integer.");
  return n;
}

function replyControl(value: string): ReplyControl {
  if (value === "everyone" || value === "accounts_you_follow" || value === "mentioned_only") return value;
  throw new InvalidArgumentError("Use everyone, accounts_you_follow or mentioned_only.");
}

function userMetric(value: string, previous: UserMetric[]): UserMetric[] {
  if (!insights.isUserMetric(value)) throw new InvalidArgumentError(`Unknown metric: ${value}`);
  return [...previous, value];
}

function printStatus(status: ContainerStatus): void {
  if (jsonOutput) return;
  console.log(chalk.dim(`  container ${status.id}: ${status.status}`));
}

const program = new Command()
  .name("threadkit")
  .description("Publish to Threads from the command line")
  .version("0.1.0")
  .option("--json", "Output raw JSON");

program.hook("preAction", (thisCommand) => {
  jsonOutput = Boolean(thisCommand.optsWithGlobals().json);
});

// ─── auth ───
program
  .command("auth")
  .description("Authenticate via OAuth 2.0 (opens browser)")
  .action(async () => {
    const oauth = loadConfig({ warn }).oauth();
    if (!jsonOutput) console.log(chalk.dim(`Starting OAuth flow on ${oauth.redirectUri} ...`));

    const credentials = await authorizeInBrowser(new OAuthFlow(oauth));
    saveConfig({ credentials: credentials.toJSON() });

    if (jsonOutput) {
      printJson({ success: true, user_id: credentials.userId, config_path: getConfigPath() });
    } else {
      console.log(chalk.green("✓"), `Authenticated as ${credentials.userId}. Config saved to ${getConfigPath()}`);
    }
  });

// ─── refresh ───
program
  .command("refresh")
  .description("Refresh the long-lived access token")
  .action(async () => {
    const { oauth, credentials } = loadConfig({ warn });
    if (!credentials) throw new ValidationError("No stored credentials. Run 'threadkit auth' first.");

    const refreshed = await new OAuthFlow(oauth()).refreshLongLivedToken(credentials);
    saveConfig({ credentials: refreshed.toJSON() });

    const expiresAt = refreshed.expiration.toISOString();
    if (jsonOutput) {
      printJson({ success: true, expires_at: expiresAt });
    } else {
      console.log(chalk.green("✓"), "Token refreshed.");
      console.log(chalk.dim(`Expires: ${expiresAt}`));
    }
  });

// ─── whoami ───
program
  .command("whoami")
  .description("Show authenticated user profile")
  .action(async () => {
    const user = await profiles.account(getClient());
    if (jsonOutput) { printJson(user); return; }
    console.log(chalk.bold(`@${user.username ?? user.id}`));
    if (user.threads_biography) console.log(user.threads_biography);
  });

// ─── post ───
program
  .command("post [text]")
  .description("Publish a post: text, one image/video, or a 2-10 item carousel")
  .option("--image <url>", "Image URL (repeatable)", collect, [])
  .option("--video <url>", "Video URL (repeatable)", collect, [])
  .option("--reply-to <id>", "Reply to a thread ID")
  .option("--reply-control <mode>", "Reply control: everyone, accounts_you_follow, mentioned_only", replyControl)
  .option("--poll-interval <ms>", "Milliseconds between status checks", positiveInt, 2000)
  .option("--timeout <ms>", "Give up waiting for media processing after this long", positiveInt, 300_000)
  .option("--dry-run", "Preview without posting")
  .action(async (text: string | undefined, opts: {
    image: string[]; video: string[]; replyTo?: string; replyControl?: ReplyControl;
    pollInterval: number; timeout: number; dryRun?: boolean;
  }) => {
    // Images first, then videos, each in command-line order
    const attachments: Attachment[] = [
      ...opts.image.map((url): Attachment => ({ type: "IMAGE", url })),
      ...opts.video.map((url): Attachment => ({ type: "VIDEO", url })),
    ];

    if (opts.dryRun) {
      const preview = { dry_run: true, text: text ?? null, attachments, reply_to: opts.replyTo ?? null };
      if (jsonOutput) { printJson(preview); } else { console.log(chalk.yellow("[dry-run]"), JSON.stringify(preview, null, 2)); }
      return;
    }

    const id = await posts.publish(
      getClient(),
      { text, attachments, reply_to_id: opts.replyTo, reply_control: opts.replyControl },
      { pollIntervalMs: opts.pollInterval, timeoutMs: opts.timeout, onStatus: printStatus },
    );

    if (jsonOutput) { printJson({ id }); return; }
    console.log(chalk.green(attachments.length > 1 ? "✓ Carousel posted" : "✓ Posted"), chalk.dim(`(id: ${id})`));
  });

// ─── status ───
program
  .command("status <container-id>")
  .description("Show a container's publishing status")
  .action(async (containerId: string) => {
    const status = await posts.containerStatus(getClient(), containerId);
    if (jsonOutput) { printJson(status); return; }
    const color = status.status === "FINISHED" || status.status === "PUBLISHED" ? chalk.green : status.status === "IN_PROGRESS" ? chalk.yellow : chalk.red;
    console.log(color(status.status), chalk.dim(`[${status.id}]`), status.error ?? "");
  });

// ─── timeline ───
program
  .command("timeline")
  .description("Show your recent threads")
  .option("-n, --limit <n>", "Number of threads", positiveInt, 10)
  .action(async (opts: { limit: number }) => {
    const result = await posts.getUserThreads(getClient(), { limit: opts.limit });
    if (jsonOutput) { printJson(result); return; }

    if (!result.data?.length) {
      console.log(chalk.dim("No threads found."));
      return;
    }
    for (const t of result.data) {
      const date = t.timestamp ? new Date(t.timestamp).toLocaleString() : "";
      console.log(chalk.dim(date), chalk.dim(`[${t.id}]`));
      if (t.text) console.log(t.text);
      if (t.permalink) console.log(chalk.dim(t.permalink));
      console.log();
    }
  });

// ─── replies ───
program
  .command("replies <thread-id>")
  .description("List replies to a thread")
  .option("--all", "Include nested replies (conversation view)")
  .action(async (threadId: string, opts: { all?: boolean }) => {
    const client = getClient();
    const result = opts.all
      ? await replies.getConversation(client, threadId)
      : await replies.getReplies(client, threadId);
    if (jsonOutput) { printJson(result); return; }

    if (!result.data?.length) {
      console.log(chalk.dim("No replies."));
      return;
    }
    for (const r of result.data) {
      const date = r.timestamp ? new Date(r.timestamp).toLocaleString() : "";
      console.log(chalk.dim(date), chalk.bold(`@${r.username ?? "?"}`), chalk.dim(`[${r.id}]`));
      if (r.text) console.log(r.text);
      console.log();
    }
  });

// ─── hide ───
program
  .command("hide <reply-id>")
  .description("Hide a reply")
  .action(async (replyId: string) => {
    const ok = await replies.hideReply(getClient(), replyId);
    if (jsonOutput) { printJson({ reply_id: replyId, hidden: ok }); return; }
    console.log(ok ? chalk.green("✓ Hidden") : chalk.red("✗ Failed"), replyId);
  });

// ─── unhide ───
program
  .command("unhide <reply-id>")
  .description("Unhide a reply")
  .action(async (replyId: string) => {
    const ok = await replies.unhideReply(getClient(), replyId);
    if (jsonOutput) { printJson({ reply_id: replyId, unhidden: ok }); return; }
    console.log(ok ? chalk.green("✓ Unhidden") : chalk.red("✗ Failed"), replyId);
  });

// ─── insights ───
program
  .command("insights [thread-id]")
  .description("Show insights (media-level if thread-id given, otherwise account-level)")
  .option("--metric <name>", "Account metric (repeatable)", userMetric, [])
  .action(async (threadId: string | undefined, opts: { metric: UserMetric[] }) => {
    const client = getClient();
    const metrics: UserMetric[] = opts.metric.length > 0 ? opts.metric : ["views", "likes", "replies", "reposts", "quotes"];
    const result = threadId
      ? await insights.getMediaInsights(client, threadId)
      : await insights.getUserInsights(client, metrics);

    if (jsonOutput) { printJson(result); return; }
    if (!result.data?.length) { console.log(chalk.dim("No insights.")); return; }
    for (const i of result.data) {
      const value = i.values?.[0]?.value ?? i.total_value?.value ?? "N/A";
      console.log(`${chalk.bold(i.title ?? i.name)}: ${value}`);
    }
  });

// ─── quota ───
program
  .command("quota")
  .description("Show publishing quota usage")
  .action(async () => {
    const result = await profiles.publishingLimit(getClient());
    if (jsonOutput) { printJson(result); return; }
    const limit = result.data?.[0];
    if (!limit) { console.log(chalk.dim("No quota data.")); return; }
    console.log(`Posts:   ${limit.quota_usage ?? 0}/${limit.config?.quota_total ?? "?"}`);
    console.log(`Replies: ${limit.reply_quota_usage ?? 0}/${limit.reply_config?.quota_total ?? "?"}`);
  });

program.parseAsync().catch((err: Error) => {
  if (jsonOutput) {
    printJson({ error: err.message });
    process.exit(1);
  }
  console.error(chalk.red("✗"), err.message);
  process.exit(1);
});
