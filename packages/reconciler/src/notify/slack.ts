/**
 * Slack run notifications.
 *
 * Posts to an incoming webhook when a run starts, completes or fails.
 * Notifications are best effort: a failed post is logged and reported as
 * `false`, never thrown.
 */

import axios from "axios";
import type { RunSummary } from "@stop-sync/types";
import { errorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";

// ---------------------------------------------------------------------------
// Message model
// ---------------------------------------------------------------------------

export type SlackColor = "good" | "warning" | "danger";

export interface SlackField {
  title: string;
  value: string;
  short: boolean;
}

export interface SlackAttachment {
  color: SlackColor;
  title: string;
  fields: SlackField[];
  footer: string;
  /** Unix seconds */
  ts: number;
}

export interface SlackMessage {
  username: string;
  icon_emoji: string;
  text: string;
  attachments: SlackAttachment[];
}

const USERNAME = "Bus Stop Monitor";

function formatCount(value: number): string {
  return value.toLocaleString("en-US");
}

function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}

/** Lookup success rate in percent; 100 when nothing was looked up */
export function successRate(summary: RunSummary): number {
  return summary.enrichedCount === 0
    ? 100
    : (summary.enrichmentSuccessCount / summary.enrichedCount) * 100;
}

export function statusColor(rate: number): SlackColor {
  if (rate >= 95) return "good";
  if (rate >= 80) return "warning";
  return "danger";
}

function message(
  text: string,
  color: SlackColor,
  title: string,
  fields: SlackField[],
  at: Date
): SlackMessage {
  return {
    username: USERNAME,
    icon_emoji: ":bus:",
    text,
    attachments: [
      {
        color,
        title,
        fields,
        footer: USERNAME,
        ts: Math.floor(at.getTime() / 1000),
      },
    ],
  };
}

export function buildStartMessage(label: string, at: Date = new Date()): SlackMessage {
  return message(
    ":arrows_counterclockwise: Bus stop sync started",
    "good",
    "Run started",
    [{ title: "Run", value: label, short: true }],
    at
  );
}

export function buildCompletionMessage(
  summary: RunSummary,
  at: Date = new Date()
): SlackMessage {
  const rate = successRate(summary);
  const color = statusColor(rate);
  const correctionRate =
    summary.totalCurrent === 0
      ? 0
      : (summary.correctionsApplied / summary.totalCurrent) * 100;
  const icon =
    color === "good" ? ":white_check_mark:" : color === "warning" ? ":warning:" : ":x:";

  return message(
    `${icon} Bus stop sync ${summary.cancelled ? "cancelled" : "completed"}`,
    color,
    "Data Collection Summary",
    [
      { title: "Total Bus Stops", value: formatCount(summary.totalCurrent), short: true },
      { title: "Success Rate", value: formatPercent(rate), short: true },
      { title: "Corrections Applied", value: formatCount(summary.correctionsApplied), short: true },
      { title: "Correction Rate", value: formatPercent(correctionRate), short: true },
      {
        title: "Changes",
        value:
          `${formatCount(summary.newCount)} new, ` +
          `${formatCount(summary.nameChangedCount)} renamed, ` +
          `${formatCount(summary.removedCount)} removed`,
        short: false,
      },
      { title: "Run", value: summary.runId, short: true },
    ],
    at
  );
}

export function buildFailureMessage(
  error: unknown,
  runId: string | null = null,
  at: Date = new Date()
): SlackMessage {
  const fields: SlackField[] = [
    { title: "Error", value: errorMessage(error), short: false },
  ];
  if (runId !== null) fields.push({ title: "Run", value: runId, short: true });
  return message(":x: Bus stop sync failed", "danger", "Run failed", fields, at);
}

// ---------------------------------------------------------------------------
// Notifier
// ---------------------------------------------------------------------------

export type WebhookPost = (
  url: string,
  body: SlackMessage
) => Promise<{ status: number }>;

export interface SlackNotifierOptions {
  webhookUrl: string;
  /** Injectable POST for testability */
  post?: WebhookPost;
  logger?: Logger;
}

export class SlackNotifier {
  private readonly webhookUrl: string;
  private readonly post: WebhookPost;
  private readonly log: Logger;

  constructor(options: SlackNotifierOptions) {
    this.webhookUrl = options.webhookUrl;
    this.post =
      options.post ??
      ((url, body) =>
        axios.post(url, body, { timeout: 30_000, validateStatus: () => true }));
    this.log = (options.logger ?? silentLogger).child({ component: "slack" });
  }

  notifyStart(label: string): Promise<boolean> {
    return this.send(buildStartMessage(label));
  }

  notifyCompletion(summary: RunSummary): Promise<boolean> {
    return this.send(buildCompletionMessage(summary));
  }

  notifyFailure(error: unknown, runId?: string): Promise<boolean> {
    return this.send(buildFailureMessage(error, runId ?? null));
  }

  private async send(body: SlackMessage): Promise<boolean> {
    try {
      const res = await this.post(this.webhookUrl, body);
      if (res.status >= 200 && res.status < 300) {
        this.log.debug({ text: body.text }, "Slack notification sent");
        return true;
      }
      this.log.warn({ status: res.status }, "Slack notification rejected");
    } catch (err) {
      this.log.warn({ error: errorMessage(err) }, "Slack notification failed");
    }
    return false;
  }
}
