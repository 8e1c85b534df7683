import axios, { type AxiosAdapter, type AxiosInstance } from "axios";
import { z } from "zod";
import type { Messenger, PostMessageResult, SlackErrorResponse } from "./types.js";

const responseSchema = z
  .object({
    ok: z.boolean(),
    error: z.string().optional(),
  })
  .passthrough();

type SlackCall = { ok: true; data: Record<string, unknown> } | { ok: false; error: SlackErrorResponse };

export class SlackApiError extends Error {
  constructor(readonly response: SlackErrorResponse) {
    super(`Slack API error: ${response.error}`);
    this.name = "SlackApiError";
  }
}

export function escapeMrkdwn(input: string): string {
  return input
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

export interface SlackClientOptions {
  baseURL?: string;
  timeout?: number;
  adapter?: AxiosAdapter;
}

export class SlackClient implements Messenger {
  private readonly http: AxiosInstance;

  constructor(token: string, options: SlackClientOptions = {}) {
    this.http = axios.create({
      baseURL: options.baseURL ?? "https://slack.com/api",
      timeout: options.timeout ?? 20000,
      headers: {
        Authorization: `Bearer ${token}`,
        "Content-Type": "application/json; charset=utf-8",
      },
      adapter: options.adapter,
      // Rate limits and server errors still carry an { ok: false } body
      validateStatus: () => true,
    });
  }

  private async call(method: string, body: Record<string, unknown>): Promise<SlackCall> {
    const { data, status } = await this.http.post<unknown>(`/${method}`, body);
    const parsed = responseSchema.safeParse(data);
    if (!parsed.success) {
      throw new Error(`Unexpected response from Slack method ${method} (HTTP ${status})`);
    }
    if (parsed.data.ok) return { ok: true, data: parsed.data };
    return { ok: false, error: { ...parsed.data, ok: false, error: parsed.data.error ?? "unknown_error" } };
  }

  /**
   * Posts to a channel, as a single mrkdwn section block when `asBlock` is
   * set. Slack-level failures come back in `error`; transport failures throw.
   */
  async postMessage(channelId: string, text: string, options: { asBlock?: boolean } = {}): Promise<PostMessageResult> {
    const body: Record<string, unknown> = { channel: channelId, text };
    if (options.asBlock) {
      body.blocks = [{ type: "section", text: { type: "mrkdwn", text } }];
    }
    const result = await this.call("chat.postMessage", body);
    if (!result.ok) {
      console.error(`[SLACK] postMessage to ${channelId} failed: ${result.error.error}`);
      return { response: null, error: result.error };
    }
    console.log(`[SLACK] Posted message to ${channelId}`);
    return { response: result.data, error: null };
  }

  async checkAuth(): Promise<boolean> {
    const result = await this.call("auth.test", {});
    if (result.ok) return true;
    if (result.error.error === "invalid_auth" || result.error.error === "not_authed") return false;
    throw new SlackApiError(result.error);
  }

  async checkChannel(channelId: string): Promise<SlackErrorResponse | null> {
    const result = await this.call("chat.scheduledMessages.list", { channel: channelId });
    return result.ok ? null : result.error;
  }
}
