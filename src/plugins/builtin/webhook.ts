import type { ScanAggregate } from "../../types/domain/aggregate.js";
import { summarizeAggregate } from "../../types/domain/aggregate.js";
import type { JsonRecord } from "../../utils/records.js";
import { readNumber, readString, toRecord } from "../../utils/records.js";
import { BaseIntegrationPlugin } from "../base.js";

const DEFAULT_TIMEOUT_MS = 10_000;

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

/**
 * Posts a scan summary to a webhook. Settings: `url` (required), `headers`,
 * `timeoutMs`.
 */
export class WebhookIntegrationPlugin extends BaseIntegrationPlugin {
  readonly name = "webhook";
  readonly description = "Posts scan summaries to a webhook URL.";
  readonly serviceName = "webhook";
  private url: string | null = null;
  private headers: Record<string, string> = {};
  private timeoutMs = DEFAULT_TIMEOUT_MS;

  constructor(private readonly fetchImpl: FetchLike = fetch) {
    super();
  }

  async initialize(config: JsonRecord): Promise<boolean> {
    this.url = readString(config, "url") ?? null;
    if (!this.url) {
      this.logger.warn("Webhook plugin needs a url setting");
      return false;
    }
    this.headers = {};
    for (const [key, value] of Object.entries(toRecord(config.headers))) {
      if (typeof value === "string") this.headers[key] = value;
    }
    this.timeoutMs = readNumber(config, "timeoutMs") ?? DEFAULT_TIMEOUT_MS;
    return await super.initialize(config);
  }

  async connect(): Promise<boolean> {
    return this.url !== null;
  }

  async sendData(data: ScanAggregate): Promise<boolean> {
    if (!this.url) return false;
    const response = await this.fetchImpl(this.url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...this.headers },
      body: JSON.stringify({
        target: data.target,
        started_at: data.startedAt,
        completed_at: data.completedAt,
        summary: summarizeAggregate(data)
      }),
      signal: AbortSignal.timeout(this.timeoutMs)
    });
    if (!response.ok) {
      this.logger.warn(`Webhook responded with ${response.status}`);
      return false;
    }
    return true;
  }
}
