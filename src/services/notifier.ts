import axios, { type AxiosInstance } from "axios";
import type { Logger } from "pino";

export interface Notifier {
  /** Fire-and-forget; delivery failures are logged, never thrown. */
  notify(message: string): void;
}

/**
 * Plain-text POST to an operator webhook (ntfy-style topic URL).
 * Without a URL, notifications are only logged.
 */
export class WebhookNotifier implements Notifier {
  private readonly client: AxiosInstance;

  constructor(
    private readonly url: string | undefined,
    private readonly logger: Logger,
    client?: AxiosInstance
  ) {
    this.client = client ?? axios.create({ timeout: 5000 });
  }

  notify(message: string): void {
    if (!this.url) {
      this.logger.info({ message }, "notify.skipped");
      return;
    }

    void this.client
      .post(this.url, message, { headers: { "Content-Type": "text/plain; charset=utf-8" } })
      .then(() => this.logger.debug({ message }, "notify.sent"))
      .catch((err: unknown) => this.logger.warn({ err }, "notify.failed"));
  }
}
