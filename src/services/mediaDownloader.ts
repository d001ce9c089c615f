import axios, { type AxiosInstance } from "axios";
import type { Logger } from "pino";

export interface MediaDownloader {
  /** Raw bytes, or null when the media could not be retrieved for any reason. */
  download(url: string): Promise<Buffer | null>;
}

export interface MediaDownloaderConfig {
  /** Twilio media URLs require basic auth with the account SID / auth token. */
  accountSid?: string;
  authToken?: string;
  timeoutMs: number;
  maxBytes?: number;
}

const DEFAULT_MAX_BYTES = 20 * 1024 * 1024;

export class HttpMediaDownloader implements MediaDownloader {
  private readonly client: AxiosInstance;

  constructor(
    private readonly config: MediaDownloaderConfig,
    private readonly logger: Logger,
    client?: AxiosInstance
  ) {
    this.client =
      client ??
      axios.create({
        timeout: config.timeoutMs,
        maxRedirects: 5,
        maxContentLength: config.maxBytes ?? DEFAULT_MAX_BYTES,
      });
  }

  async download(url: string): Promise<Buffer | null> {
    const { accountSid, authToken } = this.config;
    try {
      const response = await this.client.get<ArrayBuffer>(url, {
        responseType: "arraybuffer",
        ...(accountSid && authToken ? { auth: { username: accountSid, password: authToken } } : {}),
      });
      return Buffer.from(response.data);
    } catch (err) {
      this.logger.warn({ err, url }, "media.download_failed");
      return null;
    }
  }
}
