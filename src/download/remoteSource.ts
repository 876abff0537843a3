import { AppConfig } from "../config";
import { PermanentRemoteError } from "../core/errors";
import { createFetch, FetchLike, fetchWithTimeout } from "../core/fetch";
import { WorkItem } from "../types";

export interface RemoteSource {
  fetchRaw(item: WorkItem): Promise<Buffer>;
}

export interface EntrezRemoteSourceOptions {
  apiBaseUrl: string;
  email: string;
  tool: string;
  apiKey?: string;
  userAgent: string;
  requestTimeoutMs: number;
  fetchFn: FetchLike;
}

function isPermanentStatus(status: number): boolean {
  return status === 400 || status === 404 || status === 410;
}

/** Pulls one article's full-text XML per call from the efetch endpoint. */
export class EntrezRemoteSource implements RemoteSource {
  private readonly options: EntrezRemoteSourceOptions;

  constructor(options: EntrezRemoteSourceOptions) {
    this.options = options;
  }

  static fromConfig(config: AppConfig, fetchFn?: FetchLike): EntrezRemoteSource {
    return new EntrezRemoteSource({
      apiBaseUrl: config.apiBaseUrl,
      email: config.email,
      tool: config.tool,
      apiKey: config.apiKey,
      userAgent: config.userAgent,
      requestTimeoutMs: config.requestTimeoutMs,
      fetchFn: fetchFn ?? createFetch(config.ignoreHttpsErrors),
    });
  }

  buildUrl(item: WorkItem): string {
    const url = new URL(`${this.options.apiBaseUrl.replace(/\/+$/, "")}/efetch.fcgi`);
    url.searchParams.set("db", "pmc");
    url.searchParams.set("id", item.remoteId);
    url.searchParams.set("rettype", "xml");
    url.searchParams.set("retmode", "xml");
    url.searchParams.set("tool", this.options.tool);
    url.searchParams.set("email", this.options.email);
    if (this.options.apiKey) {
      url.searchParams.set("api_key", this.options.apiKey);
    }
    return url.toString();
  }

  async fetchRaw(item: WorkItem): Promise<Buffer> {
    return fetchWithTimeout(
      this.options.fetchFn,
      this.buildUrl(item),
      {
        method: "GET",
        headers: {
          "user-agent": this.options.userAgent,
          accept: "application/xml,text/xml,*/*",
        },
      },
      this.options.requestTimeoutMs,
      async (response) => {
        if (isPermanentStatus(response.status)) {
          throw new PermanentRemoteError(`HTTP ${response.status}`, response.status);
        }
        if (!response.ok) {
          throw new Error(`HTTP ${response.status}`);
        }
        return Buffer.from(await response.arrayBuffer());
      },
    );
  }
}
