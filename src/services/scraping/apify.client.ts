import { APIFY_TOKEN_PLACEHOLDER, credentialState, getConfig } from "../../config";
import { ConfigurationError, RemoteCallError } from "../workflow/errors";

export interface ScrapingClient {
  runActor(actorId: string, input: Record<string, unknown>): Promise<unknown[]>;
}

export interface ApifyActorClientOptions {
  token?: string;
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

/**
 * Runs an Apify actor synchronously and returns its dataset items.
 */
export class ApifyActorClient implements ScrapingClient {
  private readonly token: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: ApifyActorClientOptions = {}) {
    const config = getConfig();
    this.token = options.token ?? config.apifyApiToken;
    this.baseUrl = (options.baseUrl ?? config.apifyBaseUrl).replace(/\/$/, "");
    this.timeoutMs = options.timeoutMs ?? config.remoteTimeoutMs;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  actorUrl(actorId: string): string {
    const url = new URL(
      `${this.baseUrl}/acts/${encodeURIComponent(actorId.replace("/", "~"))}/run-sync-get-dataset-items`,
    );
    url.searchParams.set("token", this.token);
    return url.toString();
  }

  async runActor(actorId: string, input: Record<string, unknown>): Promise<unknown[]> {
    if (credentialState(this.token, APIFY_TOKEN_PLACEHOLDER) !== "configured") {
      throw new ConfigurationError("APIFY_API_TOKEN not configured");
    }

    let response: Response;
    try {
      response = await this.fetchImpl(this.actorUrl(actorId), {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(input),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new RemoteCallError("apify", `Apify actor ${actorId} request failed: ${reason}`);
    }

    if (!response.ok) {
      const detail = (await response.text()).trim();
      throw new RemoteCallError(
        "apify",
        `Apify actor ${actorId} failed with status ${response.status}${detail ? `: ${detail}` : ""}`,
      );
    }

    const payload: unknown = await response.json();
    if (!Array.isArray(payload)) {
      throw new RemoteCallError("apify", `Apify actor ${actorId} returned a non-list dataset`);
    }

    return payload;
  }
}
