/**
 * Authenticated HTTP transport over fetch, using the OAuth2
 * client-credentials grant.
 */
import {
  ConnectionClosedError,
  HttpStatusError,
} from "../core/exceptions.js";
import { componentLogger } from "../log.js";
import { parseResponse } from "../model/parse.js";
import { TokenResponseSchema } from "../model/schemas.js";
import type { RequestOptions, Transport } from "./backend.js";
import { MediaType } from "./routes.js";

export interface ConnectionConfig {
  /** Host of the service, e.g. `https://dam.example.com`. */
  endpoint: string;
  clientId: string;
  clientSecret: string;
  basePath?: string;
  tokenPath?: string;
  /** Defaults to the global fetch. */
  fetch?: typeof fetch;
}

/** Refresh this long before the server-declared expiry. */
const TOKEN_EXPIRY_MARGIN_MS = 30_000;

interface Token {
  value: string;
  expiresAt: number;
}

const logger = componentLogger("connection");

export class ApiConnection implements Transport {
  readonly host: string;
  private readonly tokenUrl: string;
  private readonly clientId: string;
  private readonly clientSecret: string;
  private readonly fetchImpl: typeof fetch;

  private token: Token | null = null;
  private pendingToken: Promise<Token> | null = null;
  private closed = false;

  constructor(config: ConnectionConfig) {
    this.host = config.endpoint.replace(/\/+$/, "");
    const basePath = (config.basePath ?? "").replace(/\/+$/, "");
    this.tokenUrl = `${this.host}${basePath}${config.tokenPath ?? "/oauth2/token"}`;
    this.clientId = config.clientId;
    this.clientSecret = config.clientSecret;
    this.fetchImpl = config.fetch ?? globalThis.fetch;
  }

  // ------------------------------------------------------------------
  // Transport
  // ------------------------------------------------------------------

  async GET(path: string, opts: RequestOptions = {}): Promise<Response> {
    return this.request("GET", path, opts);
  }

  async POST(path: string, opts: RequestOptions = {}): Promise<Response> {
    return this.request("POST", path, opts);
  }

  async PATCH(path: string, opts: RequestOptions = {}): Promise<Response> {
    return this.request("PATCH", path, opts);
  }

  async close(): Promise<void> {
    this.closed = true;
    this.token = null;
    this.pendingToken = null;
  }

  // ------------------------------------------------------------------
  // Internals
  // ------------------------------------------------------------------

  /** Resolve a host-relative path; absolute URLs pass through. */
  url(path: string): string {
    return /^https?:\/\//i.test(path) ? path : `${this.host}${path}`;
  }

  private async request(
    method: string,
    path: string,
    opts: RequestOptions,
  ): Promise<Response> {
    if (this.closed) throw new ConnectionClosedError();

    const token = await this.ensureToken();
    const headers: Record<string, string> = {
      Accept: MediaType.json,
      Authorization: `Bearer ${token}`,
    };

    let body: RequestInit["body"];
    if (opts.form) {
      // fetch sets the multipart boundary itself
      body = opts.form;
    } else if (opts.data !== undefined) {
      headers["Content-Type"] = MediaType.json;
      body = JSON.stringify(opts.data);
    }
    Object.assign(headers, opts.headers);

    const url = this.url(path);
    const response = await this.fetchImpl(url, {
      method,
      headers,
      body,
      signal: opts.signal,
    });

    if (!response.ok) {
      throw new HttpStatusError(response.status, url, await safeText(response));
    }
    return response;
  }

  private async ensureToken(): Promise<string> {
    if (this.token && Date.now() < this.token.expiresAt) {
      return this.token.value;
    }
    // Share one in-flight token request between concurrent callers.
    this.pendingToken ??= this.fetchToken().finally(() => {
      this.pendingToken = null;
    });
    const token = await this.pendingToken;
    this.token = token;
    return token.value;
  }

  private async fetchToken(): Promise<Token> {
    const response = await this.fetchImpl(this.tokenUrl, {
      method: "POST",
      headers: {
        Accept: MediaType.json,
        "Content-Type": "application/x-www-form-urlencoded",
      },
      body: new URLSearchParams({
        grant_type: "client_credentials",
        client_id: this.clientId,
        client_secret: this.clientSecret,
      }),
    });

    if (!response.ok) {
      throw new HttpStatusError(
        response.status,
        this.tokenUrl,
        await safeText(response),
      );
    }

    const data = await parseResponse(response, TokenResponseSchema);
    const lifetimeMs =
      data.expires_in !== undefined ? data.expires_in * 1000 : Infinity;
    logger.debug("Fetched access token, expires in {seconds}s", {
      seconds: data.expires_in ?? "never",
    });
    return {
      value: data.access_token,
      expiresAt: Date.now() + lifetimeMs - TOKEN_EXPIRY_MARGIN_MS,
    };
  }
}

async function safeText(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch {
    return response.statusText;
  }
}
