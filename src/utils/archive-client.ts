/**
 * Archive HTTP Client
 * Talks to the data archive with netrc credentials and a persistent cookie
 * session. Redirects are followed by hand so that the login host receives
 * credentials and its session cookies are kept.
 */

import { writeFile, rename, rm, mkdir } from "fs/promises";
import { dirname } from "node:path";
import { FetchError, HttpError } from "./errors";
import type { CookieJar } from "./cookie-jar";
import type { Netrc } from "./netrc";

/**
 * What the pipeline needs from the network
 */
export interface HttpClient {
  /** Status of a HEAD request, redirects not followed */
  head(url: string): Promise<number>;
  /** Body of a GET request, redirects followed */
  getText(url: string): Promise<string>;
  /** Save a GET response body to a file, returns the byte count */
  download(url: string, outputPath: string): Promise<number>;
  /** Persist session state (cookies) */
  flush(): Promise<void>;
}

export interface ArchiveClientOptions {
  netrc: Netrc;
  cookies: CookieJar;
  cookiePath?: string; // Where flush() saves the cookie jar
  timeout: number;
  userAgent: string;
  maxRedirects?: number;
}

const DEFAULT_MAX_REDIRECTS = 10;
const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

export class ArchiveClient implements HttpClient {
  private readonly maxRedirects: number;

  constructor(private readonly options: ArchiveClientOptions) {
    this.maxRedirects = options.maxRedirects ?? DEFAULT_MAX_REDIRECTS;
  }

  async head(url: string): Promise<number> {
    return this.withTimeout(async (signal) => {
      const response = await this.send(url, "HEAD", signal);
      return response.status;
    });
  }

  async getText(url: string): Promise<string> {
    return this.withTimeout(async (signal) => {
      const response = await this.follow(url, signal);
      return response.text();
    });
  }

  async download(url: string, outputPath: string): Promise<number> {
    const partialPath = `${outputPath}.part`;

    try {
      return await this.withTimeout(async (signal) => {
        const response = await this.follow(url, signal);
        const buffer = Buffer.from(await response.arrayBuffer());
        await mkdir(dirname(outputPath), { recursive: true });
        await writeFile(partialPath, buffer);
        await rename(partialPath, outputPath);
        return buffer.length;
      });
    } catch (error) {
      await rm(partialPath, { force: true });
      throw error;
    }
  }

  async flush(): Promise<void> {
    if (this.options.cookiePath) {
      await this.options.cookies.save(this.options.cookiePath);
    }
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private async withTimeout<T>(
    run: (signal: AbortSignal) => Promise<T>,
  ): Promise<T> {
    const controller = new AbortController();
    const timeoutId = setTimeout(
      () => controller.abort(),
      this.options.timeout,
    );
    try {
      return await run(controller.signal);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * GET a URL through its redirect chain
   * @throws HttpError when the final response is not 2xx
   */
  private async follow(url: string, signal: AbortSignal): Promise<Response> {
    let current = url;

    for (let hop = 0; hop <= this.maxRedirects; hop++) {
      const response = await this.send(current, "GET", signal);
      const location = response.headers.get("location");

      if (REDIRECT_STATUSES.has(response.status) && location) {
        await response.body?.cancel();
        current = new URL(location, current).toString();
        continue;
      }

      if (!response.ok) {
        await response.body?.cancel();
        throw new HttpError(response.status, response.statusText, current);
      }

      return response;
    }

    throw new FetchError(`Too many redirects: ${url}`);
  }

  private async send(
    url: string,
    method: "GET" | "HEAD",
    signal: AbortSignal,
  ): Promise<Response> {
    const target = new URL(url);
    const headers: Record<string, string> = {
      "user-agent": this.options.userAgent,
    };

    const credentials = this.options.netrc.lookup(target.hostname);
    if (credentials) {
      const token = Buffer.from(
        `${credentials.login}:${credentials.password}`,
      ).toString("base64");
      headers.authorization = `Basic ${token}`;
    }

    const cookie = this.options.cookies.cookieHeader(target);
    if (cookie) {
      headers.cookie = cookie;
    }

    const response = await fetch(url, {
      method,
      headers,
      redirect: "manual",
      signal,
    });

    this.options.cookies.setCookies(target, response.headers.getSetCookie());
    return response;
  }
}
