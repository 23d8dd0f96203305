/**
 * Cookie Jar
 * Keeps the archive's login session between requests and between runs.
 * Persists in the Netscape cookie file format shared with curl.
 */

import { readFile, writeFile, mkdir } from "fs/promises";
import { dirname } from "node:path";

export interface Cookie {
  domain: string; // Without a leading dot
  includeSubdomains: boolean;
  path: string;
  secure: boolean;
  httpOnly: boolean;
  expires: number; // Unix seconds, 0 for a session cookie
  name: string;
  value: string;
}

const HTTP_ONLY_PREFIX = "#HttpOnly_";

/**
 * Default cookie path: the request path up to its last "/"
 */
function defaultPath(pathname: string): string {
  const slash = pathname.lastIndexOf("/");
  return slash > 0 ? pathname.slice(0, slash) : "/";
}

function domainMatches(host: string, cookie: Cookie): boolean {
  if (host === cookie.domain) return true;
  return cookie.includeSubdomains && host.endsWith(`.${cookie.domain}`);
}

function pathMatches(requestPath: string, cookiePath: string): boolean {
  if (requestPath === cookiePath) return true;
  if (!requestPath.startsWith(cookiePath)) return false;
  return cookiePath.endsWith("/") || requestPath[cookiePath.length] === "/";
}

export class CookieJar {
  private cookies: Cookie[] = [];

  constructor(private readonly now: () => number = Date.now) {}

  get size(): number {
    return this.cookies.length;
  }

  /**
   * Store the cookies a response set for a request URL
   */
  setCookies(url: URL, headers: string[]): void {
    for (const header of headers) {
      const cookie = this.parseSetCookie(url, header);
      if (cookie) this.store(cookie);
    }
  }

  /**
   * Value for the Cookie request header, or null when nothing applies
   */
  cookieHeader(url: URL): string | null {
    const host = url.hostname.toLowerCase();
    const matching = this.cookies.filter(
      (cookie) =>
        !this.isExpired(cookie) &&
        domainMatches(host, cookie) &&
        pathMatches(url.pathname || "/", cookie.path) &&
        (!cookie.secure || url.protocol === "https:"),
    );

    if (matching.length === 0) return null;

    // Longer paths first
    matching.sort((a, b) => b.path.length - a.path.length);
    return matching.map((c) => `${c.name}=${c.value}`).join("; ");
  }

  // ============================================================================
  // Persistence
  // ============================================================================

  serialize(): string {
    const lines = ["# Netscape HTTP Cookie File"];
    for (const cookie of this.cookies) {
      if (this.isExpired(cookie)) continue;
      const domain = cookie.includeSubdomains
        ? `.${cookie.domain}`
        : cookie.domain;
      lines.push(
        [
          cookie.httpOnly ? `${HTTP_ONLY_PREFIX}${domain}` : domain,
          cookie.includeSubdomains ? "TRUE" : "FALSE",
          cookie.path,
          cookie.secure ? "TRUE" : "FALSE",
          String(cookie.expires),
          cookie.name,
          cookie.value,
        ].join("\t"),
      );
    }
    return lines.join("\n") + "\n";
  }

  static parse(text: string, now: () => number = Date.now): CookieJar {
    const jar = new CookieJar(now);

    for (const rawLine of text.split(/\r?\n/)) {
      let line = rawLine;
      let httpOnly = false;
      if (line.startsWith(HTTP_ONLY_PREFIX)) {
        line = line.slice(HTTP_ONLY_PREFIX.length);
        httpOnly = true;
      } else if (!line.trim() || line.startsWith("#")) {
        continue;
      }

      const fields = line.split("\t");
      if (fields.length < 7) continue;

      const [domain, flag, path, secure, expires, name, value] = fields;
      jar.store({
        domain: domain.replace(/^\./, "").toLowerCase(),
        includeSubdomains: flag === "TRUE",
        path,
        secure: secure === "TRUE",
        httpOnly,
        expires: parseInt(expires, 10) || 0,
        name,
        value,
      });
    }

    return jar;
  }

  static async load(
    filepath: string,
    now: () => number = Date.now,
  ): Promise<CookieJar> {
    return CookieJar.parse(await readFile(filepath, "utf-8"), now);
  }

  async save(filepath: string): Promise<void> {
    await mkdir(dirname(filepath), { recursive: true });
    await writeFile(filepath, this.serialize(), "utf-8");
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private isExpired(cookie: Cookie): boolean {
    return cookie.expires !== 0 && cookie.expires * 1000 <= this.now();
  }

  private store(cookie: Cookie): void {
    this.cookies = this.cookies.filter(
      (c) =>
        !(
          c.domain === cookie.domain &&
          c.path === cookie.path &&
          c.name === cookie.name
        ),
    );
    // An already-expired cookie only deletes what it replaces
    if (!this.isExpired(cookie)) {
      this.cookies.push(cookie);
    }
  }

  private parseSetCookie(url: URL, header: string): Cookie | null {
    const [pair, ...attributes] = header.split(";");
    const eq = pair.indexOf("=");
    if (eq <= 0) return null;

    const host = url.hostname.toLowerCase();
    const cookie: Cookie = {
      domain: host,
      includeSubdomains: false,
      path: defaultPath(url.pathname),
      secure: false,
      httpOnly: false,
      expires: 0,
      name: pair.slice(0, eq).trim(),
      value: pair.slice(eq + 1).trim(),
    };

    let maxAge: number | null = null;

    for (const attribute of attributes) {
      const sep = attribute.indexOf("=");
      const key = (sep >= 0 ? attribute.slice(0, sep) : attribute)
        .trim()
        .toLowerCase();
      const value = sep >= 0 ? attribute.slice(sep + 1).trim() : "";

      switch (key) {
        case "domain": {
          const domain = value.replace(/^\./, "").toLowerCase();
          // Refuse cookies for unrelated domains
          if (domain && host !== domain && !host.endsWith(`.${domain}`)) {
            return null;
          }
          if (domain) {
            cookie.domain = domain;
            cookie.includeSubdomains = true;
          }
          break;
        }
        case "path":
          if (value.startsWith("/")) cookie.path = value;
          break;
        case "expires": {
          const time = Date.parse(value);
          if (!Number.isNaN(time)) cookie.expires = Math.floor(time / 1000);
          break;
        }
        case "max-age": {
          const seconds = parseInt(value, 10);
          if (!Number.isNaN(seconds)) maxAge = seconds;
          break;
        }
        case "secure":
          cookie.secure = true;
          break;
        case "httponly":
          cookie.httpOnly = true;
          break;
      }
    }

    if (maxAge !== null) {
      // Max-Age wins over Expires; a non-positive value deletes the cookie
      cookie.expires =
        maxAge > 0 ? Math.floor(this.now() / 1000) + maxAge : 1;
    }

    return cookie;
  }
}
