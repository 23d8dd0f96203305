/**
 * netrc Reader
 * Supplies login credentials per host, the same file curl and wget read
 */

import { readFile } from "fs/promises";

export interface NetrcCredentials {
  login: string;
  password: string;
}

interface PendingEntry {
  host: string | null; // null for the "default" entry
  login?: string;
  password?: string;
}

/**
 * Split a netrc file into tokens, dropping comments and macro definitions
 */
function tokenize(text: string): string[] {
  const tokens: string[] = [];
  let inMacro = false;

  for (const line of text.split(/\r?\n/)) {
    if (inMacro) {
      // A macro body runs until the first blank line
      if (!line.trim()) inMacro = false;
      continue;
    }
    if (line.trimStart().startsWith("#")) continue;

    for (const token of line.trim().split(/\s+/)) {
      if (!token) continue;
      if (token === "macdef") {
        inMacro = true;
        break;
      }
      tokens.push(token);
    }
  }

  return tokens;
}

export class Netrc {
  constructor(
    private readonly machines: Map<string, NetrcCredentials>,
    private readonly fallback: NetrcCredentials | null = null,
  ) {}

  static parse(text: string): Netrc {
    const tokens = tokenize(text);
    const machines = new Map<string, NetrcCredentials>();
    let fallback: NetrcCredentials | null = null;
    let current: PendingEntry | null = null;

    const flush = () => {
      if (!current || current.login === undefined) return;
      const credentials = {
        login: current.login,
        password: current.password ?? "",
      };
      if (current.host === null) {
        fallback = fallback ?? credentials;
      } else if (!machines.has(current.host)) {
        // First entry for a host wins
        machines.set(current.host, credentials);
      }
    };

    for (let i = 0; i < tokens.length; i++) {
      switch (tokens[i]) {
        case "machine":
          flush();
          current = { host: (tokens[++i] ?? "").toLowerCase() };
          break;
        case "default":
          flush();
          current = { host: null };
          break;
        case "login":
          if (current) current.login = tokens[i + 1];
          i++;
          break;
        case "password":
          if (current) current.password = tokens[i + 1];
          i++;
          break;
        case "account":
          i++;
          break;
      }
    }
    flush();

    return new Netrc(machines, fallback);
  }

  static async load(filepath: string): Promise<Netrc> {
    return Netrc.parse(await readFile(filepath, "utf-8"));
  }

  lookup(host: string): NetrcCredentials | null {
    return this.machines.get(host.toLowerCase()) ?? this.fallback;
  }
}
