/**
 * Credential files for the archive's login service
 */

import { expandHome } from "./expand-home";
import { fileExists } from "./file-exists";
import { MissingCredentialsError } from "./errors";
import { Netrc } from "./netrc";
import { CookieJar } from "./cookie-jar";
import { ArchiveClient } from "./archive-client";
import type { AuthConfig, DownloadConfig, HttpClient } from "../types";

export const BULK_DOWNLOAD_INSTRUCTIONS =
  "https://nsidc.org/support/faq/what-options-are-available-bulk-downloading-data-https-earthdata-login-enabled";

/**
 * @throws MissingCredentialsError naming every file that is absent
 */
export async function assertCredentials(auth: AuthConfig): Promise<void> {
  const required = [expandHome(auth.netrcPath), expandHome(auth.cookiePath)];
  const missing: string[] = [];

  for (const filepath of required) {
    if (!(await fileExists(filepath))) missing.push(filepath);
  }

  if (missing.length > 0) {
    throw new MissingCredentialsError(missing, BULK_DOWNLOAD_INSTRUCTIONS);
  }
}

/**
 * Build a client that logs in with the configured netrc and cookie files
 */
export async function createArchiveClient(
  auth: AuthConfig,
  download: DownloadConfig,
): Promise<HttpClient> {
  const cookiePath = expandHome(auth.cookiePath);

  return new ArchiveClient({
    netrc: await Netrc.load(expandHome(auth.netrcPath)),
    cookies: await CookieJar.load(cookiePath),
    cookiePath,
    timeout: download.timeout,
    userAgent: download.userAgent,
  });
}
