import { homedir } from "node:os";
import path from "node:path";

/**
 * Expand a leading "~" to the current user's home directory
 *
 * @example
 * expandHome("~/.netrc") // "/home/me/.netrc"
 * expandHome("/etc/netrc") // "/etc/netrc"
 */
export function expandHome(filepath: string): string {
  if (filepath === "~") {
    return homedir();
  }
  if (filepath.startsWith("~/")) {
    return path.join(homedir(), filepath.slice(2));
  }
  return filepath;
}
