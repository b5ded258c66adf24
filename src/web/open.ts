/**
 * Launch the system browser on a URL.
 */

import { execa } from "execa";
import { describeError } from "../core/errors.js";
import { debug, warn } from "../core/logger.js";

export interface OpenCommand {
  command: string;
  args: string[];
}

export type Launcher = (file: string, args: string[]) => Promise<unknown>;

/**
 * Command that opens `url` in the default browser on `platform`.
 */
export function getOpenCommand(platform: NodeJS.Platform, url: string): OpenCommand {
  switch (platform) {
    case "darwin":
      return { command: "open", args: [url] };
    case "win32":
      // "start" treats its first quoted argument as a window title
      return { command: "cmd", args: ["/c", "start", '""', url] };
    default:
      return { command: "xdg-open", args: [url] };
  }
}

const defaultLauncher: Launcher = (file, args) =>
  execa(file, args, { detached: true, stdio: "ignore" });

/**
 * Open a browser. A failure is reported as a warning; the server keeps
 * running either way. Returns whether the launcher succeeded.
 */
export async function openBrowser(
  url: string,
  launcher: Launcher = defaultLauncher,
  platform: NodeJS.Platform = process.platform
): Promise<boolean> {
  const { command, args } = getOpenCommand(platform, url);
  debug(`Opening browser: ${command} ${args.join(" ")}`);
  try {
    await launcher(command, args);
    return true;
  } catch (error) {
    warn(`Could not open a browser (${describeError(error)}). Visit ${url}`);
    return false;
  }
}
