/**
 * Serve command - scans two paths and serves the result over HTTP until the
 * process is interrupted.
 */

import { compare } from "../../compare/session.js";
import { info } from "../../core/logger.js";
import { openBrowser, type Launcher } from "../../web/open.js";
import { startServer, type RunningServer } from "../../web/server.js";
import { toCompareOptions, type CompareCommandOptions } from "../compare/index.js";

export interface ServeCommandOptions extends CompareCommandOptions {
  port?: number;
  host?: string;
  open?: boolean;
  launcher?: Launcher;
}

/**
 * Execute the serve command. Resolves once the server is listening.
 */
export async function executeServe(options: ServeCommandOptions): Promise<RunningServer> {
  const session = await compare(options.left, options.right, toCompareOptions(options));
  const running = await startServer({ session, port: options.port, host: options.host });
  info(`Serving diff at ${running.url} (Ctrl+C to stop)`);

  if (options.open) {
    await openBrowser(running.url, options.launcher);
  }
  return running;
}
