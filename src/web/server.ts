/**
 * Read-only HTTP interface over a comparison session.
 *
 * GET /               browser page
 * GET /api/tree       the DiffTree
 * GET /api/file?path= the line diff of one file pair
 */

import type { Server } from "node:http";
import express, { type NextFunction, type Request, type Response } from "express";
import type { ComparisonSession } from "../compare/session.js";
import {
  BinaryContentError,
  describeError,
  DiffyError,
  EntryUnreadableError,
  FileTooLargeError,
  NodeNotFoundError,
  NotAFilePairError,
} from "../core/errors.js";
import { debug, error as logError } from "../core/logger.js";
import { renderPage } from "./page.js";

export const DEFAULT_PORT = 3000;
export const DEFAULT_HOST = "127.0.0.1";

const ROUTES = ["/", "/api/tree", "/api/file"];

export type ApiResponse<T> =
  | { success: true; data: T }
  | { success: false; error: string };

export interface ServerOptions {
  session: ComparisonSession;
  port?: number;
  host?: string;
}

export interface RunningServer {
  server: Server;
  url: string;
  close: () => Promise<void>;
}

/**
 * An error that already carries its HTTP status.
 */
export class HttpError extends Error {
  constructor(
    message: string,
    public readonly status: number
  ) {
    super(message);
    this.name = "HttpError";
  }
}

/**
 * HTTP status for an error raised while serving a request.
 */
export function statusForError(error: unknown): number {
  if (error instanceof HttpError) return error.status;
  if (error instanceof NodeNotFoundError) return 404;
  if (
    error instanceof BinaryContentError ||
    error instanceof NotAFilePairError ||
    error instanceof EntryUnreadableError ||
    error instanceof FileTooLargeError
  ) {
    return 422;
  }
  return 500;
}

function sendJson<T>(response: Response, status: number, body: ApiResponse<T>): void {
  response.status(status).set("cache-control", "no-store").json(body);
}

export function errorHandlingMiddleware(
  error: unknown,
  request: Request,
  response: Response,
  _next: NextFunction
): void {
  const status = statusForError(error);
  if (status === 500) {
    logError(`${request.method} ${request.originalUrl} failed: ${describeError(error)}`);
  }
  const message =
    error instanceof DiffyError || error instanceof HttpError
      ? error.message
      : "Internal server error";
  sendJson(response, status, { success: false, error: message });
}

/**
 * Wire up the express app for a session.
 */
export function createApp(session: ComparisonSession): express.Express {
  const app = express();
  app.disable("x-powered-by");

  app.use((request, _response, next) => {
    debug(`${request.method} ${request.originalUrl}`);
    next();
  });

  app.get("/", (_request, response) => {
    response.type("html").send(renderPage());
  });

  app.get("/api/tree", (_request, response) => {
    sendJson(response, 200, { success: true, data: session.tree });
  });

  app.get("/api/file", (request, response, next) => {
    const path = request.query.path;
    if (typeof path !== "string") {
      next(new HttpError("Missing required query parameter: path", 400));
      return;
    }
    session
      .getFileDiff(path)
      .then((fileDiff) => sendJson(response, 200, { success: true, data: fileDiff }))
      .catch(next);
  });

  app.all(ROUTES, (request, response, next) => {
    response.set("allow", "GET, HEAD");
    next(new HttpError(`Method ${request.method} not allowed`, 405));
  });

  app.use((request, _response, next) => {
    next(new HttpError(`No route for ${request.path}`, 404));
  });

  app.use(errorHandlingMiddleware);

  return app;
}

/**
 * Start serving a session. Resolves once the server is listening.
 */
export async function startServer(options: ServerOptions): Promise<RunningServer> {
  const app = createApp(options.session);
  const host = options.host ?? DEFAULT_HOST;

  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(options.port ?? DEFAULT_PORT, host, () => {
      listening.off("error", reject);
      resolve(listening);
    });
    listening.once("error", reject);
  });

  const address = server.address();
  const port = typeof address === "object" && address !== null
    ? address.port
    : (options.port ?? DEFAULT_PORT);
  const url = `http://${host}:${port}`;

  return {
    server,
    url,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}
