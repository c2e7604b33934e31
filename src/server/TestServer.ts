import type { AddressInfo, Server as NetServer } from "node:net";
import { serve } from "@hono/node-server";
import { Hono, type Context } from "hono";
import type { Logger } from "pino";
import { onTestFinished } from "vitest";
import { getDefaultLogger } from "../logging/logger.js";
import { errorMessage } from "../core/OutputBuilder.js";

export type FixtureHandler = (c: Context) => Response | Promise<Response>;

export interface RecordedRequest {
  method: string;
  path: string;
  url: string;
}

export type CleanupRegistrar = (cleanup: () => Promise<void>) => void;

export interface TestServerOptions {
  logger?: Logger;
  /**
   * default: Vitest's onTestFinished, which only works while a test is
   * running; pass a no-op and call close() yourself elsewhere.
   */
  registerCleanup?: CleanupRegistrar;
}

interface Listener {
  server: NetServer;
  url: string;
}

const METHOD_PATTERN = /^([A-Z]+)\s+(\/\S*)$/;

/**
 * In-process mock API for client-library tests. Routes are registered as
 * `"GET /api/v1/organization/:id"`; handlers usually return a fixture
 * response. Errors thrown by a handler fail the test that triggered them.
 */
export class TestServer {
  readonly app = new Hono();
  readonly requests: RecordedRequest[] = [];

  private logger: Logger;
  private failures: unknown[] = [];
  private reported = 0;
  private listening?: Promise<Listener>;
  private listener?: Listener;

  constructor(opts: TestServerOptions = {}) {
    this.logger = opts.logger ?? getDefaultLogger();

    this.app.use("*", async (c, next) => {
      this.requests.push({ method: c.req.method, path: c.req.path, url: c.req.url });
      await next();
    });

    this.app.onError((e, c) => {
      this.failures.push(e);
      this.logger.error(
        { method: c.req.method, path: c.req.path, err: e },
        "fixture handler failed",
      );
      return c.text(`fixture handler failed: ${e.message}`, 500);
    });

    const register = opts.registerCleanup ?? onTestFinished;
    register(async () => {
      await this.close();
      this.assertNoFailures();
    });
  }

  /** Register a handler for `"METHOD /path"`, or for every method when no method is given. */
  handle(pattern: string, handler: FixtureHandler): this {
    const match = METHOD_PATTERN.exec(pattern.trim());
    const method = match?.[1];
    const path = match?.[2];
    if (method !== undefined && path !== undefined) {
      this.app.on(method, path, handler);
    } else {
      this.app.all(pattern.trim(), handler);
    }
    this.logger.debug({ pattern }, "handler registered");
    return this;
  }

  /** Dispatch without a socket. Rethrows the first failure raised while handling. */
  async request(input: string | URL | Request, init?: RequestInit): Promise<Response> {
    const response = await this.app.request(input, init);
    this.assertNoFailures();
    return response;
  }

  /**
   * Start listening on an ephemeral local port and return the base URL.
   * Calls made while a listener is starting or running share it.
   */
  listen(): Promise<string> {
    this.listening ??= this.startListener();
    return this.listening.then((listener) => listener.url);
  }

  get url(): string {
    if (this.listener === undefined) {
      throw new Error("Test server is not listening; call listen() first");
    }
    return this.listener.url;
  }

  /** Stop the listener, waiting for one that is still starting. */
  async close(): Promise<void> {
    const listening = this.listening;
    if (!listening) return;
    this.listening = undefined;

    const { server } = await listening;
    if (this.listener?.server === server) this.listener = undefined;
    await new Promise<void>((resolve, reject) => {
      server.close((e?: Error) => (e ? reject(e) : resolve()));
    });
    this.logger.debug("test server closed");
  }

  private async startListener(): Promise<Listener> {
    const { server, port } = await new Promise<{ server: NetServer; port: number }>(
      (resolve, reject) => {
        const server: NetServer = serve(
          { fetch: this.app.fetch, port: 0, hostname: "127.0.0.1" },
          (info: AddressInfo) => resolve({ server, port: info.port }),
        );
        server.once("error", reject);
      },
    );

    const listener: Listener = { server, url: `http://127.0.0.1:${port}` };
    this.listener = listener;
    this.logger.debug({ url: listener.url }, "test server listening");
    return listener;
  }

  private assertNoFailures(): void {
    if (this.reported >= this.failures.length) return;
    const failure = this.failures[this.reported];
    this.reported = this.failures.length;
    if (failure instanceof Error) throw failure;
    throw new Error(`fixture handler failed: ${errorMessage(failure)}`);
  }
}

export function createTestServer(opts: TestServerOptions = {}): TestServer {
  return new TestServer(opts);
}
