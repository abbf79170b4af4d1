/**
 * Test utilities for network layer mocking and boundary testing.
 *
 * - createMockHttpClient: behavioral HttpClient mock with request history,
 *   per-URL responses and network-down simulation
 * - createTestServer: real HTTP server on 127.0.0.1 for boundary tests
 */

import {
  createServer as createHttpServer,
  type Server,
  type IncomingMessage,
  type ServerResponse,
} from "node:http";
import type { HttpClient, HttpRequestOptions } from "./network.js";

// =============================================================================
// Mock HttpClient
// =============================================================================

/** Record of an HTTP request made through the mock. */
export interface HttpRequestRecord {
  readonly url: string;
  readonly options: HttpRequestOptions | undefined;
}

/**
 * Response configuration - stores DATA, not Response objects.
 * A fresh Response is constructed on each fetch() call.
 */
export interface ConfiguredResponse {
  /** Text or binary body, or a factory for a streamed body */
  readonly body?: string | Uint8Array | (() => ReadableStream<Uint8Array>);
  /** Default: 200 */
  readonly status?: number;
  readonly headers?: Record<string, string>;
  /** Throw this instead of returning a response */
  readonly error?: Error;
}

/** Mock state - pure data. */
export interface HttpClientMockState {
  readonly requests: readonly HttpRequestRecord[];
  readonly networkError: Error | null;
}

/** Mock type with state access and setup methods. */
export type MockHttpClient = HttpClient & {
  readonly $: HttpClientMockState;
  setResponse(url: string, config: ConfiguredResponse): void;
  simulateNetworkDown(error?: Error): void;
  simulateNetworkUp(): void;
};

/** Factory options. */
export interface MockHttpClientOptions {
  /** Pre-configured responses by exact URL. */
  readonly responses?: Record<string, ConfiguredResponse>;
  /** Default for unconfigured URLs. Default: { status: 404 } */
  readonly defaultResponse?: ConfiguredResponse;
}

type ResponseBody = ConstructorParameters<typeof Response>[0];
type ResponseOptions = NonNullable<ConstructorParameters<typeof Response>[1]>;

function toBodyInit(body: ConfiguredResponse["body"]): ResponseBody {
  if (body === undefined) return null;
  if (typeof body === "function") return body();
  return body;
}

/**
 * Create a behavioral mock HttpClient for testing.
 *
 * @example Configure responses per URL
 * const httpClient = createMockHttpClient({
 *   responses: {
 *     "https://example.test/releases?per_page=100&page=1": { body: "[]" },
 *   },
 * });
 *
 * @example Simulate network down
 * const mock = createMockHttpClient();
 * mock.simulateNetworkDown();
 * await mock.fetch("https://example.test"); // throws TypeError
 */
export function createMockHttpClient(options?: MockHttpClientOptions): MockHttpClient {
  const requests: HttpRequestRecord[] = [];
  const responses = new Map<string, ConfiguredResponse>(
    options?.responses ? Object.entries(options.responses) : []
  );
  let networkError: Error | null = null;

  const defaultResponse: ConfiguredResponse = options?.defaultResponse ?? { status: 404 };

  return {
    $: {
      get requests(): readonly HttpRequestRecord[] {
        return requests;
      },
      get networkError(): Error | null {
        return networkError;
      },
    },

    async fetch(url: string, opts?: HttpRequestOptions): Promise<Response> {
      requests.push({ url, options: opts });

      if (opts?.signal?.aborted) {
        throw new DOMException("The operation was aborted.", "AbortError");
      }
      if (networkError) {
        throw networkError;
      }

      const config = responses.get(url) ?? defaultResponse;
      if (config.error) {
        throw config.error;
      }
      const init: ResponseOptions = { status: config.status ?? 200 };
      return new Response(
        toBodyInit(config.body),
        config.headers ? { ...init, headers: config.headers } : init
      );
    },

    setResponse(url: string, config: ConfiguredResponse): void {
      responses.set(url, config);
    },

    simulateNetworkDown(error: Error = new TypeError("fetch failed")): void {
      networkError = error;
    },

    simulateNetworkUp(): void {
      networkError = null;
    },
  };
}

/**
 * Build a ReadableStream that emits the given chunks, then optionally fails.
 */
export function createChunkStream(
  chunks: readonly Uint8Array[],
  failWith?: Error
): ReadableStream<Uint8Array> {
  let index = 0;
  return new ReadableStream<Uint8Array>({
    pull(controller) {
      const chunk = chunks[index];
      index++;
      if (chunk !== undefined) {
        controller.enqueue(chunk);
      } else if (failWith) {
        controller.error(failWith);
      } else {
        controller.close();
      }
    },
  });
}

// =============================================================================
// Test Server for Boundary Tests
// =============================================================================

/**
 * Route handler for test server.
 */
export type RouteHandler = (req: IncomingMessage, res: ServerResponse) => void;

/**
 * Test HTTP server for boundary tests.
 */
export interface TestServer {
  /** Start the server. Resolves when listening. */
  start(): Promise<void>;
  /** Stop the server. Safe to call multiple times. */
  stop(): Promise<void>;
  /** Build URL for a given path. Throws if not started. */
  url(path: string): string;
}

/**
 * Create a test HTTP server bound to 127.0.0.1 on a random port.
 * Routes are matched on the full request URL (path and query).
 * Unknown routes answer 404.
 *
 * @example
 * const server = createTestServer({
 *   '/bin': (req, res) => {
 *     res.writeHead(200);
 *     res.end('binary');
 *   }
 * });
 * await server.start();
 */
export function createTestServer(routes: Record<string, RouteHandler>): TestServer {
  let serverPort: number | null = null;
  let server: Server | null = null;

  return {
    async start(): Promise<void> {
      if (server) return;

      const created = createHttpServer((req, res) => {
        const handler = routes[req.url ?? ""];
        if (handler) {
          handler(req, res);
        } else {
          res.writeHead(404);
          res.end();
        }
      });
      server = created;

      await new Promise<void>((resolve, reject) => {
        created.listen(0, "127.0.0.1", () => {
          const addr = created.address();
          if (addr && typeof addr === "object") {
            serverPort = addr.port;
            resolve();
          } else {
            reject(new Error("Failed to get server address"));
          }
        });
        created.on("error", reject);
      });
    },

    async stop(): Promise<void> {
      const current = server;
      if (!current) return;

      await new Promise<void>((resolve) => {
        current.closeAllConnections();
        current.close(() => resolve());
      });
      server = null;
      serverPort = null;
    },

    url(path: string): string {
      if (serverPort === null) {
        throw new Error("Server not started - call start() first");
      }
      return `http://127.0.0.1:${serverPort}${path}`;
    },
  };
}
