import { randomUUID } from "node:crypto";
import { createServer, type IncomingMessage, type ServerResponse } from "node:http";
import type { AddressInfo } from "node:net";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { createLogger } from "./infra/logging/logger.js";
import type { EngineState } from "./services/engineState.js";

export const MCP_PATH = "/mcp";
export const HEALTH_PATH = "/healthz";

const MAX_BODY_BYTES = 1024 * 1024;

export interface HttpServerOptions {
  host: string;
  /** 0 picks a free port */
  port: number;
  state: EngineState;
  serverFactory: () => McpServer;
  /** sessions without a POST for this long are closed; defaults to the conversation timeout */
  sessionIdleMs?: number;
  clock?: () => number;
}

export interface RunningHttpServer {
  url: string;
  port: number;
  activeSessions(): number;
  close(): Promise<void>;
}

interface McpSession {
  server: McpServer;
  transport: StreamableHTTPServerTransport;
  lastSeen: number;
}

class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
    /** JSON-RPC error code; plain JSON error body when absent */
    readonly rpcCode?: number,
  ) {
    super(message);
  }
}

const log = createLogger("http");

/**
 * Streamable HTTP front end: one MCP transport per client session under
 * `/mcp`, plus a JSON health report under `/healthz`.
 */
export async function startHttpServer(options: HttpServerOptions): Promise<RunningHttpServer> {
  const { state, serverFactory } = options;
  const clock = options.clock ?? Date.now;
  const sessionIdleMs = options.sessionIdleMs ?? state.config.sessionTimeoutMs;
  const sessions = new Map<string, McpSession>();

  const closeSession = async (sessionId: string) => {
    const session = sessions.get(sessionId);
    if (!session) {
      return;
    }
    sessions.delete(sessionId);
    await session.transport.close();
    await session.server.close();
  };

  const closeIdleSessions = async () => {
    const now = clock();
    const idle = [...sessions.entries()]
      .filter(([, session]) => now - session.lastSeen > sessionIdleMs)
      .map(([sessionId]) => sessionId);
    await Promise.all(idle.map(closeSession));
    if (idle.length > 0) {
      log.info({ closed: idle.length }, "closed idle MCP sessions");
    }
  };

  const lookupSession = (req: IncomingMessage): McpSession | null => {
    const sessionId = readSessionId(req);
    if (!sessionId) {
      return null;
    }
    const session = sessions.get(sessionId);
    if (!session) {
      throw new HttpError(404, "Session not found", -32001);
    }
    return session;
  };

  const openSession = async (req: IncomingMessage, res: ServerResponse, body: unknown) => {
    if (!isInitializeRequest(body)) {
      throw new HttpError(400, "Initialize request is required when session is not established", -32000);
    }
    await closeIdleSessions();

    const server = serverFactory();
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (sessionId) => {
        sessions.set(sessionId, { server, transport, lastSeen: clock() });
        log.debug({ sessionId }, "MCP session opened");
      },
    });
    transport.onclose = () => {
      const sessionId = transport.sessionId;
      if (sessionId && sessions.has(sessionId)) {
        sessions.delete(sessionId);
        server.close().catch((error: unknown) => {
          log.warn({ err: error, sessionId }, "closing MCP server failed");
        });
      }
    };

    await server.connect(transport);
    await transport.handleRequest(req, res, body);
  };

  const route = async (req: IncomingMessage, res: ServerResponse) => {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

    if (url.pathname === HEALTH_PATH) {
      const status = state.service.getStatus();
      sendJson(res, 200, {
        ok: true,
        engine: status.engine,
        corpus: status.corpus,
        conversations: status.sessions.active_sessions,
        mcp_sessions: sessions.size,
        uptime_ms: clock() - state.startedAt,
      });
      return;
    }

    if (url.pathname !== MCP_PATH) {
      throw new HttpError(404, "Not found");
    }

    if (req.method === "POST") {
      const body = await readJsonBody(req);
      const session = lookupSession(req);
      if (session) {
        session.lastSeen = clock();
        await session.transport.handleRequest(req, res, body);
        return;
      }
      await openSession(req, res, body);
      return;
    }

    if (req.method === "GET" || req.method === "DELETE") {
      const session = lookupSession(req);
      if (!session) {
        throw new HttpError(400, "Missing mcp-session-id header");
      }
      await session.transport.handleRequest(req, res);
      return;
    }

    throw new HttpError(405, "Method not allowed");
  };

  const httpServer = createServer((req, res) => {
    route(req, res).catch((error: unknown) => {
      if (error instanceof HttpError) {
        log.debug({ status: error.status, path: req.url }, error.message);
        sendError(res, error);
        return;
      }
      log.error({ err: error, path: req.url }, "request failed");
      sendError(res, new HttpError(500, "Internal server error"));
    });
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(options.port, options.host, () => {
      httpServer.off("error", reject);
      resolve();
    });
  });

  const address = httpServer.address();
  const port = isAddressInfo(address) ? address.port : options.port;

  return {
    url: `http://${options.host}:${port}`,
    port,
    activeSessions: () => sessions.size,
    close: async () => {
      await Promise.all([...sessions.keys()].map(closeSession));
      await new Promise<void>((resolve, reject) => {
        httpServer.close((error) => (error ? reject(error) : resolve()));
        httpServer.closeAllConnections();
      });
    },
  };
}

async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size > MAX_BODY_BYTES) {
      throw new HttpError(413, "Request body too large", -32600);
    }
    chunks.push(buffer);
  }

  const raw = Buffer.concat(chunks).toString("utf-8").trim();
  if (!raw) {
    return {};
  }
  try {
    return JSON.parse(raw);
  } catch {
    throw new HttpError(400, "Invalid JSON body", -32700);
  }
}

function readSessionId(req: IncomingMessage): string | null {
  const header = req.headers["mcp-session-id"];
  const value = Array.isArray(header) ? header[0] : header;
  return value ? value : null;
}

function sendError(res: ServerResponse, error: HttpError) {
  if (res.headersSent) {
    res.end();
    return;
  }
  if (error.rpcCode === undefined) {
    sendJson(res, error.status, { error: error.message });
    return;
  }
  sendJson(res, error.status, {
    jsonrpc: "2.0",
    error: { code: error.rpcCode, message: error.message },
    id: null,
  });
}

function sendJson(res: ServerResponse, status: number, payload: unknown) {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(payload));
}

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
  return typeof address === "object" && address !== null;
}
