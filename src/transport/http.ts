/**
 * HTTP transport for the document retrieval server.
 *
 * Starts an Express application hosting:
 *  - POST /mcp    : JSON-RPC requests (initialize + subsequent), one MCP
 *                   Server + StreamableHTTPServerTransport per session.
 *  - GET  /mcp    : Streaming / follow-up channel (delegated to transport).
 *  - DELETE /mcp  : Client-requested session teardown.
 *  - POST /documents, DELETE /documents : PDF upload / clear (see documents.ts).
 *  - GET  /health : Status / readiness snapshot.
 *
 * MCP sessions are keyed by the `mcp-session-id` header the SDK hands out
 * on initialize. All sessions share the single active document.
 *
 * Security defaults: DNS rebinding protection is on and allowed hosts are
 * limited to loopback plus the bound host unless ALLOWED_HOSTS says
 * otherwise.
 */
import express from "express";
import { randomUUID } from "node:crypto";
import type { Server as HttpServer } from "node:http";
import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import type { StatusManager } from "../status";
import { createDocumentRouter, type DocumentRoutesOptions } from "./documents";

export interface HttpTransportOptions {
  port: number;
  host: string;
  allowedHosts?: string[];
  enableDnsRebindingProtection: boolean;
  status: StatusManager;
  documents: DocumentRoutesOptions;
}

function sessionIdOf(req: express.Request): string | undefined {
  const h = req.headers["mcp-session-id"];
  return typeof h === "string" ? h : undefined;
}

/**
 * Start the Express app. Resolves with the bound listener; rejects when the
 * port cannot be bound (e.g. EADDRINUSE).
 *
 * @param createServer Called once per MCP session; must return an unconnected server.
 */
export async function startHttpTransport(
  createServer: () => Server,
  opts: HttpTransportOptions,
): Promise<HttpServer> {
  const { port, host } = opts;
  const app = express();
  app.use("/mcp", express.json({ limit: "20mb" }));

  const allowedHosts = opts.allowedHosts ?? [
    ...new Set(["127.0.0.1", `127.0.0.1:${port}`, "localhost", `localhost:${port}`, host, `${host}:${port}`]),
  ];

  /** Open MCP sessions by id. */
  const transports: Record<string, StreamableHTTPServerTransport> = {};

  app.post("/mcp", async (req, res) => {
    try {
      const sessionId = sessionIdOf(req);
      let transport: StreamableHTTPServerTransport | undefined = sessionId
        ? transports[sessionId]
        : undefined;

      // New session: no id header and an initialize request in the body.
      if (!transport && !sessionId && isInitializeRequest(req.body)) {
        const created: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => randomUUID(),
          onsessioninitialized: (sid: string) => {
            transports[sid] = created;
          },
          enableDnsRebindingProtection: opts.enableDnsRebindingProtection,
          allowedHosts,
        });

        const server = createServer();
        let closing = false;
        created.onclose = () => {
          if (closing) return;
          closing = true;
          if (created.sessionId) delete transports[created.sessionId];
          // server.close() closes the transport again; detach first to avoid re-entry.
          created.onclose = undefined;
          server.close().catch((e: unknown) => console.error("[HTTP] Failed to close MCP server:", e));
        };
        await server.connect(created);
        transport = created;
      }

      if (!transport) {
        res.status(400).json({
          jsonrpc: "2.0",
          error: { code: -32000, message: "Bad Request: No valid session ID provided" },
          id: null,
        });
        return;
      }

      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      console.error("[HTTP] MCP POST error:", err);
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: "2.0",
          error: { code: -32603, message: "Internal server error" },
          id: null,
        });
      }
    }
  });

  /** GET / DELETE /mcp are only valid for an existing session. */
  const handleSessionRequest = async (req: express.Request, res: express.Response) => {
    const sessionId = sessionIdOf(req);
    const transport = sessionId ? transports[sessionId] : undefined;
    if (!transport) {
      res.status(400).send("Invalid or missing session ID");
      return;
    }
    await transport.handleRequest(req, res);
  };

  app.get("/mcp", handleSessionRequest);
  app.delete("/mcp", handleSessionRequest);

  app.use(createDocumentRouter(opts.documents));

  app.get("/health", (_req, res) => {
    res.json(opts.status.getStatus());
  });

  return new Promise<HttpServer>((resolve, reject) => {
    const listener = app.listen(port, host, (err?: Error) => {
      if (err) {
        reject(err);
        return;
      }
      console.error(`[HTTP] Listening at http://${host}:${port} (MCP at /mcp)`);
      resolve(listener);
    });
  });
}
