import { randomUUID } from "node:crypto"
import type { Server } from "node:http"
import express, { type Request, type Response } from "express"
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js"
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js"
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js"
import logger from "../config/logger"
import { errorMessage } from "./api"

export const MCP_PATH = "/mcp"

export interface HttpService {
  app: express.Express
  // 关闭所有会话的传输层
  closeAll(): Promise<void>
}

/**
 * Streamable HTTP 服务：每个会话一个传输层和一个独立的 MCP 服务器实例。
 */
export function createHttpService(createServer: () => McpServer): HttpService {
  const app = express()
  app.use(express.json())

  const transports = new Map<string, StreamableHTTPServerTransport>()

  const sessionTransport = (req: Request) => {
    const sessionId = req.header("mcp-session-id")
    return sessionId ? transports.get(sessionId) : undefined
  }

  app.post(MCP_PATH, async (req: Request, res: Response) => {
    try {
      let transport = sessionTransport(req)

      if (!transport) {
        if (req.header("mcp-session-id") || !isInitializeRequest(req.body)) {
          res.status(400).json({
            jsonrpc: "2.0",
            error: { code: -32000, message: "Bad Request: No valid session ID provided" },
            id: null,
          })
          return
        }

        const created = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => randomUUID(),
          onsessioninitialized: (sessionId) => {
            logger.info(`Session initialized: ${sessionId}`)
            transports.set(sessionId, created)
          },
        })
        created.onclose = () => {
          if (created.sessionId) {
            logger.info(`Session closed: ${created.sessionId}`)
            transports.delete(created.sessionId)
          }
        }
        await createServer().connect(created)
        transport = created
      }

      await transport.handleRequest(req, res, req.body)
    } catch (error) {
      logger.error(`Error handling MCP request: ${errorMessage(error)}`)
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: "2.0",
          error: { code: -32603, message: "Internal server error" },
          id: null,
        })
      }
    }
  })

  // GET 建立 SSE 通知流，DELETE 结束会话
  const handleSessionRequest = async (req: Request, res: Response) => {
    const transport = sessionTransport(req)
    if (!transport) {
      res.status(400).send("Invalid or missing session ID")
      return
    }
    await transport.handleRequest(req, res)
  }

  app.get(MCP_PATH, handleSessionRequest)
  app.delete(MCP_PATH, handleSessionRequest)

  return {
    app,
    async closeAll() {
      const open = [...transports.values()]
      transports.clear()
      await Promise.all(open.map((transport) => transport.close()))
    },
  }
}

export function listen(app: express.Express, host: string, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, (error?: Error) => {
      if (error) reject(error)
      else resolve(server)
    })
    server.once("error", reject)
  })
}
