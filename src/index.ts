// 引入 MCP Server 的 stdio 传输模块
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js"
import dotenv from "@dotenvx/dotenvx"
import { loadServerConfig, type ServerConfig } from "./config/env"
import logger, { setLogLevel } from "./config/logger"
import { errorMessage, NWSClient } from "./server/api"
import { createHttpService, listen, MCP_PATH } from "./server/http"
import { createServer } from "./server/tool"

// 加载 .env；quiet 避免 dotenvx 往 stdout 写内容
dotenv.config({ quiet: true })

type Shutdown = () => Promise<void>

async function startStdio(client: NWSClient): Promise<Shutdown> {
  const server = createServer(client)
  await server.connect(new StdioServerTransport())
  logger.info("Weather MCP server running on stdio")
  return () => server.close()
}

async function startHttp(client: NWSClient, config: ServerConfig): Promise<Shutdown> {
  const service = createHttpService(() => createServer(client))
  const httpServer = await listen(service.app, config.HOST, config.PORT)
  logger.info(`Weather MCP server listening on http://${config.HOST}:${config.PORT}${MCP_PATH}`)

  return async () => {
    await service.closeAll()
    httpServer.closeAllConnections()
    await new Promise<void>((resolve, reject) => httpServer.close((error) => (error ? reject(error) : resolve())))
  }
}

async function main() {
  const config = loadServerConfig()
  setLogLevel(config.LOG_LEVEL)

  const client = new NWSClient({ baseUrl: config.NWS_API_BASE, userAgent: config.NWS_USER_AGENT })
  const shutdown = config.MCP_TRANSPORT === "http" ? await startHttp(client, config) : await startStdio(client)

  const onSignal = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, shutting down`)
    shutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error(`Shutdown failed: ${errorMessage(error)}`)
        process.exit(1)
      },
    )
  }
  process.once("SIGINT", onSignal)
  process.once("SIGTERM", onSignal)
}

main().catch((error: unknown) => {
  logger.error(`Failed to start weather MCP server: ${errorMessage(error)}`)
  process.exit(1)
})
