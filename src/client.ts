import dotenv from "@dotenvx/dotenvx"
import { OpenAI } from "openai" // OpenAI 官方 SDK
import { loadClientConfig } from "./config/env"
import logger from "./config/logger"
import { errorMessage } from "./server/api"
import { MCPClient } from "./chat/mcp-client"

// 加载环境变量
dotenv.config({ quiet: true })

// 主函数入口
async function main() {
  const target = process.argv[2]
  if (!target) {
    console.log("Usage: tsx src/client.ts <server_script_path | http://host:port/mcp>")
    return
  }

  const config = loadClientConfig()
  const openai = new OpenAI({ apiKey: config.OPENAI_API_KEY, baseURL: config.BASE_URL })
  const mcpClient = new MCPClient({
    chat: (params) => openai.chat.completions.create(params),
    model: config.MODEL,
  })

  try {
    await mcpClient.connectToServer(target)
    await mcpClient.chatLoop()
  } finally {
    await mcpClient.cleanup()
  }
}

main().then(
  () => process.exit(0),
  (error: unknown) => {
    logger.error(errorMessage(error))
    process.exit(1)
  },
)
