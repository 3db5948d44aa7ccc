// 引入所需模块
import { Client } from "@modelcontextprotocol/sdk/client/index.js" // MCP 客户端核心类
import { StdioClientTransport } from "@modelcontextprotocol/sdk/client/stdio.js" // 用于通过 stdio 通信的传输层
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js"
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js"
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js"
import readline from "readline/promises" // 用于命令行交互
import { z } from "zod"
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
  ChatCompletionMessageToolCall,
  ChatCompletionTool,
} from "openai/resources/chat/completions" // 聊天消息类型
import logger from "../config/logger"
import { errorMessage } from "../server/api"

export const SYSTEM_PROMPT = "You are a helpful assistant. Use the weather tools when a question needs live weather data."
export const NO_CONTENT = "[no content returned]"
export const NO_TOOL_RESULT = "[tool returned no result]"

// 对话模型调用，生产环境为 openai.chat.completions.create
export type ChatFn = (params: ChatCompletionCreateParamsNonStreaming) => Promise<ChatCompletion>

export interface ToolInfo {
  name: string
  description?: string
  inputSchema: Record<string, unknown>
}

export interface MCPClientOptions {
  chat: ChatFn
  model: string
}

const ToolArgumentsSchema = z.record(z.unknown())

// 根据目标选择传输层：URL 走 Streamable HTTP，脚本路径走 stdio 子进程
export function createTransport(target: string): Transport {
  if (/^https?:\/\//.test(target)) return new StreamableHTTPClientTransport(new URL(target))

  if (target.endsWith(".js")) return new StdioClientTransport({ command: process.execPath, args: [target] })
  if (target.endsWith(".ts")) {
    return new StdioClientTransport({ command: process.execPath, args: ["--import", "tsx", target] })
  }

  throw new Error(`Server target must be an http(s) URL or a .js/.ts script: ${target}`)
}

// MCP + OpenAI 客户端类
export class MCPClient {
  readonly mcp = new Client({ name: "weather-chat-client", version: "1.0.0" })
  tools: ToolInfo[] = []

  constructor(private readonly options: MCPClientOptions) {}

  async connectToServer(target: string): Promise<void> {
    await this.connect(createTransport(target))
  }

  // 连接后获取服务器暴露的工具信息
  async connect(transport: Transport): Promise<void> {
    await this.mcp.connect(transport)

    const { tools } = await this.mcp.listTools()
    this.tools = tools.map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: tool.inputSchema,
    }))

    logger.info(`Connected to server with tools: ${this.tools.map((t) => t.name).join(", ")}`)
  }

  async processQuery(query: string): Promise<string> {
    const messages: ChatCompletionMessageParam[] = [
      { role: "system", content: SYSTEM_PROMPT },
      { role: "user", content: query },
    ]

    const tools = this.tools.map<ChatCompletionTool>((tool) => ({
      type: "function",
      function: {
        name: tool.name,
        description: tool.description,
        parameters: tool.inputSchema,
        strict: false,
      },
    }))

    try {
      // 第一次请求，由模型决定是否调用工具
      const response = await this.options.chat({
        model: this.options.model,
        messages,
        tools,
        tool_choice: "auto",
        max_tokens: 1000,
        temperature: 0.7,
      })

      const message = response.choices[0]?.message
      if (!message?.tool_calls?.length) return message?.content || NO_CONTENT

      messages.push({ role: "assistant", content: null, tool_calls: message.tool_calls })

      try {
        for (const toolCall of message.tool_calls) {
          messages.push({ role: "tool", tool_call_id: toolCall.id, content: await this.runToolCall(toolCall) })
        }
      } catch (error) {
        return `Tool call failed: ${errorMessage(error)}`
      }

      // 带上工具结果再请求一次，得到最终回复
      const finalResponse = await this.options.chat({
        model: this.options.model,
        messages,
        max_tokens: 1000,
      })

      return finalResponse.choices[0]?.message.content || NO_CONTENT
    } catch (error) {
      return `OpenAI request failed: ${errorMessage(error)}`
    }
  }

  // 参数须是 JSON 对象；解析或 MCP 调用失败直接抛出
  private async runToolCall(toolCall: ChatCompletionMessageToolCall): Promise<string> {
    const { name } = toolCall.function
    const args = ToolArgumentsSchema.parse(JSON.parse(toolCall.function.arguments))
    logger.info(`Calling tool ${name} with ${JSON.stringify(args)}`)

    const result = await this.mcp.callTool({ name, arguments: args })
    return toolResultText(result)
  }

  async chatLoop(): Promise<void> {
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
    })

    console.log("MCP client started")
    console.log("Type your question, or 'quit' to exit")

    try {
      while (true) {
        const input = await rl.question("\nQuery: ")
        if (input.trim().toLowerCase() === "quit") break

        const answer = await this.processQuery(input)
        console.log(`\nAnswer:\n${answer}`)
      }
    } finally {
      rl.close()
    }
  }

  async cleanup(): Promise<void> {
    await this.mcp.close()
  }
}

// 只取工具结果中的文本块
export function toolResultText(result: unknown): string {
  const parsed = CallToolResultSchema.safeParse(result)
  if (!parsed.success) return NO_TOOL_RESULT

  const text = parsed.data.content.flatMap((block) => (block.type === "text" ? [block.text] : [])).join("\n")
  return text || NO_TOOL_RESULT
}
