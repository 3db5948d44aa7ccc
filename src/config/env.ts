import { z } from "zod"
import { LOG_LEVELS } from "./logger"

export const DEFAULT_NWS_API_BASE = "https://api.weather.gov"
export const DEFAULT_USER_AGENT = "weather-app/2.0"

// 空字符串视为未设置，走默认值
const optional = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (value === "" ? undefined : value), schema)

const ServerEnvSchema = z.object({
  NWS_API_BASE: optional(z.string().url().default(DEFAULT_NWS_API_BASE)),
  NWS_USER_AGENT: optional(z.string().default(DEFAULT_USER_AGENT)),
  MCP_TRANSPORT: optional(z.enum(["stdio", "http"]).default("stdio")),
  HOST: optional(z.string().default("127.0.0.1")),
  PORT: optional(z.coerce.number().int().min(1).max(65535).default(8000)),
  LOG_LEVEL: optional(z.enum(LOG_LEVELS).default("info")),
})

const ClientEnvSchema = z.object({
  OPENAI_API_KEY: z
    .string({ required_error: "OPENAI_API_KEY is required (set it in .env)" })
    .min(1, "OPENAI_API_KEY is required (set it in .env)"),
  BASE_URL: optional(z.string().url().optional()),
  MODEL: optional(z.string().default("Qwen/QwQ-32B")),
})

export type ServerConfig = z.infer<typeof ServerEnvSchema>
export type ClientConfig = z.infer<typeof ClientEnvSchema>

type Env = Record<string, string | undefined>

export function loadServerConfig(env: Env = process.env): ServerConfig {
  return ServerEnvSchema.parse(env)
}

export function loadClientConfig(env: Env = process.env): ClientConfig {
  return ClientEnvSchema.parse(env)
}
