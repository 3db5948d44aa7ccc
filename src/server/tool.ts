import { z } from "zod" // 用于参数校验的库
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js"
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js"
import { AlertsResponseSchema, ForecastResponseSchema, PointsResponseSchema } from "../types/response"
import logger from "../config/logger"
import { errorMessage, type NWSClient } from "./api"
import { formatAlerts, formatForecast } from "./format"

export const ALERTS_ERROR = "No alerts found or an error occurred."
export const FORECAST_ERROR = "No forecast found or an error occurred."

// 根据州名获取天气警报，失败时只返回固定文案
export async function getAlerts(client: NWSClient, state: string): Promise<string> {
  logger.info(`Received request for weather alerts in state: ${state}`)

  const url = `${client.baseUrl}/alerts/active?area=${state}`
  try {
    const alerts = await client.request(url, AlertsResponseSchema)
    return formatAlerts(alerts.features)
  } catch (error) {
    logger.error(`Failed to fetch alerts: ${errorMessage(error)}`)
    return ALERTS_ERROR
  }
}

// 先查坐标对应的 forecast 网格地址，再请求预报；第一步失败不会发第二个请求
export async function getForecast(client: NWSClient, latitude: string, longitude: string): Promise<string> {
  logger.info(`Received coordinates: latitude = ${latitude}, longitude = ${longitude}`)

  let forecastUrl: string
  try {
    const points = await client.request(`${client.baseUrl}/points/${latitude},${longitude}`, PointsResponseSchema)
    forecastUrl = points.properties.forecast
  } catch (error) {
    logger.error(`Failed to fetch points: ${errorMessage(error)}`)
    return FORECAST_ERROR
  }

  try {
    const forecast = await client.request(forecastUrl, ForecastResponseSchema)
    return formatForecast(forecast.properties.periods)
  } catch (error) {
    logger.error(`Failed to fetch forecast: ${errorMessage(error)}`)
    return FORECAST_ERROR
  }
}

function textResult(text: string): CallToolResult {
  return { content: [{ type: "text", text }] }
}

// 创建 MCP 服务器实例并注册两个工具；HTTP 模式下每个会话各建一个
export function createServer(client: NWSClient): McpServer {
  const server = new McpServer(
    { name: "weather", version: "2.0.0" },
    {
      capabilities: { tools: {} },
      instructions: "A simple weather forecaster",
    },
  )

  server.tool(
    "get_alerts",
    "Get weather alerts for a US state",
    {
      state: z.string().describe("the US state to get alerts for"),
    },
    async ({ state }) => textResult(await getAlerts(client, state)),
  )

  server.tool(
    "get_forecast",
    "Get forecast using latitude and longitude coordinates",
    {
      latitude: z.string().describe("latitude of the location in decimal format"),
      longitude: z.string().describe("longitude of the location in decimal format"),
    },
    async ({ latitude, longitude }) => textResult(await getForecast(client, latitude, longitude)),
  )

  return server
}
