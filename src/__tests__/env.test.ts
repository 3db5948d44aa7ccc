import { describe, it, expect } from "vitest"
import { ZodError } from "zod"
import { loadClientConfig, loadServerConfig } from "../config/env"

describe("loadServerConfig", () => {
  it("falls back to defaults", () => {
    expect(loadServerConfig({})).toEqual({
      NWS_API_BASE: "https://api.weather.gov",
      NWS_USER_AGENT: "weather-app/2.0",
      MCP_TRANSPORT: "stdio",
      HOST: "127.0.0.1",
      PORT: 8000,
      LOG_LEVEL: "info",
    })
  })

  it("reads overrides from the environment", () => {
    const config = loadServerConfig({
      NWS_API_BASE: "http://localhost:9999",
      MCP_TRANSPORT: "http",
      PORT: "3001",
      LOG_LEVEL: "debug",
    })

    expect(config.NWS_API_BASE).toBe("http://localhost:9999")
    expect(config.MCP_TRANSPORT).toBe("http")
    expect(config.PORT).toBe(3001)
    expect(config.LOG_LEVEL).toBe("debug")
  })

  it("treats empty values as unset", () => {
    expect(loadServerConfig({ PORT: "", MCP_TRANSPORT: "" })).toMatchObject({ PORT: 8000, MCP_TRANSPORT: "stdio" })
  })

  it("rejects invalid values", () => {
    expect(() => loadServerConfig({ PORT: "eighty" })).toThrow(ZodError)
    expect(() => loadServerConfig({ MCP_TRANSPORT: "websocket" })).toThrow(ZodError)
    expect(() => loadServerConfig({ NWS_API_BASE: "not a url" })).toThrow(ZodError)
  })
})

describe("loadClientConfig", () => {
  it("requires an api key", () => {
    expect(() => loadClientConfig({})).toThrow("OPENAI_API_KEY is required")
  })

  it("defaults the model", () => {
    expect(loadClientConfig({ OPENAI_API_KEY: "test-key" })).toEqual({
      OPENAI_API_KEY: "test-key",
      BASE_URL: undefined,
      MODEL: "Qwen/QwQ-32B",
    })
  })
})
