import { z } from "zod"

// NWS 返回的告警数据结构，字段缺失即解析失败
export const AlertFeatureSchema = z.object({
  properties: z.object({
    event: z.string(),
    areaDesc: z.string(),
    severity: z.string(),
    status: z.string(),
    headline: z.string(),
  }),
})

export const AlertsResponseSchema = z.object({
  features: z.array(AlertFeatureSchema),
})

// /points 接口只取 forecast 网格地址
export const PointsResponseSchema = z.object({
  properties: z.object({ forecast: z.string() }),
})

export const ForecastPeriodSchema = z.object({
  name: z.string(),
  temperature: z.number().int(),
  temperatureUnit: z.string(),
  windSpeed: z.string(),
  windDirection: z.string(),
  shortForecast: z.string(),
})

export const ForecastResponseSchema = z.object({
  properties: z.object({ periods: z.array(ForecastPeriodSchema) }),
})

export type AlertFeature = z.infer<typeof AlertFeatureSchema>
export type AlertsResponse = z.infer<typeof AlertsResponseSchema>
export type PointsResponse = z.infer<typeof PointsResponseSchema>
export type ForecastPeriod = z.infer<typeof ForecastPeriodSchema>
export type ForecastResponse = z.infer<typeof ForecastResponseSchema>
