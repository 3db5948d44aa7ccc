import type { AlertFeature, ForecastPeriod } from "../types/response"

export const NO_ACTIVE_ALERTS = "No active alerts found."
export const NO_FORECAST_DATA = "No forecast data available."

// 每条数据一个文本块，以 "---" 行结尾，按输入顺序拼接
function block(lines: string[]): string {
  return [...lines, "---", ""].join("\n")
}

export function formatAlerts(features: AlertFeature[]): string {
  if (features.length === 0) return NO_ACTIVE_ALERTS

  return features
    .map(({ properties: props }) =>
      block([
        `Event: ${props.event}`,
        `Area: ${props.areaDesc}`,
        `Severity: ${props.severity}`,
        `Status: ${props.status}`,
        `Headline: ${props.headline}`,
      ]),
    )
    .join("")
}

export function formatForecast(periods: ForecastPeriod[]): string {
  if (periods.length === 0) return NO_FORECAST_DATA

  return periods
    .map((period) =>
      block([
        `Name: ${period.name}`,
        `Temperature: ${period.temperature}°${period.temperatureUnit}`,
        `Wind: ${period.windSpeed} ${period.windDirection}`,
        `Forecast: ${period.shortForecast}`,
      ]),
    )
    .join("")
}
