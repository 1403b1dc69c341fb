export const WEATHER_FACTORS = ["pressure", "humidity", "temperature", "wind"] as const;

export type WeatherFactor = (typeof WEATHER_FACTORS)[number];

export type RiskLevel = "low" | "elevated";
