export { formatDailyInsight, DEFAULT_DAILY_MESSAGE } from "./daily/formatDailyInsight.js";
export type { DailyInsightOptions } from "./daily/formatDailyInsight.js";
export { formatWeeklyInsight, DEFAULT_WEEKLY_SUMMARY } from "./weekly/formatWeeklyInsight.js";
export type { FormattedWeeklyInsight, WeekdayEntry, WeeklyInsightOptions } from "./weekly/formatWeeklyInsight.js";
export { formatDayDetail, LOW_FLARE_RISK } from "./weekly/formatDayDetail.js";
export { nextSevenWeekdays } from "./weekly/nextSevenWeekdays.js";
export type { WeekdayAbbreviation } from "./weekly/nextSevenWeekdays.js";

export { sanitizeInsightText } from "./text/sanitizeInsightText.js";
export { filterAppReference } from "./text/filterAppReference.js";
export { repairBrokenTemplate } from "./text/repairBrokenTemplate.js";
export { removeSourceCitations } from "./text/removeSourceCitations.js";
export { classifyWeatherFactor } from "./classification/classifyWeatherFactor.js";
export { classifyRisk } from "./classification/classifyRisk.js";
export type { RiskLevel, WeatherFactor } from "./classification/types.js";
export { areSimilar } from "./similarity/areSimilar.js";
export { containsVagueLanguage, rewriteVague } from "./vague/vagueLanguage.js";
export { generateDistinctWhy } from "./vague/generateDistinctWhy.js";

export { parseDailyPayload, parseWeeklyPayload } from "./payload/parseInsightPayload.js";
export type { DailyPayload, WeeklyPayload } from "./payload/parseInsightPayload.js";

export { DEFAULT_PIPELINE_CONFIG, loadPipelineConfig } from "./config/pipelineConfig.js";
export type { PipelineConfig } from "./config/pipelineConfig.js";
export { InvalidPipelineConfigError, PayloadFileError } from "./config/errors.js";
export { defaultRandomSource, seededRandomSource } from "./random/randomSource.js";
export type { RandomSource } from "./random/randomSource.js";
export { insightLog, silentInsightLogger, createCollectingLogger } from "../logging/insightLog.js";
export type { InsightLogData, InsightLogEvent, InsightLogger } from "../logging/insightLog.js";
