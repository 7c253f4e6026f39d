/*
 * Copyright 2025 Amazon.com, Inc. or its affiliates.
 */

import { describeError } from "./envelope";
import { MetricsSink, MetricUnit } from "./ports";

export const LOG_LEVELS = ["DEBUG", "INFO", "WARN", "ERROR"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40
};

/** Writes one formatted log line. */
export type LogWriter = (level: LogLevel, line: string) => void;

const consoleWriter: LogWriter = (level, line) => {
  switch (level) {
    case "DEBUG":
      console.debug(line);
      break;
    case "INFO":
      console.info(line);
      break;
    case "WARN":
      console.warn(line);
      break;
    case "ERROR":
      console.error(line);
      break;
  }
};

/**
 * Parses a LOG_LEVEL value. Unknown values fall back to INFO.
 *
 * @param value - The raw level, case-insensitive; "WARNING" is accepted
 * @returns The log level
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = (value ?? "").trim().toUpperCase();
  const candidate = normalized === "WARNING" ? "WARN" : normalized;
  return LOG_LEVELS.find((level) => level === candidate) ?? "INFO";
}

export interface TelemetryOptions {
  readonly sink: MetricsSink;
  readonly namespace: string;
  readonly functionName: string;
  readonly level?: LogLevel;
  readonly writer?: LogWriter;
  readonly now?: () => Date;
}

/**
 * Structured logging and metric publishing for the tool function.
 *
 * Log lines are single JSON objects so they can be queried with CloudWatch
 * Logs Insights. Metric publishing never throws; failures are logged as
 * warnings.
 */
export class Telemetry {
  private readonly level: LogLevel;
  private readonly writer: LogWriter;
  private readonly now: () => Date;

  constructor(private readonly options: TelemetryOptions) {
    this.level = options.level ?? "INFO";
    this.writer = options.writer ?? consoleWriter;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Writes a structured log line if the level is enabled.
   *
   * @param eventType - Short identifier of what happened
   * @param data - Event payload
   * @param level - Severity of the event
   */
  logEvent(
    eventType: string,
    data: Record<string, unknown>,
    level: LogLevel = "INFO"
  ): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.level]) {
      return;
    }
    this.writer(
      level,
      JSON.stringify({
        timestamp: this.now().toISOString(),
        level,
        function_name: this.options.functionName,
        event_type: eventType,
        data
      })
    );
  }

  /**
   * Publishes a single metric dimensioned by function name.
   *
   * @param name - The metric name
   * @param value - The metric value
   * @param unit - The CloudWatch unit
   * @param dimensions - Dimensions added next to FunctionName
   */
  async putMetric(
    name: string,
    value: number,
    unit: MetricUnit = "Count",
    dimensions: Record<string, string> = {}
  ): Promise<void> {
    try {
      await this.options.sink.publish(this.options.namespace, [
        {
          name,
          value,
          unit,
          dimensions: { FunctionName: this.options.functionName, ...dimensions },
          timestamp: this.now()
        }
      ]);
    } catch (error) {
      this.logEvent(
        "metric_publish_failed",
        { metric: name, error: describeError(error) },
        "WARN"
      );
    }
  }
}
