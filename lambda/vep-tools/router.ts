/*
 * Copyright 2025 Amazon.com, Inc. or its affiliates.
 */

import {
  ConfigurationError,
  loadTelemetrySettings,
  loadToolConfig,
  ToolConfig
} from "./config";
import { ToolContext } from "./context";
import {
  describeError,
  fail,
  ResponseEnvelope,
  succeed,
  toEnvelope,
  ToolResult
} from "./envelope";
import { getResults } from "./get-results";
import { invokeEndpoint } from "./invoke-endpoint";
import { AsyncInferenceClient, MetricsSink, ObjectStore } from "./ports";
import { Telemetry } from "./telemetry";
import { isRecord } from "./validators";

export const TOOL_NAMES = ["invoke_endpoint", "get_results"] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

/** Separator the gateway places between a target namespace and the tool name. */
export const TOOL_NAMESPACE_DELIMITER = "___";

/**
 * The subset of the Lambda context the router reads. The gateway passes the
 * tool name in the client context.
 */
export interface ToolInvocationContext {
  readonly clientContext?: {
    readonly custom?: {
      readonly bedrockAgentCoreToolName?: unknown;
    };
  };
}

/** A resolved tool call: which tool, and the payload it receives. */
export interface ToolRequest {
  readonly tool: ToolName;
  readonly payload: unknown;
}

export interface ToolClients {
  readonly store: ObjectStore;
  readonly inference: AsyncInferenceClient;
}

export interface RouterOptions {
  readonly env: NodeJS.ProcessEnv;
  readonly metricsSink: MetricsSink;
  /** Binds storage and inference clients to the loaded configuration. */
  readonly createClients: (config: ToolConfig) => ToolClients;
  readonly generateId: () => string;
  readonly now?: () => Date;
  readonly telemetry?: Telemetry;
}

function isToolName(value: string): value is ToolName {
  return TOOL_NAMES.some((name) => name === value);
}

/**
 * Drops a gateway namespace prefix, e.g. `vep-target___get_results`.
 *
 * @param name - The raw tool name
 * @returns The part after the first delimiter, or the name unchanged
 */
export function stripToolNamespace(name: string): string {
  const index = name.indexOf(TOOL_NAMESPACE_DELIMITER);
  return index === -1
    ? name
    : name.slice(index + TOOL_NAMESPACE_DELIMITER.length);
}

/**
 * Finds the raw tool name for an invocation.
 *
 * An explicit `tool_name` in the event takes precedence over the name the
 * gateway puts in the client context.
 *
 * @param event - The invocation payload
 * @param context - The Lambda context
 * @returns The raw tool name, or undefined when none was supplied
 */
export function extractToolName(
  event: unknown,
  context: ToolInvocationContext | undefined
): string | undefined {
  if (isRecord(event) && typeof event.tool_name === "string") {
    const explicit = event.tool_name.trim();
    if (explicit !== "") {
      return explicit;
    }
  }
  const fromContext = context?.clientContext?.custom?.bedrockAgentCoreToolName;
  if (typeof fromContext === "string" && fromContext.trim() !== "") {
    return fromContext.trim();
  }
  return undefined;
}

/**
 * Resolves an invocation into a {@link ToolRequest}.
 *
 * @param event - The invocation payload
 * @param context - The Lambda context
 * @returns The tool request, or MISSING_TOOL_NAME / UNKNOWN_TOOL
 */
export function resolveToolRequest(
  event: unknown,
  context: ToolInvocationContext | undefined
): ToolResult<ToolRequest> {
  const rawName = extractToolName(event, context);
  if (rawName === undefined) {
    return fail("MISSING_TOOL_NAME", "Tool name not found in context object.", {
      supported_tools: [...TOOL_NAMES]
    });
  }

  const tool = stripToolNamespace(rawName);
  if (tool.trim() === "") {
    return fail("MISSING_TOOL_NAME", "Tool name not found in context object.", {
      supported_tools: [...TOOL_NAMES]
    });
  }
  if (!isToolName(tool)) {
    return fail(
      "UNKNOWN_TOOL",
      `Unknown tool: ${tool}. Supported tools are: ${TOOL_NAMES.join(", ")}`,
      { tool_name: tool, supported_tools: [...TOOL_NAMES] }
    );
  }
  return succeed("Tool resolved", { tool, payload: event });
}

/**
 * Runs exactly one tool handler.
 *
 * @param request - The resolved tool request
 * @param ctx - Configuration and collaborators for this invocation
 * @returns The handler's result
 */
export async function dispatchTool(
  request: ToolRequest,
  ctx: ToolContext
): Promise<ToolResult<unknown>> {
  switch (request.tool) {
    case "invoke_endpoint":
      return invokeEndpoint(request.payload, ctx);
    case "get_results":
      return getResults(request.payload, ctx);
  }
}

/**
 * Handles one gateway invocation end to end.
 *
 * Every path, including unexpected exceptions, returns the response
 * envelope; nothing is thrown past this function.
 *
 * @param event - The invocation payload
 * @param context - The Lambda context
 * @param options - Environment and collaborator factories
 * @returns The response envelope
 */
export async function routeToolInvocation(
  event: unknown,
  context: ToolInvocationContext | undefined,
  options: RouterOptions
): Promise<ResponseEnvelope> {
  const now = options.now ?? (() => new Date());
  const settings = loadTelemetrySettings(options.env);
  const telemetry =
    options.telemetry ??
    new Telemetry({
      sink: options.metricsSink,
      namespace: settings.metricsNamespace,
      functionName: settings.functionName,
      level: settings.logLevel,
      now
    });
  const startedAt = now();

  const resolved = resolveToolRequest(event, context);
  if (!resolved.ok) {
    telemetry.logEvent(
      "tool_resolution_failed",
      { error_code: resolved.code, message: resolved.message },
      "WARN"
    );
    await telemetry.putMetric("InvocationError", 1, "Count", {
      ErrorCode: resolved.code
    });
    return toEnvelope(resolved, now());
  }
  const { tool } = resolved.data;
  telemetry.logEvent("tool_invocation", { tool });

  let result: ToolResult<unknown>;
  try {
    const config = loadToolConfig(options.env);
    const clients = options.createClients(config);
    result = await dispatchTool(resolved.data, {
      config,
      store: clients.store,
      inference: clients.inference,
      telemetry,
      generateId: options.generateId,
      now
    });
  } catch (error) {
    if (error instanceof ConfigurationError) {
      result = fail("CONFIGURATION_ERROR", error.message, {
        missing_variables: error.missing
      });
    } else {
      telemetry.logEvent(
        "handler_exception",
        {
          tool,
          error: describeError(error),
          stack: error instanceof Error ? error.stack : undefined
        },
        "ERROR"
      );
      result = fail(
        "HANDLER_ERROR",
        `Unexpected error occurred: ${describeError(error)}`,
        { tool_name: tool }
      );
    }
  }

  const finishedAt = now();
  await telemetry.putMetric(
    result.ok ? "InvocationSuccess" : "InvocationError",
    1,
    "Count",
    { Tool: tool }
  );
  await telemetry.putMetric(
    "Duration",
    finishedAt.getTime() - startedAt.getTime(),
    "Milliseconds",
    { Tool: tool }
  );
  if (!result.ok) {
    telemetry.logEvent(
      "tool_failed",
      { tool, error_code: result.code, message: result.message },
      "WARN"
    );
  }
  return toEnvelope(result, finishedAt);
}
