/*
 * Copyright 2025 Amazon.com, Inc. or its affiliates.
 */

/**
 * Unit tests for tool name resolution and end-to-end routing.
 */

import {
  extractToolName,
  resolveToolRequest,
  routeToolInvocation,
  RouterOptions,
  stripToolNamespace,
  ToolInvocationContext
} from "../../lambda/vep-tools/router";
import { createTestHarness, FIXED_NOW, TestHarness } from "./fakes";

const TEST_ENV = {
  SAGEMAKER_ENDPOINT_NAME: "test-endpoint",
  S3_BUCKET_NAME: "test-bucket",
  AWS_LAMBDA_FUNCTION_NAME: "vep-tools-test"
};

function gatewayContext(toolName: string): ToolInvocationContext {
  return { clientContext: { custom: { bedrockAgentCoreToolName: toolName } } };
}

function routerOptions(
  harness: TestHarness,
  env: NodeJS.ProcessEnv = TEST_ENV
): RouterOptions {
  return {
    env,
    metricsSink: harness.sink,
    telemetry: harness.telemetry,
    generateId: harness.ctx.generateId,
    now: () => FIXED_NOW,
    createClients: () => ({
      store: harness.store,
      inference: harness.inference
    })
  };
}

describe("stripToolNamespace", () => {
  test("keeps the part after the first delimiter", () => {
    expect(stripToolNamespace("vep-target___get_results")).toBe("get_results");
    expect(stripToolNamespace("a___b___c")).toBe("b___c");
  });

  test("leaves an unprefixed name unchanged", () => {
    expect(stripToolNamespace("invoke_endpoint")).toBe("invoke_endpoint");
  });
});

describe("extractToolName", () => {
  test("reads the gateway client context", () => {
    expect(extractToolName({}, gatewayContext("t___get_results"))).toBe(
      "t___get_results"
    );
  });

  test("prefers an explicit tool_name in the event", () => {
    expect(
      extractToolName(
        { tool_name: "invoke_endpoint" },
        gatewayContext("t___get_results")
      )
    ).toBe("invoke_endpoint");
  });

  test("returns undefined when no name is available", () => {
    expect(extractToolName({}, undefined)).toBeUndefined();
    expect(extractToolName({}, gatewayContext("   "))).toBeUndefined();
    expect(extractToolName("not an object", {})).toBeUndefined();
  });
});

describe("resolveToolRequest", () => {
  test("resolves a prefixed gateway name to a tool request", () => {
    const event = { output_id: "abc-123" };
    expect(
      resolveToolRequest(event, gatewayContext("vep-target___get_results"))
    ).toEqual({
      ok: true,
      message: "Tool resolved",
      data: { tool: "get_results", payload: event }
    });
  });

  test("reports a name that is only a namespace as missing", () => {
    expect(resolveToolRequest({}, gatewayContext("vep-target___"))).toEqual({
      ok: false,
      code: "MISSING_TOOL_NAME",
      message: "Tool name not found in context object.",
      details: { supported_tools: ["invoke_endpoint", "get_results"] }
    });
  });

  test("reports an unknown tool with the supported names", () => {
    const result = resolveToolRequest({}, gatewayContext("t___delete_all"));
    expect(result).toEqual({
      ok: false,
      code: "UNKNOWN_TOOL",
      message:
        "Unknown tool: delete_all. Supported tools are: invoke_endpoint, get_results",
      details: {
        tool_name: "delete_all",
        supported_tools: ["invoke_endpoint", "get_results"]
      }
    });
  });
});

describe("routeToolInvocation", () => {
  let harness: TestHarness;

  beforeEach(() => {
    harness = createTestHarness();
  });

  test("dispatches invoke_endpoint and wraps the result", async () => {
    const envelope = await routeToolInvocation(
      { sequence: "MKTVRQERLK" },
      gatewayContext("vep-target___invoke_endpoint"),
      routerOptions(harness)
    );

    expect(envelope.success).toBe(true);
    expect(Object.keys(envelope).sort()).toEqual([
      "data",
      "message",
      "success",
      "timestamp"
    ]);
    if (envelope.success) {
      expect(envelope.data).toEqual(
        expect.objectContaining({ sequence_length: 10, output_id: "result-job-0001" })
      );
    }
    expect(envelope.timestamp).toBe("2025-01-15T12:00:00.000Z");
    expect(harness.inference.submissions).toHaveLength(1);
    expect(harness.store.headCalls).toHaveLength(0);
  });

  test("dispatches get_results without submitting anything", async () => {
    const envelope = await routeToolInvocation(
      { output_id: "abc-123", tool_name: "get_results" },
      undefined,
      routerOptions(harness)
    );

    expect(envelope.success).toBe(true);
    if (envelope.success) {
      expect(envelope.data).toEqual(
        expect.objectContaining({ status: "in_progress", check_interval_seconds: 30 })
      );
    }
    expect(harness.inference.submissions).toHaveLength(0);
    expect(harness.store.objects.size).toBe(0);
  });

  test("returns MISSING_TOOL_NAME without calling any handler", async () => {
    const envelope = await routeToolInvocation(
      { sequence: "MKT" },
      {},
      routerOptions(harness)
    );

    expect(envelope).toEqual({
      success: false,
      message: "Tool name not found in context object.",
      error_code: "MISSING_TOOL_NAME",
      details: { supported_tools: ["invoke_endpoint", "get_results"] },
      timestamp: "2025-01-15T12:00:00.000Z"
    });
    expect(harness.inference.submissions).toHaveLength(0);
    expect(harness.store.headCalls).toHaveLength(0);
  });

  test("returns UNKNOWN_TOOL without calling any handler", async () => {
    const envelope = await routeToolInvocation(
      { sequence: "MKT" },
      gatewayContext("vep-target___delete_everything"),
      routerOptions(harness)
    );

    expect(envelope.success).toBe(false);
    if (!envelope.success) {
      expect(envelope.error_code).toBe("UNKNOWN_TOOL");
      expect(envelope.message).toBe(
        "Unknown tool: delete_everything. Supported tools are: invoke_endpoint, get_results"
      );
    }
    expect(harness.inference.submissions).toHaveLength(0);
    expect(harness.store.headCalls).toHaveLength(0);
  });

  test("surfaces handler failures in the uniform envelope", async () => {
    const envelope = await routeToolInvocation(
      { sequence: "MKTVRQERLKXBZ" },
      gatewayContext("invoke_endpoint"),
      routerOptions(harness)
    );

    expect(Object.keys(envelope).sort()).toEqual([
      "details",
      "error_code",
      "message",
      "success",
      "timestamp"
    ]);
    if (!envelope.success) {
      expect(envelope.error_code).toBe("VALIDATION_ERROR");
      expect(envelope.details.invalid_characters).toEqual(["B", "X", "Z"]);
    }
  });

  test("reports missing environment configuration", async () => {
    const envelope = await routeToolInvocation(
      { sequence: "MKT" },
      gatewayContext("invoke_endpoint"),
      routerOptions(harness, { S3_BUCKET_NAME: "test-bucket" })
    );

    expect(envelope).toEqual({
      success: false,
      message: "Missing required environment variables: SAGEMAKER_ENDPOINT_NAME",
      error_code: "CONFIGURATION_ERROR",
      details: { missing_variables: ["SAGEMAKER_ENDPOINT_NAME"] },
      timestamp: "2025-01-15T12:00:00.000Z"
    });
  });

  test("converts unexpected exceptions into HANDLER_ERROR", async () => {
    harness.store.headErrors.set(
      "async-inference-output/abc-123.out",
      new Error("kaboom")
    );

    const envelope = await routeToolInvocation(
      { output_id: "abc-123" },
      gatewayContext("vep-target___get_results"),
      routerOptions(harness)
    );

    expect(envelope).toEqual({
      success: false,
      message: "Unexpected error occurred: kaboom",
      error_code: "HANDLER_ERROR",
      details: { tool_name: "get_results" },
      timestamp: "2025-01-15T12:00:00.000Z"
    });
    expect(harness.logs.some((entry) => entry.level === "ERROR")).toBe(true);
  });

  test("publishes invocation metrics dimensioned by tool", async () => {
    await routeToolInvocation(
      { output_id: "abc-123" },
      gatewayContext("get_results"),
      routerOptions(harness)
    );

    const invocation = harness.sink.published.find(
      (entry) => entry.datum.name === "InvocationSuccess"
    );
    expect(invocation?.namespace).toBe("Test/Namespace");
    expect(invocation?.datum.dimensions).toEqual({
      FunctionName: "vep-tools-test",
      Tool: "get_results"
    });
    expect(harness.sink.names()).toEqual([
      "ResultsInProgress",
      "InvocationSuccess",
      "Duration"
    ]);
  });
});
