import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { JsonValue } from "./core/types.js";
import { InvocationEngine } from "./engine/engine.js";
import { listEnabledProviders } from "./providers/registry.js";
import { testProvider, testProviders } from "./providers/health.js";

export type ToolResponse = {
  content: { type: "text"; text: string }[];
  isError?: boolean;
};

export type ToolDefinition = {
  name: string;
  description: string;
  inputSchema: {
    type: "object";
    properties: Record<string, JsonValue>;
    required?: string[];
  };
};

type PerformOperationRequest = {
  operation: string;
  text: string;
  params: Record<string, string>;
  provider?: string;
};

type CallProviderRequest = {
  prompt: string;
  provider: string;
};

type TestProviderRequest = {
  provider?: string;
};

type Validation<T> = { ok: true; value: T } | { ok: false; errors: string[] };

export function toolDefinitions(engine: InvocationEngine): ToolDefinition[] {
  const config = engine.configuration;
  const providers = listEnabledProviders(config).map((provider) => provider.id);
  const operations = engine.listOperations().map((operation) => operation.id);
  const providerProperty: Record<string, JsonValue> = { type: "string" };
  if (providers.length > 0) {
    providerProperty.enum = providers;
  }

  return [
    {
      name: "perform_operation",
      description: [
        "Run a text operation (improve, translate, summarize, custom, ...) through a local LLM CLI.",
        "Falls back to the next enabled provider when one fails.",
        `Default provider: ${config.llm.defaultProvider ?? "(none)"}.`
      ].join(" "),
      inputSchema: {
        type: "object",
        properties: {
          operation: { type: "string", enum: operations },
          text: { type: "string" },
          params: { type: "object", additionalProperties: { type: "string" } },
          provider: providerProperty
        },
        required: ["operation", "text"]
      }
    },
    {
      name: "call_provider",
      description: "Send a prompt verbatim to a provider (default provider when omitted), with fallback.",
      inputSchema: {
        type: "object",
        properties: {
          prompt: { type: "string" },
          provider: providerProperty
        },
        required: ["prompt"]
      }
    },
    {
      name: "test_provider",
      description: "Check that a provider answers a minimal prompt. Tests every enabled provider when omitted.",
      inputSchema: {
        type: "object",
        properties: {
          provider: providerProperty
        }
      }
    },
    {
      name: "list_operations",
      description: "List the configured text operations.",
      inputSchema: { type: "object", properties: {} }
    }
  ];
}

export async function handleToolCall(engine: InvocationEngine, name: string, args: unknown): Promise<ToolResponse> {
  if (name === "perform_operation") {
    const request = expectValid(validatePerformOperation(args));
    const outcome = await engine.performOperation(request.operation, request.text, request.params, {
      provider: request.provider
    });
    return jsonResponse(outcome, !outcome.success);
  }

  if (name === "call_provider") {
    const request = expectValid(validateCallProvider(args));
    const outcome = await engine.call(request.provider, request.prompt);
    return jsonResponse(outcome, !outcome.success);
  }

  if (name === "test_provider") {
    const request = expectValid(validateTestProvider(args));
    if (request.provider !== undefined) {
      const outcome = await testProvider(engine, request.provider);
      return jsonResponse(outcome, !outcome.success);
    }
    const statuses = await testProviders(engine, engine.configuration);
    return jsonResponse({ providers: statuses }, false);
  }

  if (name === "list_operations") {
    return jsonResponse({ operations: engine.listOperations() }, false);
  }

  throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
}

function jsonResponse(payload: object, isError: boolean): ToolResponse {
  const response: ToolResponse = {
    content: [{ type: "text", text: JSON.stringify(payload, null, 2) }]
  };
  if (isError) {
    response.isError = true;
  }
  return response;
}

function expectValid<T>(validation: Validation<T>): T {
  if (!validation.ok) {
    throw new McpError(ErrorCode.InvalidParams, `Invalid tool arguments: ${validation.errors.join(", ")}`);
  }
  return validation.value;
}

function validatePerformOperation(value: unknown): Validation<PerformOperationRequest> {
  if (!isRecord(value)) {
    return { ok: false, errors: ["arguments must be an object"] };
  }

  const errors: string[] = [];
  if (typeof value.operation !== "string") {
    errors.push("operation must be a string");
  }
  if (typeof value.text !== "string") {
    errors.push("text must be a string");
  }
  if (value.params !== undefined && !isStringMap(value.params)) {
    errors.push("params must be an object of string values");
  }
  if (value.provider !== undefined && typeof value.provider !== "string") {
    errors.push("provider must be a string");
  }
  if (errors.length > 0 || typeof value.operation !== "string" || typeof value.text !== "string") {
    return { ok: false, errors };
  }

  const request: PerformOperationRequest = {
    operation: value.operation,
    text: value.text,
    params: isStringMap(value.params) ? value.params : {}
  };
  if (typeof value.provider === "string") {
    request.provider = value.provider;
  }
  return { ok: true, value: request };
}

function validateCallProvider(value: unknown): Validation<CallProviderRequest> {
  if (!isRecord(value)) {
    return { ok: false, errors: ["arguments must be an object"] };
  }

  const errors: string[] = [];
  if (typeof value.prompt !== "string") {
    errors.push("prompt must be a string");
  }
  if (value.provider !== undefined && typeof value.provider !== "string") {
    errors.push("provider must be a string");
  }
  if (errors.length > 0 || typeof value.prompt !== "string") {
    return { ok: false, errors };
  }

  return {
    ok: true,
    value: { prompt: value.prompt, provider: typeof value.provider === "string" ? value.provider : "" }
  };
}

function validateTestProvider(value: unknown): Validation<TestProviderRequest> {
  if (value === undefined) {
    return { ok: true, value: {} };
  }
  if (!isRecord(value)) {
    return { ok: false, errors: ["arguments must be an object"] };
  }
  if (value.provider !== undefined && typeof value.provider !== "string") {
    return { ok: false, errors: ["provider must be a string"] };
  }
  return { ok: true, value: typeof value.provider === "string" ? { provider: value.provider } : {} };
}

function isStringMap(value: unknown): value is Record<string, string> {
  if (!isRecord(value)) {
    return false;
  }
  return Object.values(value).every((entry) => typeof entry === "string");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}
