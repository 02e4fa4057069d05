import { failure } from "../core/errors.js";
import { Failure, OperationConfig } from "../core/types.js";

export type RenderResult = { ok: true; prompt: string } | Failure;

export type OperationSummary = {
  id: string;
  title: string;
  description: string;
  category: string;
};

const CUSTOM_OPERATION = "custom";
const TEXT_PLACEHOLDERS = new Set(["text", "selected_text"]);
const PLACEHOLDER = /\$\{([A-Za-z0-9_]+)\}/g;

export function renderPrompt(
  operations: Record<string, OperationConfig>,
  operationId: string,
  text: string,
  params: Record<string, string> = {}
): RenderResult {
  const operation = operationId && Object.hasOwn(operations, operationId) ? operations[operationId] : undefined;
  if (!operation) {
    return failure("UnknownOperation", `Unknown operation: ${operationId || "(empty)"}`);
  }
  if (text.trim().length === 0) {
    return failure("EmptyInput", "Input text is empty");
  }

  if (operationId === CUSTOM_OPERATION && hasValue(params.prompt)) {
    return { ok: true, prompt: `${params.prompt.trim()}\n\n${text}` };
  }

  const missing = findMissingParams(operation, params);
  if (missing.length > 0) {
    return failure(
      "MissingParameter",
      `Missing parameter "${missing[0]}" for operation ${operationId}`
    );
  }

  const hasTextSlot = [...operation.template.matchAll(PLACEHOLDER)].some((match) => TEXT_PLACEHOLDERS.has(match[1]));
  const rendered = operation.template.replace(PLACEHOLDER, (_match, name: string) =>
    TEXT_PLACEHOLDERS.has(name) ? text : params[name]
  );

  return { ok: true, prompt: hasTextSlot ? rendered : `${rendered}\n\n${text}` };
}

export function listOperations(operations: Record<string, OperationConfig>): OperationSummary[] {
  return Object.entries(operations)
    .map(([id, operation]) => ({
      id,
      title: operation.title || id,
      description: operation.description ?? "",
      category: operation.category ?? ""
    }))
    .sort((a, b) => a.title.localeCompare(b.title));
}

function findMissingParams(operation: OperationConfig, params: Record<string, string>): string[] {
  const required = new Set(operation.params ?? []);
  for (const match of operation.template.matchAll(PLACEHOLDER)) {
    if (!TEXT_PLACEHOLDERS.has(match[1])) {
      required.add(match[1]);
    }
  }
  return [...required].filter((name) => !hasValue(params[name]));
}

function hasValue(value: string | undefined): value is string {
  return typeof value === "string" && value.trim().length > 0;
}
