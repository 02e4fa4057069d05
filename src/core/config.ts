import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { Config, OperationConfig, ProviderConfig } from "./types.js";

// Sources run from src/core, builds from dist/src/core.
function getPackageVersion(): string {
  const dir = path.dirname(fileURLToPath(import.meta.url));
  for (const candidate of [path.resolve(dir, "..", ".."), path.resolve(dir, "..", "..", "..")]) {
    try {
      const raw = fs.readFileSync(path.join(candidate, "package.json"), "utf-8");
      const parsed: unknown = JSON.parse(raw);
      if (isRecord(parsed) && typeof parsed.version === "string") {
        return parsed.version;
      }
    } catch {
      continue;
    }
  }
  return "0.0.0";
}

const TEXT_PREFIXES = {
  translation: ["Here's the translation", "Here is the translation", "The translation is", "Translation"],
  summary: ["Here's a summary", "Here is a summary", "Summary"],
  grammar: ["Here's the corrected text", "Here is the corrected version", "The corrected text is", "Corrected text"]
};

const DEFAULT_OPERATIONS: Record<string, OperationConfig> = {
  improve: {
    title: "Improve Writing",
    description: "Enhance grammar, clarity, and style",
    category: "writing",
    template:
      "Please improve the writing of the following text, making it clearer, more concise, and better structured:\n\n${text}"
  },
  fix_grammar: {
    title: "Fix Grammar",
    description: "Fix grammar and spelling errors",
    category: "writing",
    template: "Please fix any grammar and spelling errors in the following text:\n\n${text}",
    stripPrefixes: TEXT_PREFIXES.grammar
  },
  continue: {
    title: "Continue Writing",
    description: "Extend and continue the text",
    category: "writing",
    template: "Please continue writing from where this text left off, maintaining the same style and tone:\n\n${text}"
  },
  translate: {
    title: "Translate",
    description: "Translate text to a target language",
    category: "translation",
    template: "Please provide only one of the most precise ${language} translation of the following text:\n\n${text}",
    params: ["language"],
    stripPrefixes: TEXT_PREFIXES.translation
  },
  translate_en: {
    title: "Translate to English",
    description: "Translate text to English",
    category: "translation",
    template: "Please provide only one of the most precise English translation of the following text:\n\n${text}",
    stripPrefixes: TEXT_PREFIXES.translation
  },
  translate_zh: {
    title: "Translate to Chinese",
    description: "Translate text to Chinese",
    category: "translation",
    template: "Please provide only one of the most precise Chinese translation of the following text:\n\n${text}",
    stripPrefixes: TEXT_PREFIXES.translation
  },
  summarize: {
    title: "Summarize",
    description: "Create a concise summary",
    category: "analysis",
    template: "Please provide a concise summary of the following text:\n\n${text}",
    stripPrefixes: TEXT_PREFIXES.summary
  },
  explain: {
    title: "Explain",
    description: "Explain the content clearly",
    category: "analysis",
    template: "Please explain the following text in simple, clear terms:\n\n${text}"
  },
  tone: {
    title: "Change Tone",
    description: "Rewrite text in a given tone",
    category: "writing",
    template: "Please rewrite the following text in a ${tone} tone:\n\n${text}",
    params: ["tone"]
  },
  tone_professional: {
    title: "Make Professional",
    description: "Change tone to professional",
    category: "writing",
    template: "Please rewrite the following text in a professional tone:\n\n${text}"
  },
  tone_casual: {
    title: "Make Casual",
    description: "Change tone to casual/friendly",
    category: "writing",
    template: "Please rewrite the following text in a casual, friendly tone:\n\n${text}"
  },
  custom: {
    title: "Custom Prompt",
    description: "Run your own instruction on the text",
    category: "custom",
    template: "Please help with the following text:"
  }
};

const DEFAULT_CONFIG: Config = {
  server: {
    name: "textops-relay",
    version: getPackageVersion()
  },
  llm: {
    defaultProvider: "gemini",
    fallbackProvider: "claude",
    timeoutSeconds: 30,
    maxPromptChars: 32000
  },
  environment: {
    paths: ["~/.local/bin", "/opt/homebrew/bin", "/usr/local/bin"]
  },
  providers: {
    gemini: {
      binary: "gemini",
      args: [],
      model: "gemini-2.5-flash",
      modelFlag: "-m",
      inputFlag: "-p",
      enabled: true,
      priority: 1
    },
    claude: {
      binary: "claude",
      args: [],
      inputFlag: "-p",
      enabled: true,
      priority: 2
    }
  },
  operations: DEFAULT_OPERATIONS,
  audit: {
    enabled: false,
    dir: ".textops/audit"
  },
  logs: {
    enabled: true,
    dir: ".textops/logs"
  }
};

export function defaultConfig(): Config {
  return mergeConfig(DEFAULT_CONFIG, {});
}

export function loadConfig(configPath?: string): Config {
  const { resolvedPath, explicit } = resolveConfigPath(configPath);

  if (!fs.existsSync(resolvedPath)) {
    if (explicit) {
      throw new Error(`Config file not found: ${resolvedPath}`);
    }
    return defaultConfig();
  }

  const raw = fs.readFileSync(resolvedPath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid JSON in config: ${message}`);
  }

  if (!isRecord(parsed)) {
    throw new Error("Invalid config: root must be an object.");
  }

  const errors = validateOverrides(
    parsed,
    new Set(Object.keys(DEFAULT_CONFIG.providers)),
    new Set(Object.keys(DEFAULT_CONFIG.operations))
  );
  if (errors.length > 0) {
    throw new Error(`Invalid config:\n${errors.map((entry) => `- ${entry}`).join("\n")}`);
  }

  const merged = mergeConfig(DEFAULT_CONFIG, parsed as Partial<Config>);
  const mergedErrors = validateMerged(merged);
  if (mergedErrors.length > 0) {
    throw new Error(`Invalid config:\n${mergedErrors.map((entry) => `- ${entry}`).join("\n")}`);
  }
  return merged;
}

function resolveConfigPath(configPath?: string): { resolvedPath: string; explicit: boolean } {
  if (configPath && configPath.trim().length > 0) {
    return { resolvedPath: path.resolve(configPath), explicit: true };
  }
  const envPath = process.env.TEXTOPS_CONFIG;
  if (envPath && envPath.trim().length > 0) {
    return { resolvedPath: path.resolve(envPath), explicit: true };
  }
  return { resolvedPath: path.resolve(process.cwd(), "textops.config.json"), explicit: false };
}

function mergeConfig(base: Config, overrides: Partial<Config>): Config {
  const mergedProviders: Record<string, ProviderConfig> = {};
  for (const [id, provider] of Object.entries(base.providers)) {
    mergedProviders[id] = { ...provider, args: [...provider.args] };
  }
  if (overrides.providers) {
    for (const [id, override] of Object.entries(overrides.providers)) {
      const baseProvider = base.providers[id];
      mergedProviders[id] = { ...(baseProvider ?? {}), ...override };
    }
  }

  const mergedOperations: Record<string, OperationConfig> = { ...base.operations };
  if (overrides.operations) {
    for (const [id, override] of Object.entries(overrides.operations)) {
      const baseOperation = base.operations[id];
      mergedOperations[id] = { ...(baseOperation ?? {}), ...override };
    }
  }

  return {
    server: { ...base.server, ...overrides.server },
    llm: { ...base.llm, ...overrides.llm },
    environment: { paths: [...(overrides.environment?.paths ?? base.environment.paths)] },
    providers: mergedProviders,
    operations: mergedOperations,
    audit: { ...base.audit, ...overrides.audit },
    logs: { ...base.logs, ...overrides.logs }
  };
}

function validateOverrides(
  value: Record<string, unknown>,
  baseProviders: Set<string>,
  baseOperations: Set<string>
): string[] {
  const errors: string[] = [];

  if ("server" in value) {
    const server = value.server;
    if (!isRecord(server)) {
      errors.push("server must be an object");
    } else {
      if ("name" in server && typeof server.name !== "string") {
        errors.push("server.name must be a string");
      }
      if ("version" in server && typeof server.version !== "string") {
        errors.push("server.version must be a string");
      }
    }
  }

  if ("llm" in value) {
    const llm = value.llm;
    if (!isRecord(llm)) {
      errors.push("llm must be an object");
    } else {
      if ("defaultProvider" in llm && typeof llm.defaultProvider !== "string") {
        errors.push("llm.defaultProvider must be a string");
      }
      if ("fallbackProvider" in llm && typeof llm.fallbackProvider !== "string") {
        errors.push("llm.fallbackProvider must be a string");
      }
      if ("timeoutSeconds" in llm && !isPositiveNumber(llm.timeoutSeconds)) {
        errors.push("llm.timeoutSeconds must be a positive number");
      }
      if ("maxProviders" in llm && !isPositiveNumber(llm.maxProviders)) {
        errors.push("llm.maxProviders must be a positive number");
      }
      if ("maxPromptChars" in llm && !isPositiveNumber(llm.maxPromptChars)) {
        errors.push("llm.maxPromptChars must be a positive number");
      }
    }
  }

  if ("environment" in value) {
    const environment = value.environment;
    if (!isRecord(environment)) {
      errors.push("environment must be an object");
    } else if ("paths" in environment && !isStringArray(environment.paths)) {
      errors.push("environment.paths must be an array of strings");
    }
  }

  for (const section of ["audit", "logs"] as const) {
    if (!(section in value)) {
      continue;
    }
    const entry = value[section];
    if (!isRecord(entry)) {
      errors.push(`${section} must be an object`);
      continue;
    }
    if ("enabled" in entry && typeof entry.enabled !== "boolean") {
      errors.push(`${section}.enabled must be a boolean`);
    }
    if ("dir" in entry && typeof entry.dir !== "string") {
      errors.push(`${section}.dir must be a string`);
    }
  }

  if ("providers" in value) {
    const providers = value.providers;
    if (!isRecord(providers)) {
      errors.push("providers must be an object");
    } else {
      for (const [id, provider] of Object.entries(providers)) {
        const providerPath = `providers.${id}`;
        if (!isRecord(provider)) {
          errors.push(`${providerPath} must be an object`);
          continue;
        }
        validateProvider(provider, providerPath, !baseProviders.has(id), errors);
      }
    }
  }

  if ("operations" in value) {
    const operations = value.operations;
    if (!isRecord(operations)) {
      errors.push("operations must be an object");
    } else {
      for (const [id, operation] of Object.entries(operations)) {
        const operationPath = `operations.${id}`;
        if (!isRecord(operation)) {
          errors.push(`${operationPath} must be an object`);
          continue;
        }
        validateOperation(operation, operationPath, !baseOperations.has(id), errors);
      }
    }
  }

  return errors;
}

function validateProvider(
  provider: Record<string, unknown>,
  providerPath: string,
  requiresAll: boolean,
  errors: string[]
): void {
  if (requiresAll) {
    if (typeof provider.binary !== "string") {
      errors.push(`${providerPath}.binary must be a string`);
    }
    if (!isStringArray(provider.args)) {
      errors.push(`${providerPath}.args must be an array of strings`);
    }
    if (typeof provider.priority !== "number") {
      errors.push(`${providerPath}.priority must be a number`);
    }
    if (typeof provider.enabled !== "boolean") {
      errors.push(`${providerPath}.enabled must be a boolean`);
    }
  }

  if ("binary" in provider && typeof provider.binary !== "string") {
    errors.push(`${providerPath}.binary must be a string`);
  }
  if ("args" in provider && !isStringArray(provider.args)) {
    errors.push(`${providerPath}.args must be an array of strings`);
  }
  if ("enabled" in provider && typeof provider.enabled !== "boolean") {
    errors.push(`${providerPath}.enabled must be a boolean`);
  }
  if ("priority" in provider && typeof provider.priority !== "number") {
    errors.push(`${providerPath}.priority must be a number`);
  }
  if ("inputFlag" in provider && typeof provider.inputFlag !== "string") {
    errors.push(`${providerPath}.inputFlag must be a string`);
  }
  if ("modelFlag" in provider && typeof provider.modelFlag !== "string") {
    errors.push(`${providerPath}.modelFlag must be a string`);
  }
  if ("model" in provider && typeof provider.model !== "string") {
    errors.push(`${providerPath}.model must be a string`);
  }
  if ("timeoutSeconds" in provider && !isPositiveNumber(provider.timeoutSeconds)) {
    errors.push(`${providerPath}.timeoutSeconds must be a positive number`);
  }
  if ("env" in provider && !isStringRecord(provider.env)) {
    errors.push(`${providerPath}.env must be an object of string values`);
  }
  if ("cwd" in provider && typeof provider.cwd !== "string") {
    errors.push(`${providerPath}.cwd must be a string`);
  }
}

function validateOperation(
  operation: Record<string, unknown>,
  operationPath: string,
  requiresAll: boolean,
  errors: string[]
): void {
  if (requiresAll) {
    if (typeof operation.title !== "string") {
      errors.push(`${operationPath}.title must be a string`);
    }
    if (typeof operation.template !== "string") {
      errors.push(`${operationPath}.template must be a string`);
    }
  }

  for (const key of ["title", "template", "description", "category"] as const) {
    if (key in operation && typeof operation[key] !== "string") {
      errors.push(`${operationPath}.${key} must be a string`);
    }
  }
  if ("params" in operation && !isStringArray(operation.params)) {
    errors.push(`${operationPath}.params must be an array of strings`);
  }
  if ("stripPrefixes" in operation && !isStringArray(operation.stripPrefixes)) {
    errors.push(`${operationPath}.stripPrefixes must be an array of strings`);
  }
}

function validateMerged(config: Config): string[] {
  const errors: string[] = [];
  const seen = new Map<number, string>();
  for (const [id, provider] of Object.entries(config.providers)) {
    if (!provider.enabled) {
      continue;
    }
    const owner = seen.get(provider.priority);
    if (owner !== undefined) {
      errors.push(`providers.${id}.priority ${provider.priority} is already used by ${owner}`);
      continue;
    }
    seen.set(provider.priority, id);
  }
  return errors;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((entry) => typeof entry === "string");
}

function isPositiveNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value) && value > 0;
}

function isStringRecord(value: unknown): value is Record<string, string> {
  if (!isRecord(value)) {
    return false;
  }
  return Object.values(value).every((entry) => typeof entry === "string");
}
