export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

export type FailureKind =
  | "NoOperationSpecified"
  | "NoTextProvided"
  | "UnknownOperation"
  | "MissingParameter"
  | "EmptyInput"
  | "UnknownProvider"
  | "NoProviderConfigured"
  | "Timeout"
  | "ProcessError"
  | "EmptyResponse"
  | "Cancelled";

export interface Failure {
  ok: false;
  kind: FailureKind;
  message: string;
}

export type InvocationResult = { ok: true; text: string } | Failure;

export interface OperationOutcome {
  success: boolean;
  text: string;
}

export interface OperationConfig {
  title: string;
  description?: string;
  category?: string;
  template: string;
  params?: string[];
  stripPrefixes?: string[];
}

export interface ProviderConfig {
  binary: string;
  args: string[];
  enabled: boolean;
  priority: number;
  inputFlag?: string;
  modelFlag?: string;
  model?: string;
  timeoutSeconds?: number;
  env?: Record<string, string>;
  cwd?: string;
}

export interface ProviderSpec extends ProviderConfig {
  id: string;
}

export interface Config {
  server: {
    name: string;
    version: string;
  };
  llm: {
    defaultProvider?: string;
    fallbackProvider?: string;
    timeoutSeconds: number;
    maxProviders?: number;
    maxPromptChars: number;
  };
  environment: {
    paths: string[];
  };
  providers: Record<string, ProviderConfig>;
  operations: Record<string, OperationConfig>;
  audit: {
    enabled: boolean;
    dir: string;
  };
  logs: {
    enabled: boolean;
    dir: string;
  };
}

export interface RunnerResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  durationMs: number;
  timedOut?: boolean;
  aborted?: boolean;
  signal?: string | null;
  pid?: number;
}

export interface AttemptRecord {
  provider: string;
  ok: boolean;
  kind?: FailureKind;
  message?: string;
  durationMs: number;
}

export interface RequestRecord {
  requestId: string;
  startedAt: string;
  operation?: string;
  provider: string;
  prompt: string;
  attempts: AttemptRecord[];
  outcome: OperationOutcome;
}

export interface ExecutionLog {
  path: string;
  format: "markdown";
}
