import { Config, OperationOutcome } from "../core/types.js";
import { InvocationEngine } from "../engine/engine.js";
import { listEnabledProviders } from "./registry.js";

export type ProviderHealthStatus = {
  id: string;
  ok: boolean;
  message: string;
};

export const PROBE_PROMPT = "Reply with exactly OK and nothing else.";
const PROBE_TIMEOUT_SECONDS = 10;

export async function testProvider(engine: InvocationEngine, providerId = ""): Promise<OperationOutcome> {
  const id = providerId.trim() || engine.configuration.llm.defaultProvider || "";
  const result = await engine.call(id, PROBE_PROMPT, {
    fallback: false,
    timeoutSeconds: PROBE_TIMEOUT_SECONDS
  });
  // Empty replies already come back as EmptyResponse failures.
  if (!result.success) {
    return result;
  }
  return { success: true, text: `${id} is working correctly` };
}

export async function testProviders(engine: InvocationEngine, config: Config): Promise<ProviderHealthStatus[]> {
  const providers = listEnabledProviders(config);
  const checks = providers.map(async (provider) => {
    const outcome = await testProvider(engine, provider.id);
    return { id: provider.id, ok: outcome.success, message: outcome.text };
  });
  return Promise.all(checks);
}

export function validateConfiguration(config: Config): string[] {
  const issues: string[] = [];
  const enabled = listEnabledProviders(config);
  if (enabled.length === 0) {
    issues.push("No LLM providers are enabled");
  }
  for (const provider of enabled) {
    if (!provider.binary || provider.binary.trim().length === 0) {
      issues.push(`Provider ${provider.id} has no command specified`);
    }
  }

  const enabledIds = new Set(enabled.map((provider) => provider.id));
  const { defaultProvider, fallbackProvider } = config.llm;
  if (!defaultProvider) {
    issues.push("No default provider configured");
  } else if (!enabledIds.has(defaultProvider)) {
    issues.push(`Default provider ${defaultProvider} is not enabled`);
  }
  if (fallbackProvider && !enabledIds.has(fallbackProvider)) {
    issues.push(`Fallback provider ${fallbackProvider} is not enabled`);
  }
  return issues;
}
