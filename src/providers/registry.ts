import { failure } from "../core/errors.js";
import { Config, Failure, ProviderSpec } from "../core/types.js";

export type ChainResolution = { ok: true; chain: ProviderSpec[] } | Failure;
export type ProviderLookup = { ok: true; provider: ProviderSpec } | Failure;

export function listEnabledProviders(config: Config): ProviderSpec[] {
  return Object.entries(config.providers)
    .filter(([, provider]) => provider.enabled)
    .map(([id, provider]) => ({ ...provider, id }))
    .sort((a, b) => a.priority - b.priority || a.id.localeCompare(b.id));
}

// Disabled providers are reported exactly like unknown ones.
export function getProviderSpec(config: Config, id: string): ProviderLookup {
  const provider = Object.hasOwn(config.providers, id) ? config.providers[id] : undefined;
  if (!provider || !provider.enabled) {
    return failure("UnknownProvider", `Unknown provider: ${id}`);
  }
  return { ok: true, provider: { ...provider, id } };
}

export function resolveChain(config: Config, requestedProviderId = ""): ChainResolution {
  const enabled = listEnabledProviders(config);
  const requested = requestedProviderId.trim();
  const firstId = requested || config.llm.defaultProvider?.trim() || "";

  if (!firstId) {
    return failure("NoProviderConfigured", "No provider configured");
  }
  // A named provider is reported as unknown even when nothing is enabled.
  if (!requested && enabled.length === 0) {
    return failure("NoProviderConfigured", "No provider configured: every provider is disabled");
  }

  const first = getProviderSpec(config, firstId);
  if (!first.ok) {
    return first;
  }

  const fallbackId = config.llm.fallbackProvider?.trim();
  const rest = enabled
    .filter((provider) => provider.id !== first.provider.id)
    .sort((a, b) => rank(a, fallbackId) - rank(b, fallbackId));
  const chain = [first.provider, ...rest];
  const limit = config.llm.maxProviders ? Math.max(1, Math.floor(config.llm.maxProviders)) : chain.length;
  return { ok: true, chain: chain.slice(0, limit) };
}

function rank(provider: ProviderSpec, fallbackId: string | undefined): number {
  return provider.id === fallbackId ? Number.NEGATIVE_INFINITY : provider.priority;
}
