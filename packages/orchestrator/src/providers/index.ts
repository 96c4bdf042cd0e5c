import { Client } from "./client";
import { provider as k8sProvider } from "./k8s";

export interface Provider {
  initClient(configPath: string, context?: string): Client;
}

export const Providers = new Map<string, Provider>();
Providers.set("kubernetes", k8sProvider);

export function getProvider(provider: string): Provider {
  const found = Providers.get(provider);
  if (!found) {
    throw new Error(
      "Invalid provider config. You must use one of: " +
        Array.from(Providers.keys()).join(", "),
    );
  }

  return found;
}

export * from "./client";
export { FabricCliTools, hasFiles } from "./fabricTools";
export type { EnrollmentSpec, FabricTools } from "./fabricTools";
