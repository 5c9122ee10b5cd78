import type { Router } from "express";
import type { TransportKey, TypeDescriptor } from "@hookrelay/shared";
import type { Source } from "../source.js";

export type ConfigurationBody = {
  sources: Array<{ key: string; event_types: TypeDescriptor[] }>;
  transports: Array<{ key: TransportKey }>;
};

export function describeConfiguration(
  sources: readonly Source[],
  transports: readonly TransportKey[]
): ConfigurationBody {
  return {
    sources: sources
      .map((source) => ({ key: source.key, event_types: source.parser.eventTypes() }))
      .sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0)),
    transports: transports.map((key) => ({ key }))
  };
}

export function registerConfigurationRoute({
  router,
  sources,
  transports
}: {
  router: Router;
  sources: readonly Source[];
  transports: readonly TransportKey[];
}): void {
  router.get("/configuration", (_req, res) => {
    res.json(describeConfiguration(sources, transports));
  });
}
