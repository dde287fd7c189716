import { BackendGuard } from "@/services/cache/outcome";
import type { StorageBackend } from "@/services/cache/types";
import type { Logger } from "@/utils/logger";

export interface HealthCheck {
  name: string;
  status: "healthy" | "unhealthy";
  details?: Record<string, unknown>;
  lastChecked: number;
  latency?: number;
}

/**
 * Probe a backend with its `ping`, or with a read of `probeKey` when it has
 * none. Failures are reported in the result, never thrown.
 */
export async function checkBackendHealth(
  backend: StorageBackend,
  probeKey: string,
  logger: Logger
): Promise<HealthCheck> {
  const guard = new BackendGuard(logger, { backend: backend.kind });
  const start = Date.now();
  const outcome = await guard.attempt("health", async () => {
    if (backend.ping) {
      await backend.ping();
    } else {
      await backend.get(probeKey);
    }
  });
  const lastChecked = Date.now();

  if (!outcome.ok) {
    return {
      name: backend.kind,
      status: "unhealthy",
      details: { error: outcome.error.message },
      lastChecked,
      latency: lastChecked - start,
    };
  }

  return {
    name: backend.kind,
    status: "healthy",
    details: { probe: backend.ping ? "ping" : "read" },
    lastChecked,
    latency: lastChecked - start,
  };
}
