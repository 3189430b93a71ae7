/**
 * Turns service liveness into the name -> boolean batch the monitor reads.
 */

import type { HealthResults } from "../../types";
import type { ServiceRecovery } from "../services/orchestrator";

export async function collectServiceHealth(services: ServiceRecovery): Promise<HealthResults> {
  const results: HealthResults = {};

  for (const status of await services.allStatuses()) {
    results[status.service] = status.known && status.running;
  }

  return results;
}
