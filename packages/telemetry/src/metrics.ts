/**
 * OTel metrics for fileset loading.
 *
 * Lazily initialized — instruments are only created on first access.
 * When no meter provider is registered, these return no-op instruments.
 */

import type { Counter } from "@opentelemetry/api";
import { metrics } from "@opentelemetry/api";

const METER_NAME = "harvestkit";

let _filesetLoads: Counter | undefined;

/**
 * Get the counter for fileset loads, tagged with module, fileset and outcome.
 */
export function getFilesetLoads(): Counter {
  if (_filesetLoads === undefined) {
    _filesetLoads = metrics.getMeter(METER_NAME).createCounter("harvestkit.fileset.loads", {
      description: "Total fileset manifest loads",
    });
  }
  return _filesetLoads;
}
