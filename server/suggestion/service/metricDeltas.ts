import {
  METRIC_DEFINITIONS,
  type DeltaDirection,
  type MetricDelta,
  type MetricVector,
} from "../types/suggestion.types";
import { assertMetricVector } from "../model/SatisfactionEntries";

/**
 * Diferença por métrica entre o dia atual e a sugestão ("aumentar X em Y").
 * A direção segue o delta truncado: |delta| < 1 conta como UNCHANGED.
 */
export function computeMetricDeltas(current: MetricVector, suggested: MetricVector): MetricDelta[] {
  assertMetricVector(current, "current metrics");
  assertMetricVector(suggested, "suggested metrics");

  return METRIC_DEFINITIONS.map((definition, index) => {
    const delta = suggested[index] - current[index];
    const truncated = Math.trunc(delta);

    let direction: DeltaDirection = "UNCHANGED";
    if (truncated > 0) direction = "INCREASE";
    else if (truncated < 0) direction = "DECREASE";

    return {
      key: definition.key,
      label: definition.label,
      unit: definition.unit,
      current: current[index],
      suggested: suggested[index],
      delta,
      magnitude: Math.abs(truncated),
      direction,
    };
  });
}
