import type { ResourceUtilization, TrialCost } from "../core/metrics";
import type { SimulationState } from "../core/state";

// called before finished tasks release, so a finishing resource still counts as busy
export function recordStepMetrics(state: SimulationState, stepSize: number, idle = false): void {
  let cost = 0;
  for (const resource of state.resources.values()) {
    const load = idle ? 0 : resource.assigned.length;
    state.loadSeries.get(resource.id)?.push(load);
    if (!idle && resource.state === "working") {
      cost += resource.definition.costPerTime * stepSize;
    }
  }
  state.costSeries.push(cost);
}

export function computeUtilization(state: SimulationState): ResourceUtilization[] {
  return [...state.resources.values()].map((resource) => {
    const series = state.loadSeries.get(resource.id) ?? [];
    const busySlots = series.reduce((sum, load) => sum + load, 0);
    const capacity = resource.definition.capacity;
    const available = capacity * series.length;
    return {
      resourceId: resource.id,
      capacity,
      busySlots,
      steps: series.length,
      utilization: available > 0 ? busySlots / available : 0,
      series: [...series],
    };
  });
}

export function computeCost(state: SimulationState): TrialCost {
  return {
    total: state.costSeries.reduce((sum, c) => sum + c, 0),
    series: [...state.costSeries],
  };
}
