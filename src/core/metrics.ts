export type ResourceUtilization = {
  resourceId: string;
  capacity: number;

  // committed slots summed over all executed steps
  busySlots: number;
  steps: number;

  // busySlots / (capacity * steps), 0 when nothing could be committed
  utilization: number;

  // committed slots per step
  series: number[];
};

export type TrialCost = {
  total: number;
  series: number[];
};
