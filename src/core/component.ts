export type ComponentRuntime = {
  id: string;
  ready: boolean;
};
