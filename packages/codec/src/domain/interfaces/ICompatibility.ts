export type CompatibilityMode = "none" | "backward" | "forward" | "full";

export interface ICompatibilityReport {
  compatible: boolean;
  violations: string[];
}
