export { ServiceRunner } from "./ServiceRunner.ts";
export type { ServiceRunnerOptions } from "./ServiceRunner.ts";
