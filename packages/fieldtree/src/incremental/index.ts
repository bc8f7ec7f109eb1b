export { createIncrementalMerger } from "./merger";
export type { IncrementalMerger, IncrementalPatch, MergerState, ConsumeOptions } from "./merger";
