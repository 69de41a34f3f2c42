export { locateTool, probeCommand, expandHome } from './tool_locator';
export type { CandidatePredicate, ProbeOptions } from './tool_locator';
