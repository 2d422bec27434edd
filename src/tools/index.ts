export { analyzePatternTool } from "./analyze.ts";
export { extractGroupsTool } from "./extract.ts";
export { findAllTool } from "./find.ts";
