export { ReportGenerator } from "./ai/generator.js";
export type { ReportModelClient } from "./ai/contracts.js";
