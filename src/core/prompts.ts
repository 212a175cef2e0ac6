export { collectReportInput } from "./prompts/collect-report-input.js";
