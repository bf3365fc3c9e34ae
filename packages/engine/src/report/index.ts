export { ReportAggregator, compareViolations, summarize, exitCodeFor } from "./aggregator";
export { formatJsonReport, formatTextReport } from "./format";
