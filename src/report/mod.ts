/**
 * Report model and formatters
 *
 * @module
 */

export {
  buildReport,
  DIALECT_TITLES,
  type LineStatus,
  lineStatus,
  mergeExternalIssues,
  type PurificationReport,
  type ReportLine,
} from "./model.ts";
export { formatText, type TextFormatOptions } from "./text.ts";
export { formatJson, toJson } from "./json.ts";
export { formatMarkdown } from "./markdown.ts";
