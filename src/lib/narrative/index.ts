/**
 * Narrative Reporter — Public API
 */

export type { NarrativeNote, NoteTone } from "./notes";
export {
  INSUFFICIENT_DATA_SUMMARY,
  NO_CONCERNS_SUMMARY,
  NOTE_RULES,
  formatPercent,
  formatRatio,
  generateNarrativeNotes,
  summarizeNotes,
} from "./notes";

export type { RankingRow, ReportOptions } from "./report";
export { renderHealthReport, renderRankingTable, renderTrendTable, scoreBar } from "./report";
