export type { RankableCompany, Ranked, RankingSummary } from "./rank";
export { compareByScore, rankCompanies, summarizeRanking } from "./rank";
export type { YearRankInput, YearRanks } from "./yearRanks";
export { assignYearRanks } from "./yearRanks";
