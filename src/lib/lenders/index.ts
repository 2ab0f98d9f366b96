export type { LenderMatch, LenderMatchTier, MatchLenderOptions } from "./matchLender";

export { UNKNOWN_LENDER_LABEL, matchLender } from "./matchLender";
export { compactDescription, normalizeDescription, sourceKey, stripCorporateSuffixes } from "./normalize";
