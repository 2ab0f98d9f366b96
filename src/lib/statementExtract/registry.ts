/**
 * Format → strategy map. Formats without a dedicated layout reader use the
 * generic strategy.
 */

import type { BankFormatId } from "@/lib/statementModel/types";
import { extractBankOfAmerica } from "./strategies/bankOfAmerica";
import { extractChase } from "./strategies/chase";
import { extractCitibank } from "./strategies/citibank";
import { extractGeneric } from "./strategies/generic";
import { extractUsBank } from "./strategies/usBank";
import { extractWebster } from "./strategies/webster";
import { extractWellsFargo } from "./strategies/wellsFargo";
import type { ExtractionStrategy } from "./types";

export const EXTRACTION_STRATEGIES: Record<BankFormatId, ExtractionStrategy> = {
  chase: extractChase,
  bofa: extractBankOfAmerica,
  wells_fargo: extractWellsFargo,
  citibank: extractCitibank,
  us_bank: extractUsBank,
  webster: extractWebster,
  pnc: extractGeneric,
  truist: extractGeneric,
  bank_of_bartlett: extractGeneric,
  city_bank_tx: extractGeneric,
  generic: extractGeneric,
};
