export type {
  BankFormatRule,
  CategoryRule,
  CategoryTables,
  CompiledPattern,
  LegalActionCode,
  LenderAlias,
  LenderIdentifier,
  LenderTables,
  RiskKeywordTables,
  UnderwritingConfig,
} from "./types";
export type { UnderwritingConfigFiles } from "./loadConfig";
export type { UnderwritingPolicy } from "./schema";

export {
  DEFAULT_CONFIG_DIR,
  compileUnderwritingConfig,
  loadUnderwritingConfig,
  readUnderwritingConfigFiles,
} from "./loadConfig";
export { UnderwritingConfigError } from "./errors";
