export type {
  ExtractionQualityInput,
  ExtractionQualityReport,
  QualityCheck,
  QualityCheckName,
  QualityStatus,
} from "./types";

export { QUALITY_CHECK_NAMES } from "./types";
export { validateExtraction } from "./validateExtraction";
