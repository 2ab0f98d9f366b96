export { detectBankFormat, matchingBankFormats } from "./detectBankFormat";
