export * from "./modules/types";
export {
  ApplicationSchema,
  ClaimSchema,
  CLAIM_TYPES,
  formatIssues,
  type ApplicationInput,
  type ClaimInput
} from "./modules/application.schema";
export {
  BASE_RATES,
  CLAIMS_LOOKBACK_YEARS,
  CLAIM_FLAT_SURCHARGE,
  CLAIM_SEVERITY_RATE,
  EMPLOYEE_BANDS,
  MINIMUM_PREMIUM,
  REVENUE_UNIT,
  RISK_MULTIPLIERS,
  TENURE_BANDS,
  resolveRateClass
} from "./modules/rate.tables";
export { computePremium, computePremiumBreakdown, type PremiumOptions } from "./modules/premium.service";
export { normalizeRisk } from "./modules/risk.normalizer";
export { assembleQuote } from "./modules/quote.assembler";
export { buildExplanation, determineConditions } from "./modules/underwriting.service";
export {
  underwriteApplication,
  underwriteBatch,
  type BatchItemResult,
  type UnderwritingDeps
} from "./modules/quote.service";
export {
  AssessorError,
  buildAssessmentPrompt,
  createOpenAIRiskAssessor,
  type RiskAssessor
} from "./services/riskAssessor";
export { renderQuotePdf, writeQuoteReport } from "./services/reportService";
export {
  DocumentNotFoundError,
  DocumentSchema,
  openDocumentStore,
  type DocumentInput,
  type DocumentStore,
  type StoredDocument
} from "./services/documentStore";
export { createApp, type AppOptions } from "./app";
