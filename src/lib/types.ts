// ===== Enums =====

export enum FieldName {
  NET_QUANTITY = "net_quantity",
  MRP = "mrp",
  MANUFACTURER_NAME = "manufacturer_name",
  COUNTRY_OF_ORIGIN = "country_of_origin",
  CONSUMER_CARE = "consumer_care",
  MANUFACTURE_DATE = "manufacture_date",
  BEST_BEFORE = "best_before",
  BATCH_NUMBER = "batch_number",
  LICENSE_NUMBER = "license_number", // FSSAI licence
}

export enum SourceType {
  TEXT_RECOGNITION = "TextRecognition",
  AI_ENHANCEMENT = "AIEnhancement",
  PLATFORM_METADATA = "PlatformMetadata",
}

export enum FieldStatus {
  PRESENT = "present",
  MISSING = "missing",
  INVALID = "invalid", // found on the label but malformed
}

export enum Requirement {
  REQUIRED = "required",
  OPTIONAL = "optional",
}

export enum TrendDirection {
  IMPROVING = "improving",
  DECLINING = "declining",
  STABLE = "stable",
  INSUFFICIENT_DATA = "insufficient_data",
}

export enum ComplianceLevel {
  EXCELLENT = "excellent",
  GOOD = "good",
  FAIR = "fair",
  POOR = "poor",
}

export const ALL_FIELDS: readonly FieldName[] = Object.values(FieldName);
export const ALL_SOURCES: readonly SourceType[] = Object.values(SourceType);

// ===== Candidate Fields (adapter output) =====

export interface NetQuantity {
  magnitude: number;
  unit: string; // canonical unit: g, kg, mg, ml, l, pcs, ...
}

export type FieldValue = string | NetQuantity;

/** One source's proposed value for one disclosure field */
export interface CandidateField {
  fieldName: FieldName;
  value: FieldValue;
  source: SourceType;
  confidence?: number;
}

/** What an adapter or caller hands over before the closed enums are checked */
export interface RawCandidate {
  fieldName: string;
  value: unknown;
  source: string;
  confidence?: unknown;
}

// ===== Merged Record =====

export interface Contender {
  source: SourceType;
  value: FieldValue;
  confidence: number;
  accepted: boolean;
  rejection: string | null;
}

export interface MergedField {
  value: FieldValue;
  source: SourceType;
  confidence: number;
  contenders: Contender[];
}

export interface MergeDiagnostic {
  index: number; // position in the adapter's emission order
  fieldName: string;
  source: string;
  message: string;
}

export interface MergedRecord {
  readonly productIdentifier: string;
  readonly timestamp: string;
  readonly fields: Readonly<Partial<Record<FieldName, MergedField>>>;
  readonly diagnostics: readonly MergeDiagnostic[];
}

// ===== Compliance =====

export interface ComplianceResult {
  catalogueVersion: string;
  score: number;
  presentRequired: number;
  requiredTotal: number;
  missingRequired: FieldName[];
  missingOptional: FieldName[];
  invalidFields: FieldName[];
  perFieldStatus: Partial<Record<FieldName, FieldStatus>>;
  complianceLevel: ComplianceLevel;
  compliant: boolean;
}

// ===== Manufacturer History =====

export interface ManufacturerHistoryEntry {
  manufacturerKey: string;
  manufacturerName: string;
  productIdentifier: string;
  score: number;
  timestamp: string;
  catalogueVersion: string;
  missingRequired: FieldName[];
  missingOptional: FieldName[];
  category: string; // product category, e.g. "Food & Beverages"
}

/** Narrows a read of the entry log; every filter is optional */
export interface HistoryFilter {
  manufacturerKey?: string;
  category?: string;
  limit?: number; // most recent N, still returned oldest first
}

/** Snapshot row; always reconstructible from the entry log */
export interface ManufacturerAggregate {
  manufacturerKey: string;
  manufacturerName: string;
  count: number;
  meanScore: number;
  compliantCount: number;
  trend: TrendDirection;
  lastEntryAt: string;
}

export interface ManufacturerProfile extends ManufacturerAggregate {
  complianceLevel: ComplianceLevel;
}

// ===== Pipeline Output =====

export type HistoryOutcome =
  | { status: "recorded"; profile: ManufacturerProfile }
  | { status: "duplicate"; profile: ManufacturerProfile }
  | { status: "not_recorded"; reason: string }
  | { status: "skipped"; reason: string };

export interface ComplianceSummary {
  score: string; // "X/Y"
  missingRequired: FieldName[];
  missingOptional: FieldName[];
}

export interface EvaluationReport {
  productIdentifier: string;
  evaluatedAt: string;
  mergedFields: Partial<Record<FieldName, { value: FieldValue; source: SourceType }>>;
  complianceSummary: ComplianceSummary;
  compliance: ComplianceResult;
  history: HistoryOutcome;
  manufacturerProfile?: ManufacturerProfile;
  diagnostics: MergeDiagnostic[];
}

// ===== Analytics =====

export interface FieldPresence {
  fieldName: FieldName;
  requirement: Requirement;
  presentCount: number;
  percentage: number; // 0-100, one decimal
}

export interface ManufacturerAnalytics {
  profile: ManufacturerProfile;
  catalogueVersion: string;
  fieldPresence: FieldPresence[];
  recentEntries: ManufacturerHistoryEntry[]; // newest first
}

export interface CategoryStats {
  category: string;
  totalScans: number;
  meanScore: number;
  manufacturerCount: number;
  levelDistribution: Record<ComplianceLevel, number>; // per scan
}

export type ExportFormat = "json" | "csv";

export interface ManufacturerRanking {
  manufacturerKey: string;
  manufacturerName: string;
  meanScore: number;
  count: number;
}

export interface ManufacturerComparison {
  manufacturerCount: number;
  totalScans: number;
  averageScore: number; // mean of manufacturer means
  levelDistribution: Record<ComplianceLevel, number>;
  topPerformers: ManufacturerRanking[];
  bottomPerformers: ManufacturerRanking[];
  mostActive: ManufacturerRanking[];
}
