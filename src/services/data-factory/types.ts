/**
 * Data Factory Types
 * Schema model, case policy and dataset shapes shared by both pipelines
 */

/**
 * Name of a value generator ('name', 'email', 'ai_text', ...). Open set.
 */
export type TypeName = string;

/**
 * A resolved generation mode for one field
 */
export type FieldCase = 'positive' | 'negative';

/**
 * Case-selection policy for a run. 'mixed' is drawn per field, per row.
 */
export type CaseKind = FieldCase | 'mixed';

export const CASE_KINDS: readonly CaseKind[] = ['positive', 'negative', 'mixed'];

export type FieldValue = string | number;

export interface FieldDescriptor {
  readonly type: TypeName;

  /**
   * Free-text prompt for context-bearing types; ignored by the others
   */
  readonly context?: string;
}

/**
 * Ordered mapping of field name to descriptor
 */
export type Schema = ReadonlyMap<string, FieldDescriptor>;

export type DataRecord = Record<string, FieldValue>;

/**
 * Rows sharing one ordered column set
 */
export interface Dataset {
  readonly columns: readonly string[];
  readonly records: DataRecord[];
}

/**
 * Produces a value without input
 */
export interface StaticProducer {
  readonly kind: 'static';
  produce(): FieldValue;
}

/**
 * Produces a value from the field's context prompt
 */
export interface ContextualProducer {
  readonly kind: 'contextual';
  produce(context: string): Promise<FieldValue>;
}

export type ValueProducer = StaticProducer | ContextualProducer;

/**
 * Registry entry: one producer per case, either may be absent
 */
export interface GeneratorEntry {
  readonly positive?: ValueProducer;
  readonly negative?: ValueProducer;
}

export type IssueReason = 'missing_generator' | 'generator_failure' | 'service_failure';

/**
 * A field that received a sentinel instead of a generated value
 */
export interface FieldIssue {
  row: number;
  field: string;
  fieldCase: FieldCase;
  reason: IssueReason;
  value: FieldValue;
}

export interface RowGenerationResult {
  dataset: Dataset;
  issues: FieldIssue[];
  metadata: {
    rowCount: number;
    casePolicy: CaseKind;
    durationMs: number;
    /**
     * True when an abort signal stopped generation before rowCount rows
     */
    aborted: boolean;
  };
}

/**
 * Error types for schema problems
 */
export enum SchemaErrorType {
  INVALID_DEFINITION = 'INVALID_DEFINITION',
  DUPLICATE_FIELD = 'DUPLICATE_FIELD',
  EMPTY_SCHEMA = 'EMPTY_SCHEMA',
  INVALID_ROW_COUNT = 'INVALID_ROW_COUNT',
  FILE_ERROR = 'FILE_ERROR',
}

export class SchemaError extends Error {
  constructor(
    public type: SchemaErrorType,
    message: string,
    public originalError?: unknown
  ) {
    super(`[Schema] ${type}: ${message}`);
    this.name = 'SchemaError';
  }
}
