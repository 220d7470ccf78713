// @taxoforge/core entry point
//
// Public API:
// - Repository reading (readRepository, addExtensions) and the compiler
//   (Compilation, compileRepository) that turns definition files into a
//   resolved Schema.
// - Schema model and JSON codec, structural comparison (compareSchemas,
//   formatDifference) and backwards-compatibility validation.
// - Schema server client and getSchema(), which loads a schema from a file,
//   a repository directory or a server.

// Errors
export { ErrorCode, EXIT_CODES, getExitCode, type Severity } from './errors/codes.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type PresenterOptions,
} from './errors/presenter.js';
export {
  TaxoforgeError,
  DefinitionError,
  CompilationError,
  RepositoryError,
  DiffError,
  ConfigError,
  ClientError,
  InternalError,
  isTaxoforgeError,
  toError,
  type ErrorContext,
  type SerializedError,
} from './types/errors.js';
export { Ok, Err, ok, err, isOk, isErr, type Result } from './types/result.js';
export {
  createStderrLogger,
  silentLogger,
  type Logger,
  type StderrLoggerOptions,
} from './util/logger.js';
export { createAjv, formatAjvErrors, type AjvInstance } from './ajv/factory.js';

// Repository
export {
  readRepository,
  addExtensions,
  addExtension,
  parseDefinition,
  type ReadOptions,
} from './repository/reader.js';
export { Repository } from './repository/repository.js';
export {
  RepoPaths,
  SpecialFiles,
  REPO_PATHS,
  SPECIAL_FILES,
  sanitizePath,
  shortName,
  extensionOf,
  extensionless,
  categoryOf,
  categoryless,
  pathDefinitionKind,
  type RepoPath,
} from './repository/paths.js';
export type * from './repository/definitions.js';
export { DEFINITION_KINDS } from './repository/definitions.js';

// Compiler
export {
  Compilation,
  compileRepository,
  orderOperations,
  PHASES,
  type CompilationConfig,
  type CompilationMutations,
  type Mutation,
  type PhaseOperations,
} from './compile/compiler.js';
export {
  findPrerequisites,
  explainOperations,
  explainMutations,
  type ExplainOptions,
} from './compile/explain.js';
export {
  DEFAULT_COMPILATION_OPTIONS,
  resolveCompilationOptions,
  type CompilationOptions,
  type ResolvedCompilationOptions,
} from './compile/options.js';
export type { Operation, Planner } from './compile/operation.js';
export { merge, canUpdate, type FieldPath, type MergeOptions } from './compile/merge.js';

// Schema
export * from './schema/model.js';
export {
  schemaFromData,
  schemaFromJson,
  schemaToData,
  schemaToJson,
  schemaFromFile,
  schemaToFile,
  resolveObjectTypes,
  type SchemaParseOptions,
} from './schema/json.js';
export { keysToNames, namesToKeys } from './schema/keys.js';

// Comparison
export * from './compare/model.js';
export { compare, compareDict, compareSchemas, compareValue } from './compare/compare.js';
export { formatDifference, type FormatOptions } from './compare/formatter.js';

// Validation
export {
  FINDING_SEVERITIES,
  Finding,
  Validator,
  isFindingSeverity,
  validateSeverities,
  type FatalFinding,
  type FindingSeverity,
  type Rule,
  type RuleMetadata,
  type SeverityMap,
  type ValidationFindings,
  type ValidatorOptions,
} from './validate/validator.js';
export {
  countSeverity,
  emptyCounts,
  hasBlockingFindings,
  summarizeFindings,
  type FindingSummary,
  type SeverityCounts,
} from './validate/summarize.js';
export {
  ColoringValidationFormatter,
  ValidationFormatter,
  type FormatFindingsOptions,
} from './validate/formatting.js';
export { CompatibilityValidator } from './validate/compatibility/validator.js';
export type { CompatibilityContext } from './validate/compatibility/context.js';
export * from './validate/compatibility/removed-records.js';
export * from './validate/compatibility/changed-class-uids.js';
export * from './validate/compatibility/increased-requirement.js';
export * from './validate/compatibility/changed-type.js';
export * from './validate/compatibility/added-required-attrs.js';

// Schema server
export {
  SchemaClient,
  LATEST,
  LATEST_STABLE,
  type Fetch,
  type SchemaClientOptions,
  type SchemaVersion,
  type SchemaVersions,
} from './client/client.js';
export { getSchema, type GetSchemaOptions } from './client/get-schema.js';
