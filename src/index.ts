/**
 * @file Main entry point. Exports the template engine, its building blocks, the
 * `Database` access layer and the provider types.
 */

// Provider implementations are loaded on demand by `Database.connect`, so only their
// option types are exported here; their drivers stay optional at import time.
export type { MySQLProviderOptions, ConnectionPoolConfig } from './dataProviders/MySQLProvider';
export type { SQLiteProviderOptions } from './dataProviders/SQLiteProvider';
export type { PostgreSQLProviderOptions, PostgreSQLConnectionPoolConfig } from './dataProviders/PostgreSQLProvider';

export type { DataProvider, ConnectionPoolStatus, ExecuteResult, ExecuteOptions } from './dataProvider';
export type { PreparedQuery } from './preparedQuery';
export type { QueryTemplateOptions } from './queryTemplate';
export type { FilteredTemplate } from './macroProcessor';
export type { SubstitutionResult } from './placeholderProcessor';
export type { TemplateToken, PlaceholderToken, LexerOptions } from './templateLexer';
export type { Dialect } from './identifierQuoter';
export type { CallerInfo } from './callerInfo';
export type { ParsedConnectionString } from './connectionString';
export type {
	Scalar, NativeExtractable, Skip, ScalarParam, ParamMapping, ParamList, Param, BoundValue
} from './params';
export type {
	ProviderConfig, DatabaseOptions, DatabaseConfig, Row, ColumnValues,
	QueryLogEntry, QueryErrorLogEntry, QueryLogger, ErrorHandler, Page
} from './database';
export type { LogEntry, LoggerConfig, ContextLogger } from './logger';

export { QueryTemplateEngine } from './queryTemplate';
export { MacroProcessor } from './macroProcessor';
export { PlaceholderProcessor } from './placeholderProcessor';
export { IdentifierQuoter } from './identifierQuoter';
export { tokenize } from './templateLexer';
export { SKIP, TypedValue, isSkip, isNativeExtractable, unwrapValue } from './params';
export { Database } from './database';
export { parseConnectionString } from './connectionString';
export {
	DatabaseError, QueryTemplateError, MissingParameterError, ArrayParamError, IdentifierTypeError,
	ParameterCountError, EmptyDataError, ConnectionError, QueryExecutionError
} from './errors';
export { Logger, LogLevel, globalLogger, getLogger } from './logger';
