/**
 * @file Error hierarchy. Everything the library throws extends `DatabaseError`.
 */

/**
 * Base class for all errors raised by this library.
 */
export class DatabaseError extends Error
{
	constructor(message: string, options?: { cause?: unknown })
	{
		super(message, options);
		this.name = new.target.name;
	}
}

/**
 * Raised while rewriting a query template; never retried, never partially applied.
 */
export class QueryTemplateError extends DatabaseError { }

/**
 * A placeholder has no parameter left to consume.
 */
export class MissingParameterError extends QueryTemplateError
{
	constructor(readonly token: string, readonly index: number)
	{
		super(`Missing parameter for placeholder ${token} at position ${index}`);
	}
}

/**
 * `?a` received something other than a non-empty array or mapping.
 */
export class ArrayParamError extends QueryTemplateError { }

/**
 * `?#` received something other than a string.
 */
export class IdentifierTypeError extends QueryTemplateError { }

/**
 * More parameters were supplied than the filtered query consumes.
 */
export class ParameterCountError extends QueryTemplateError
{
	constructor(readonly expected: number, readonly received: number)
	{
		super(`Parameter count mismatch: query consumes ${expected} parameter(s), received ${received}`);
	}
}

/**
 * insert/update called with no data, or update/delete called without a WHERE map.
 */
export class EmptyDataError extends DatabaseError { }

/**
 * Could not build a provider or open a connection.
 */
export class ConnectionError extends DatabaseError { }

/**
 * The driver rejected a statement. `cause` holds the driver error.
 */
export class QueryExecutionError extends DatabaseError
{
	constructor(message: string, readonly query: string, readonly params: readonly unknown[], options?: { cause?: unknown })
	{
		super(message, options);
	}
}
