import type { BoundValue } from './params';

/**
 * Connection pool status information.
 */
export interface ConnectionPoolStatus
{
	/** Total number of connections in the pool */
	totalConnections: number;
	/** Number of idle connections */
	idleConnections: number;
	/** Number of active connections */
	activeConnections: number;
	/** Maximum allowed connections */
	maxConnections: number;
	/** Minimum idle connections to maintain */
	minConnections?: number;
}

/**
 * Row-level outcome of one statement.
 */
export interface ExecuteResult<T = Record<string, unknown>>
{
	/** Rows returned by the statement (empty for statements that return none) */
	rows: T[];
	/** Rows inserted, updated or deleted */
	affectedRows: number;
	/** Key generated by an INSERT, when the driver reports one */
	insertId?: number | string;
}

export interface ExecuteOptions
{
	/** Ask the driver to report the generated key of an INSERT */
	returnInsertId?: boolean;
}

/**
 * Driver adapter. Receives statements already processed by the template engine:
 * `?` placeholders only, parameters already unwrapped.
 */
export interface DataProvider
{
	/** Identifier quoting dialect of the underlying database */
	readonly dialect: string;

	/**
	 * Connects to the database.
	 */
	connect(): Promise<void>;

	/**
	 * Disconnects from the database.
	 */
	disconnect(): Promise<void>;

	/**
	 * Executes one statement.
	 * @param sql SQL with `?` placeholders.
	 * @param params Values for the placeholders, in order.
	 * @throws The driver error when the statement fails.
	 */
	execute<T = Record<string, unknown>>(sql: string, params: readonly BoundValue[], options?: ExecuteOptions): Promise<ExecuteResult<T>>;

	/**
	 * Starts a transaction. Statements run on the same connection until commit or rollback.
	 */
	beginTransaction(): Promise<void>;

	commit(): Promise<void>;

	rollback(): Promise<void>;

	inTransaction(): boolean;

	/**
	 * Gets the connection pool status (if applicable).
	 * Returns undefined if the provider doesn't support connection pooling.
	 */
	getPoolStatus?(): ConnectionPoolStatus | undefined;

	/**
	 * Checks if the provider supports connection pooling.
	 */
	supportsConnectionPooling?(): boolean;
}
