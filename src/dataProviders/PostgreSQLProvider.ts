import type { DataProvider, ConnectionPoolStatus, ExecuteOptions, ExecuteResult } from '../dataProvider';
import type { BoundValue } from '../params';
import type { PoolClient, PoolConfig, ClientBase, ClientConfig } from 'pg';
import { Pool, Client } from 'pg';
import { getLogger } from '../logger';
import { ConnectionError } from '../errors';

/**
 * Connection pool configuration options for PostgreSQL.
 */
export interface PostgreSQLConnectionPoolConfig
{
	/** Whether to use connection pooling (default: true) */
	usePool?: boolean;
	/** Maximum number of connections in the pool (default: 10) */
	max?: number;
	/** Minimum number of connections to maintain (default: 0) */
	min?: number;
	/** Maximum number of milliseconds a client can be idle before being closed (default: 10000) */
	idleTimeoutMillis?: number;
	/** Maximum number of milliseconds to wait for a connection (default: 30000) */
	connectionTimeoutMillis?: number;
	/** Let the process exit while idle clients remain in the pool (default: false) */
	allowExitOnIdle?: boolean;
}

/**
 * PostgreSQL connection options, extending `ClientConfig` from `pg` with pool configuration.
 */
export interface PostgreSQLProviderOptions extends ClientConfig
{
	/** Connection pool configuration */
	pool?: PostgreSQLConnectionPoolConfig;
}

/**
 * Rewrites `?` markers into PostgreSQL's numbered `$1, $2, ...` form.
 * Markers inside single-quoted strings or double-quoted identifiers are left alone.
 */
export function toNumberedPlaceholders(sql: string): string
{
	let result = '';
	let quote: string | undefined;
	let index = 0;

	for (const char of sql)
	{
		if (quote)
		{
			if (char === quote) quote = undefined;
			result += char;
		}
		else if (char === '\'' || char === '"')
		{
			quote = char;
			result += char;
		}
		else if (char === '?')
		{
			result += `$${++index}`;
		}
		else
		{
			result += char;
		}
	}

	return result;
}

function readInsertId(row: unknown): number | string | undefined
{
	if (typeof row !== 'object' || row === null || !('id' in row)) return undefined;
	const id = row.id;
	return typeof id === 'number' || typeof id === 'string' ? id : undefined;
}

/**
 * PostgreSQL provider on top of `pg`, with optional connection pooling.
 */
export class PostgreSQLProvider implements DataProvider
{
	readonly dialect = 'postgresql';

	/**
	 * The PostgreSQL client instance (used when pooling is disabled).
	 */
	private client?: Client;

	/**
	 * The PostgreSQL connection pool instance (used when pooling is enabled).
	 */
	private pool?: Pool;

	/**
	 * Pooled client pinned by an open transaction (the single client is used directly).
	 */
	private transactionClient?: PoolClient;
	private transactionOpen = false;
	private transactionStarting = false;

	private readonly options: PostgreSQLProviderOptions;
	private readonly usePool: boolean;
	private readonly logger = getLogger('PostgreSQLProvider');

	constructor(options: PostgreSQLProviderOptions)
	{
		this.options = options;
		this.usePool = options.pool?.usePool !== false;
		this.logger.debug('PostgreSQLProvider initialized', {
			host: options.host,
			database: options.database,
			usePool: this.usePool,
			max: options.pool?.max ?? 10
		});
	}

	/**
	 * Connects using either a connection pool or a single client.
	 */
	async connect(): Promise<void>
	{
		this.logger.debug('Connecting to PostgreSQL database', { usePool: this.usePool });

		const { pool: poolConfig = {}, ...clientOptions } = this.options;

		if (this.usePool)
		{
			const poolOptions: PoolConfig = {
				...clientOptions,
				max: poolConfig.max ?? 10,
				min: poolConfig.min ?? 0,
				idleTimeoutMillis: poolConfig.idleTimeoutMillis ?? 10000,
				connectionTimeoutMillis: poolConfig.connectionTimeoutMillis ?? 30000,
				allowExitOnIdle: poolConfig.allowExitOnIdle ?? false,
			};

			this.logger.debug('Creating PostgreSQL connection pool', {
				max: poolOptions.max,
				min: poolOptions.min,
				idleTimeoutMillis: poolOptions.idleTimeoutMillis
			});

			const pool = new Pool(poolOptions);

			try
			{
				const testClient = await pool.connect();
				await testClient.query('SELECT 1');
				testClient.release();
			}
			catch (error)
			{
				this.logger.error('Connection pool test failed', { error: error instanceof Error ? error.message : String(error) });
				await pool.end();
				throw error;
			}

			this.pool = pool;
			this.logger.info('PostgreSQL connection pool created successfully');
		}
		else
		{
			const client = new Client(clientOptions);
			await client.connect();
			this.client = client;
			this.logger.info('PostgreSQL single client connected successfully');
		}
	}

	/**
	 * Closes the PostgreSQL connection or connection pool.
	 */
	async disconnect(): Promise<void>
	{
		this.logger.debug('Disconnecting from PostgreSQL database');

		if (this.transactionClient)
		{
			this.logger.warn('Disconnecting with an open transaction; it will be rolled back by the server');
			this.transactionClient.release();
			this.transactionClient = undefined;
		}
		this.transactionOpen = false;

		if (this.pool)
		{
			await this.pool.end();
			this.pool = undefined;
			this.logger.info('Connection pool ended successfully');
		}
		else if (this.client)
		{
			await this.client.end();
			this.client = undefined;
			this.logger.info('Client connection ended successfully');
		}
	}

	/**
	 * Gets the connection pool status.
	 * @returns Connection pool status or undefined if not using pooling.
	 */
	getPoolStatus(): ConnectionPoolStatus | undefined
	{
		if (!this.pool) return undefined;

		return {
			totalConnections: this.pool.totalCount,
			idleConnections: this.pool.idleCount,
			activeConnections: this.pool.totalCount - this.pool.idleCount,
			maxConnections: this.options.pool?.max ?? 10,
			minConnections: this.options.pool?.min ?? 0,
		};
	}

	supportsConnectionPooling(): boolean
	{
		return true;
	}

	async execute<T = Record<string, unknown>>(sql: string, params: readonly BoundValue[], options: ExecuteOptions = {}): Promise<ExecuteResult<T>>
	{
		let text = toNumberedPlaceholders(sql);
		if (options.returnInsertId && !/\bRETURNING\b/i.test(text))
		{
			text += ' RETURNING id';
		}

		this.logger.debug('Executing SQL', { sql: text, params });

		const { client, release } = await this.acquire();
		try
		{
			const result = await client.query(text, [...params]);
			const rows: T[] = result.rows;

			this.logger.debug('Statement completed', { command: result.command, rowCount: result.rowCount });
			return {
				rows,
				affectedRows: result.rowCount ?? 0,
				insertId: options.returnInsertId ? readInsertId(result.rows[0]) : undefined,
			};
		}
		catch (error)
		{
			this.logger.error('PostgreSQL statement failed', { sql: text, error: error instanceof Error ? error.message : String(error) });
			throw error;
		}
		finally
		{
			release();
		}
	}

	async beginTransaction(): Promise<void>
	{
		if (this.transactionOpen || this.transactionStarting) throw new Error('A transaction is already in progress');

		this.transactionStarting = true;
		try
		{
			if (this.pool)
			{
				const pooled = await this.pool.connect();
				try
				{
					await pooled.query('BEGIN');
				}
				catch (error)
				{
					pooled.release();
					throw error;
				}
				this.transactionClient = pooled;
			}
			else
			{
				await this.requireClient().query('BEGIN');
			}
			this.transactionOpen = true;
		}
		finally
		{
			this.transactionStarting = false;
		}
		this.logger.info('Transaction started');
	}

	async commit(): Promise<void>
	{
		await this.finishTransaction('COMMIT');
		this.logger.info('Transaction committed');
	}

	async rollback(): Promise<void>
	{
		await this.finishTransaction('ROLLBACK');
		this.logger.info('Transaction rolled back');
	}

	inTransaction(): boolean
	{
		return this.transactionOpen;
	}

	private async finishTransaction(command: 'COMMIT' | 'ROLLBACK'): Promise<void>
	{
		if (!this.transactionOpen) throw new Error(`Cannot ${command.toLowerCase()}: no transaction in progress`);

		const client: ClientBase = this.transactionClient ?? this.requireClient();
		const pooled = this.transactionClient;
		this.transactionOpen = false;
		this.transactionClient = undefined;

		try
		{
			await client.query(command);
		}
		catch (error)
		{
			if (command === 'COMMIT')
			{
				this.logger.error('Commit failed, rolling back', { error: error instanceof Error ? error.message : String(error) });
				await this.rollbackAfterFailedCommit(client);
			}
			throw error;
		}
		finally
		{
			pooled?.release();
		}
	}

	private async rollbackAfterFailedCommit(client: ClientBase): Promise<void>
	{
		try
		{
			await client.query('ROLLBACK');
		}
		catch (rollbackError)
		{
			this.logger.warn('Rollback after failed commit also failed', { error: rollbackError instanceof Error ? rollbackError.message : String(rollbackError) });
		}
	}

	private requireClient(): Client
	{
		if (!this.client) throw new ConnectionError('Not connected');
		return this.client;
	}

	/**
	 * Borrows a client: the transaction's, a pooled one, or the single client.
	 */
	private async acquire(): Promise<{ client: ClientBase; release: () => void }>
	{
		if (this.transactionClient)
		{
			return { client: this.transactionClient, release: () => { } };
		}
		if (this.pool)
		{
			const pooled = await this.pool.connect();
			return { client: pooled, release: () => pooled.release() };
		}
		return { client: this.requireClient(), release: () => { } };
	}
}
