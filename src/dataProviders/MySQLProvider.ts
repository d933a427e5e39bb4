import type { DataProvider, ExecuteOptions, ExecuteResult } from '../dataProvider';
import type { BoundValue } from '../params';
import type { Connection, ConnectionOptions, PoolOptions, Pool, ResultSetHeader, RowDataPacket } from 'mysql2/promise';
import mysql from 'mysql2/promise';
import { getLogger } from '../logger';
import { ConnectionError } from '../errors';

/**
 * Connection pool configuration options.
 */
export interface ConnectionPoolConfig
{
	/** Whether to use connection pooling (default: true) */
	usePool?: boolean;
	/** Maximum number of connections in the pool (default: 10) */
	connectionLimit?: number;
	/** Maximum number of connection requests in the queue (default: 0, no limit) */
	queueLimit?: number;
	/** Timeout for idle connections in milliseconds */
	idleTimeout?: number;
	/** Whether to open and ping a connection during connect() (default: false) */
	preConnect?: boolean;
}

/**
 * MySQL connection options, extending `ConnectionOptions` from `mysql2/promise` with pool configuration.
 */
export interface MySQLProviderOptions extends ConnectionOptions
{
	/** Connection pool configuration */
	pool?: ConnectionPoolConfig;
}

/**
 * A connection borrowed for one statement or one transaction.
 */
interface Lease
{
	connection: Connection;
	release(): void;
}

/**
 * MySQL / MariaDB provider on top of `mysql2/promise`, with optional connection pooling.
 */
export class MySQLProvider implements DataProvider
{
	readonly dialect = 'mysql';

	/**
	 * The MySQL connection instance (used when pooling is disabled).
	 */
	private connection?: Connection;

	/**
	 * The MySQL connection pool instance (used when pooling is enabled).
	 */
	private pool?: Pool;

	/**
	 * Connection pinned by an open transaction.
	 */
	private transaction?: Lease;
	private transactionStarting = false;

	private readonly options: MySQLProviderOptions;
	private readonly usePool: boolean;
	private readonly logger = getLogger('MySQLProvider');

	constructor(options: MySQLProviderOptions)
	{
		// utf8mb4 gives full Unicode support (including emoji); an explicit charset wins
		this.options = {
			charset: 'utf8mb4',
			...options,
		};
		this.usePool = options.pool?.usePool !== false;
		this.logger.debug('MySQLProvider initialized', {
			host: options.host,
			database: options.database,
			usePool: this.usePool,
			connectionLimit: options.pool?.connectionLimit ?? 10,
			charset: this.options.charset
		});

		if (this.options.charset && this.options.charset.toLowerCase() !== 'utf8mb4')
		{
			this.logger.warn('MySQL charset is not utf8mb4. Emoji and some Unicode characters may not be stored correctly.', {
				charset: this.options.charset
			});
		}
	}

	/**
	 * Connects using either a connection pool or a single connection.
	 */
	async connect(): Promise<void>
	{
		this.logger.debug('Connecting to MySQL database', { usePool: this.usePool });

		const { pool: poolConfig = {}, ...connectionOptions } = this.options;

		if (this.usePool)
		{
			const poolOptions: PoolOptions = {
				...connectionOptions,
				connectionLimit: poolConfig.connectionLimit ?? 10,
				queueLimit: poolConfig.queueLimit ?? 0,
			};
			if (poolConfig.idleTimeout !== undefined)
			{
				poolOptions.idleTimeout = poolConfig.idleTimeout;
			}

			this.logger.debug('Creating MySQL connection pool', {
				connectionLimit: poolOptions.connectionLimit,
				queueLimit: poolOptions.queueLimit
			});

			const pool = mysql.createPool(poolOptions);

			if (poolConfig.preConnect)
			{
				try
				{
					this.logger.debug('Testing connection pool with ping');
					const testConnection = await pool.getConnection();
					await testConnection.ping();
					testConnection.release();
				}
				catch (error)
				{
					this.logger.error('Connection pool test failed', { error: error instanceof Error ? error.message : String(error) });
					await pool.end();
					throw error;
				}
			}

			this.pool = pool;
			this.logger.info('MySQL connection pool created successfully');
		}
		else
		{
			this.connection = await mysql.createConnection(connectionOptions);
			this.logger.info('MySQL single connection created successfully');
		}
	}

	/**
	 * Closes the MySQL connection or connection pool.
	 */
	async disconnect(): Promise<void>
	{
		this.logger.debug('Disconnecting from MySQL database');

		if (this.transaction)
		{
			this.logger.warn('Disconnecting with an open transaction; it will be rolled back by the server');
			this.transaction.release();
			this.transaction = undefined;
		}

		if (this.pool)
		{
			await this.pool.end();
			this.pool = undefined;
			this.logger.info('MySQL connection pool closed');
		}
		else if (this.connection)
		{
			await this.connection.end();
			this.connection = undefined;
			this.logger.info('MySQL single connection closed');
		}
	}

	supportsConnectionPooling(): boolean
	{
		return true;
	}

	async execute<T = Record<string, unknown>>(sql: string, params: readonly BoundValue[], options: ExecuteOptions = {}): Promise<ExecuteResult<T>>
	{
		this.logger.debug('Executing SQL', { sql, params, returnInsertId: options.returnInsertId === true });

		const lease = await this.acquire();
		try
		{
			const [result] = await lease.connection.execute<RowDataPacket[] | ResultSetHeader>(sql, [...params]);

			if (Array.isArray(result))
			{
				const rows = result as T[];
				this.logger.debug('Statement returned rows', { rowCount: rows.length });
				return { rows, affectedRows: 0 };
			}

			this.logger.debug('Statement completed', { affectedRows: result.affectedRows, insertId: result.insertId });
			return { rows: [], affectedRows: result.affectedRows, insertId: result.insertId };
		}
		catch (error)
		{
			this.logger.error('MySQL statement failed', { sql, error: error instanceof Error ? error.message : String(error) });
			throw error;
		}
		finally
		{
			lease.release();
		}
	}

	async beginTransaction(): Promise<void>
	{
		if (this.transaction || this.transactionStarting) throw new Error('A transaction is already in progress');

		this.transactionStarting = true;
		try
		{
			const lease = await this.acquire();
			try
			{
				await lease.connection.beginTransaction();
			}
			catch (error)
			{
				lease.release();
				throw error;
			}
			this.transaction = lease;
		}
		finally
		{
			this.transactionStarting = false;
		}
		this.logger.info('Transaction started');
	}

	async commit(): Promise<void>
	{
		const lease = this.takeTransaction('commit');
		try
		{
			await lease.connection.commit();
			this.logger.info('Transaction committed');
		}
		catch (error)
		{
			this.logger.error('Commit failed, rolling back', { error: error instanceof Error ? error.message : String(error) });
			try
			{
				await lease.connection.rollback();
			}
			catch (rollbackError)
			{
				this.logger.warn('Rollback after failed commit also failed', { error: rollbackError instanceof Error ? rollbackError.message : String(rollbackError) });
			}
			throw error;
		}
		finally
		{
			lease.release();
		}
	}

	async rollback(): Promise<void>
	{
		const lease = this.takeTransaction('rollback');
		try
		{
			await lease.connection.rollback();
			this.logger.info('Transaction rolled back');
		}
		finally
		{
			lease.release();
		}
	}

	inTransaction(): boolean
	{
		return this.transaction !== undefined;
	}

	private takeTransaction(action: string): Lease
	{
		const lease = this.transaction;
		if (!lease) throw new Error(`Cannot ${action}: no transaction in progress`);
		this.transaction = undefined;
		return lease;
	}

	/**
	 * Borrows a connection: the transaction's, a pooled one, or the single connection.
	 */
	private async acquire(): Promise<Lease>
	{
		if (this.transaction)
		{
			return { connection: this.transaction.connection, release: () => { } };
		}
		if (this.pool)
		{
			const pooled = await this.pool.getConnection();
			return { connection: pooled, release: () => pooled.release() };
		}
		if (this.connection)
		{
			return { connection: this.connection, release: () => { } };
		}
		throw new ConnectionError('Not connected');
	}
}
