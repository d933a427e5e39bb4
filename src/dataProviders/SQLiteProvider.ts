import type { DataProvider, ExecuteOptions, ExecuteResult } from '../dataProvider';
import type { BoundValue } from '../params';
import sqlite3 from 'sqlite3';
import type { Database } from 'sqlite';
import { open } from 'sqlite';
import { getLogger } from '../logger';
import { ConnectionError } from '../errors';

/**
 * Options for connecting to and operating on a SQLite database.
 */
export interface SQLiteProviderOptions
{
	/** The file path to the SQLite database, or ':memory:'. */
	filename: string;
	/** Open the database read-only (default: false) */
	readOnly?: boolean;
	/** Switch the journal to WAL mode after connecting (default: false) */
	enableWAL?: boolean;
}

/**
 * Statements that produce a result set and therefore go through `all()`.
 */
const ROW_RETURNING = /^\s*(SELECT|WITH|PRAGMA|VALUES|EXPLAIN)\b|\bRETURNING\b/i;

/**
 * SQLite provider on top of `sqlite` (promise wrapper) and `sqlite3`.
 * A single handle serves every statement, so a transaction covers everything run on it.
 */
export class SQLiteProvider implements DataProvider
{
	readonly dialect = 'sqlite';

	private db?: Database;
	private transactionOpen = false;
	private transactionStarting = false;
	private readonly options: SQLiteProviderOptions;
	private readonly logger = getLogger('SQLiteProvider');

	constructor(options: SQLiteProviderOptions)
	{
		this.options = options;
		this.logger.debug('SQLiteProvider initialized', {
			filename: options.filename,
			readOnly: options.readOnly === true,
			enableWAL: options.enableWAL === true
		});
	}

	async connect(): Promise<void>
	{
		this.logger.debug('Connecting to SQLite database', { filename: this.options.filename });

		this.db = await open({
			filename: this.options.filename,
			driver: sqlite3.Database,
			mode: this.options.readOnly ? sqlite3.OPEN_READONLY : sqlite3.OPEN_READWRITE | sqlite3.OPEN_CREATE,
		});

		if (this.options.enableWAL)
		{
			await this.db.exec('PRAGMA journal_mode = WAL;');
			this.logger.debug('WAL mode enabled');
		}

		this.logger.info('SQLite database connected successfully', { filename: this.options.filename });
	}

	async disconnect(): Promise<void>
	{
		this.logger.debug('Disconnecting from SQLite database');

		if (this.db)
		{
			await this.db.close();
			this.db = undefined;
			this.transactionOpen = false;
			this.logger.info('SQLite database disconnected successfully');
		}
	}

	async execute<T = Record<string, unknown>>(sql: string, params: readonly BoundValue[], options: ExecuteOptions = {}): Promise<ExecuteResult<T>>
	{
		const db = this.getConnection();
		this.logger.debug('Executing SQL', { sql, params, returnInsertId: options.returnInsertId === true });

		try
		{
			if (ROW_RETURNING.test(sql))
			{
				const rows = await db.all<T[]>(sql, ...params);
				this.logger.debug('Statement returned rows', { rowCount: rows.length });
				return { rows, affectedRows: 0 };
			}

			const result = await db.run(sql, ...params);
			this.logger.debug('Statement completed', { changes: result.changes, lastID: result.lastID });
			return { rows: [], affectedRows: result.changes ?? 0, insertId: result.lastID };
		}
		catch (error)
		{
			this.logger.error('SQLite statement failed', { sql, error: error instanceof Error ? error.message : String(error) });
			throw error;
		}
	}

	async beginTransaction(): Promise<void>
	{
		if (this.transactionOpen || this.transactionStarting) throw new Error('A transaction is already in progress');

		const db = this.getConnection();
		this.transactionStarting = true;
		try
		{
			await db.exec('BEGIN');
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
		if (!this.transactionOpen) throw new Error('Cannot commit: no transaction in progress');

		const db = this.getConnection();
		try
		{
			await db.exec('COMMIT');
			this.logger.info('Transaction committed');
		}
		catch (error)
		{
			// a failed COMMIT (e.g. a deferred constraint) leaves the transaction open
			this.logger.error('Commit failed, rolling back', { error: error instanceof Error ? error.message : String(error) });
			await this.rollbackAfterFailedCommit(db);
			throw error;
		}
		finally
		{
			this.transactionOpen = false;
		}
	}

	async rollback(): Promise<void>
	{
		if (!this.transactionOpen) throw new Error('Cannot rollback: no transaction in progress');

		const db = this.getConnection();
		try
		{
			await db.exec('ROLLBACK');
			this.logger.info('Transaction rolled back');
		}
		finally
		{
			this.transactionOpen = false;
		}
	}

	inTransaction(): boolean
	{
		return this.transactionOpen;
	}

	private async rollbackAfterFailedCommit(db: Database): Promise<void>
	{
		try
		{
			await db.exec('ROLLBACK');
			this.logger.info('Transaction rolled back');
		}
		catch (rollbackError)
		{
			// SQLite may already have rolled back on its own
			this.logger.warn('Rollback after failed commit also failed', { error: rollbackError instanceof Error ? rollbackError.message : String(rollbackError) });
		}
	}

	private getConnection(): Database
	{
		if (!this.db) throw new ConnectionError('Not connected');
		return this.db;
	}
}
