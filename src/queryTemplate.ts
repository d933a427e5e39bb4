import type { Dialect } from './identifierQuoter';
import type { PreparedQuery } from './preparedQuery';
import type { Param } from './params';
import { IdentifierQuoter } from './identifierQuoter';
import { MacroProcessor } from './macroProcessor';
import { PlaceholderProcessor } from './placeholderProcessor';
import { ParameterCountError } from './errors';
import { getLogger } from './logger';

/**
 * Engine configuration. Immutable for the lifetime of an engine instance.
 */
export interface QueryTemplateOptions
{
	/** Identifier quoting dialect, e.g. 'mysql', 'postgresql', 'sqlite' */
	dialect: Dialect;
	/** Prepended to every `?_name` identifier (default: '') */
	prefix?: string;
}

/**
 * Turns a query template and its parameters into a driver-ready statement.
 *
 * Macro blocks are resolved first, then placeholders are substituted, so a skipped
 * block's parameters never reach the placeholder pass.
 *
 * @example
 * const engine = new QueryTemplateEngine({ dialect: 'mysql', prefix: 'app_' });
 * engine.process('SELECT * FROM ?_users WHERE id IN (?a) { AND status = ? }', [[1, 2], SKIP]);
 * // => { sql: 'SELECT * FROM `app_users` WHERE id IN (?, ?) ', params: [1, 2] }
 */
export class QueryTemplateEngine
{
	private readonly logger = getLogger('QueryTemplateEngine');
	private readonly quoter: IdentifierQuoter;
	private readonly macros = new MacroProcessor();
	private readonly placeholders: PlaceholderProcessor;

	constructor(private readonly options: QueryTemplateOptions)
	{
		this.quoter = new IdentifierQuoter(options.dialect);
		this.placeholders = new PlaceholderProcessor(this.quoter, options.prefix ?? '');
	}

	process(query: string, params: readonly Param[] = []): PreparedQuery
	{
		const filtered = this.macros.filter(query, params);
		const { sql, params: bound, consumed } = this.placeholders.substitute(filtered.query, filtered.params);

		if (consumed < filtered.params.length)
		{
			this.logger.error('Too many parameters for query', { query, expected: consumed, received: filtered.params.length });
			throw new ParameterCountError(consumed, filtered.params.length);
		}

		this.logger.debug('Query template processed', { sql, params: bound });
		return { sql, params: bound };
	}

	getQuoter(): IdentifierQuoter
	{
		return this.quoter;
	}

	getPrefix(): string
	{
		return this.placeholders.getIdentifierPrefix();
	}

	/**
	 * Returns an engine with the same dialect and a different identifier prefix.
	 */
	withPrefix(prefix: string): QueryTemplateEngine
	{
		return new QueryTemplateEngine({ ...this.options, prefix });
	}
}
