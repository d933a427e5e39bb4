/**
 * Identifier quote characters per dialect.
 * Dialects not listed here fall back to ANSI double quotes.
 */
const QUOTE_PAIRS: Readonly<Record<string, readonly [open: string, close: string]>> = {
	mysql: ['`', '`'],
	mariadb: ['`', '`'],
	pgsql: ['"', '"'],
	postgres: ['"', '"'],
	postgresql: ['"', '"'],
	sqlite: ['"', '"'],
	sqlite3: ['"', '"'],
	sqlsrv: ['[', ']'],
	sqlserver: ['[', ']'],
	mssql: ['[', ']'],
	oci: ['"', '"'],
	oracle: ['"', '"'],
	firebird: ['"', '"'],
};

const DEFAULT_PAIR = ['"', '"'] as const;

export type Dialect = string;

/**
 * Quotes table and column names for a specific database dialect.
 * Every identifier is always quoted, so reserved words and unusual characters are safe.
 */
export class IdentifierQuoter
{
	private readonly dialect: Dialect;
	private readonly openChar: string;
	private readonly closeChar: string;

	constructor(dialect: Dialect)
	{
		this.dialect = dialect.toLowerCase();
		const [open, close] = QUOTE_PAIRS[this.dialect] ?? DEFAULT_PAIR;
		this.openChar = open;
		this.closeChar = close;
	}

	/**
	 * Quote an identifier, splitting qualified names on every dot.
	 * @param identifier Identifier (e.g., "users.id" or "id")
	 * @returns Quoted identifier (e.g., "`users`.`id`" or "`id`" for MySQL)
	 */
	quoteIdentifier(identifier: string): string
	{
		return identifier.split('.').map(part => this.quoteSegment(part)).join('.');
	}

	quoteIdentifiers(identifiers: readonly string[]): string[]
	{
		return identifiers.map(identifier => this.quoteIdentifier(identifier));
	}

	getDialect(): Dialect
	{
		return this.dialect;
	}

	private quoteSegment(segment: string): string
	{
		const bare = this.stripQuotes(segment);

		// The closing character is the one that terminates the identifier, so it is the one
		// doubled. For symmetric pairs it is the opening character as well.
		const escaped = bare.split(this.closeChar).join(this.closeChar + this.closeChar);

		return this.openChar + escaped + this.closeChar;
	}

	private stripQuotes(segment: string): string
	{
		const isQuote = (char: string | undefined) => char === this.openChar || char === this.closeChar;

		let start = 0;
		let end = segment.length;
		while (start < end && isQuote(segment[start])) start++;
		while (end > start && isQuote(segment[end - 1])) end--;

		return segment.slice(start, end);
	}
}
