import { describe, it, expect } from 'vitest';
import { IdentifierQuoter } from './identifierQuoter';

describe('IdentifierQuoter', () =>
{
	describe('dialect quote characters', () =>
	{
		it('should use backticks for MySQL and MariaDB', () =>
		{
			expect(new IdentifierQuoter('mysql').quoteIdentifier('users')).toBe('`users`');
			expect(new IdentifierQuoter('mariadb').quoteIdentifier('users')).toBe('`users`');
		});

		it('should use double quotes for PostgreSQL, SQLite and Oracle', () =>
		{
			expect(new IdentifierQuoter('postgresql').quoteIdentifier('users')).toBe('"users"');
			expect(new IdentifierQuoter('pgsql').quoteIdentifier('users')).toBe('"users"');
			expect(new IdentifierQuoter('sqlite').quoteIdentifier('users')).toBe('"users"');
			expect(new IdentifierQuoter('oci').quoteIdentifier('users')).toBe('"users"');
		});

		it('should use square brackets for SQL Server', () =>
		{
			expect(new IdentifierQuoter('sqlsrv').quoteIdentifier('users')).toBe('[users]');
			expect(new IdentifierQuoter('mssql').quoteIdentifier('users')).toBe('[users]');
		});

		it('should fall back to double quotes for unknown dialects', () =>
		{
			expect(new IdentifierQuoter('cockroach').quoteIdentifier('users')).toBe('"users"');
		});

		it('should match dialect names case-insensitively', () =>
		{
			const quoter = new IdentifierQuoter('MySQL');

			expect(quoter.getDialect()).toBe('mysql');
			expect(quoter.quoteIdentifier('users')).toBe('`users`');
		});
	});

	describe('quoteIdentifier', () =>
	{
		it('should quote every segment of a qualified name', () =>
		{
			const quoter = new IdentifierQuoter('mysql');

			expect(quoter.quoteIdentifier('shop.users')).toBe('`shop`.`users`');
			expect(quoter.quoteIdentifier('shop.users.id')).toBe('`shop`.`users`.`id`');
		});

		it('should not double-quote an identifier that is already quoted', () =>
		{
			expect(new IdentifierQuoter('mysql').quoteIdentifier('`users`')).toBe('`users`');
			expect(new IdentifierQuoter('postgresql').quoteIdentifier('"users"')).toBe('"users"');
			expect(new IdentifierQuoter('sqlsrv').quoteIdentifier('[users]')).toBe('[users]');
		});

		it('should double embedded closing quote characters', () =>
		{
			expect(new IdentifierQuoter('mysql').quoteIdentifier('we`ird')).toBe('`we``ird`');
			expect(new IdentifierQuoter('postgresql').quoteIdentifier('we"ird')).toBe('"we""ird"');
			expect(new IdentifierQuoter('sqlsrv').quoteIdentifier('we]ird')).toBe('[we]]ird]');
		});

		it('should quote reserved words and names with spaces', () =>
		{
			const quoter = new IdentifierQuoter('postgresql');

			expect(quoter.quoteIdentifier('order')).toBe('"order"');
			expect(quoter.quoteIdentifier('first name')).toBe('"first name"');
		});
	});

	it('should quote a list of identifiers', () =>
	{
		expect(new IdentifierQuoter('sqlite').quoteIdentifiers(['id', 'users.name'])).toEqual(['"id"', '"users"."name"']);
	});
});
