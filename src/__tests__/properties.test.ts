import { describe, it, expect } from 'vitest';
import type { Param } from '../params';
import { IdentifierQuoter, QueryTemplateEngine, SKIP, TypedValue } from '../index';

class Quantity extends TypedValue<number> { }

/**
 * Template properties that hold across dialects and inputs.
 */
describe('Template Engine Properties', () =>
{
	const dialects = ['mysql', 'postgresql', 'sqlite', 'sqlsrv'];

	it('should quote idempotently in every dialect', () =>
	{
		for (const dialect of dialects)
		{
			const quoter = new IdentifierQuoter(dialect);
			for (const name of ['users', 'shop.users', 'order', 'first name'])
			{
				const once = quoter.quoteIdentifier(name);
				expect(quoter.quoteIdentifier(once)).toBe(once);
			}
		}
	});

	it('should bind exactly as many values as the SQL has markers', () =>
	{
		const engine = new QueryTemplateEngine({ dialect: 'mysql', prefix: 'p_' });
		const cases: Array<[string, Param[]]> = [
			['SELECT * FROM ?_t WHERE a = ?', [1]],
			['SELECT * FROM ?# WHERE id IN (?a)', ['t', [1, 2, 3]]],
			['UPDATE t SET ?a WHERE id = ?', [{ a: 1, b: 2 }, 9]],
			['SELECT 1 { AND a = ? } { AND b IN (?a) } { AND c = ? }', [SKIP, [4, 5], 6]],
			['SELECT 1 { AND a = ? AND b = ? }', [1, SKIP]],
		];

		for (const [template, params] of cases)
		{
			const { sql, params: bound } = engine.process(template, params);
			expect(sql.split('?').length - 1).toBe(bound.length);
		}
	});

	it('should select blocks independently of each other', () =>
	{
		const engine = new QueryTemplateEngine({ dialect: 'sqlite' });
		const template = 'SELECT 1{ A ?}{ B ?}{ C ?}';

		expect(engine.process(template, [1, 2, 3]).sql).toBe('SELECT 1 A ? B ? C ?');
		expect(engine.process(template, [SKIP, 2, 3]).sql).toBe('SELECT 1 B ? C ?');
		expect(engine.process(template, [1, SKIP, 3]).sql).toBe('SELECT 1 A ? C ?');
		expect(engine.process(template, [1, 2, SKIP]).sql).toBe('SELECT 1 A ? B ?');
		expect(engine.process(template, [SKIP, SKIP, SKIP]).sql).toBe('SELECT 1');
	});

	it('should give the same result for a typed value and its native value', () =>
	{
		const engine = new QueryTemplateEngine({ dialect: 'postgresql' });
		const template = 'UPDATE t SET ?a WHERE q = ? AND r IN (?a) { AND s = ? }';

		expect(engine.process(template, [{ total: new Quantity(2) }, new Quantity(3), [new Quantity(4), 5], new Quantity(6)]))
			.toEqual(engine.process(template, [{ total: 2 }, 3, [4, 5], 6]));
	});

	it('should never consume a parameter for a prefixed name, in or out of a block', () =>
	{
		const engine = new QueryTemplateEngine({ dialect: 'mysql', prefix: 'p_' });
		const template = 'SELECT 1 { AND ?_t.x = ? } WHERE a = ?';

		expect(engine.process(template, [SKIP, 5])).toEqual({
			sql: 'SELECT 1  WHERE a = ?',
			params: [5],
		});
		expect(engine.process(template, [4, 5])).toEqual({
			sql: 'SELECT 1  AND `p_t`.x = ?  WHERE a = ?',
			params: [4, 5],
		});
	});

	it('should bind null as a value rather than skipping', () =>
	{
		const engine = new QueryTemplateEngine({ dialect: 'mysql' });

		expect(engine.process('SELECT 1 { AND deleted_at <=> ? }', [null])).toEqual({
			sql: 'SELECT 1  AND deleted_at <=> ? ',
			params: [null],
		});
	});
});
