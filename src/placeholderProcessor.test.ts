import { describe, it, expect } from 'vitest';
import { PlaceholderProcessor } from './placeholderProcessor';
import { IdentifierQuoter } from './identifierQuoter';
import { SKIP, TypedValue } from './params';
import { ArrayParamError, IdentifierTypeError, MissingParameterError } from './errors';

class UserId extends TypedValue<number> { }

class ColumnName extends TypedValue<string> { }

describe('PlaceholderProcessor', () =>
{
	const processor = new PlaceholderProcessor(new IdentifierQuoter('mysql'), 'app_');

	describe('prefixed identifiers', () =>
	{
		it('should quote the prefixed name without consuming a parameter', () =>
		{
			expect(processor.substitute('SELECT * FROM ?_users WHERE id = ?', [5])).toEqual({
				sql: 'SELECT * FROM `app_users` WHERE id = ?',
				params: [5],
				consumed: 1,
			});
		});

		it('should default to an empty prefix', () =>
		{
			const plain = new PlaceholderProcessor(new IdentifierQuoter('postgresql'));

			expect(plain.getIdentifierPrefix()).toBe('');
			expect(plain.substitute('SELECT * FROM ?_users', []).sql).toBe('SELECT * FROM "users"');
		});
	});

	describe('identifier placeholder ?#', () =>
	{
		it('should quote a qualified identifier', () =>
		{
			expect(processor.substitute('SELECT ?# FROM t', ['users.name']).sql).toBe('SELECT `users`.`name` FROM t');
		});

		it('should unwrap a typed value holding a string', () =>
		{
			expect(processor.substitute('ORDER BY ?#', [new ColumnName('created_at')]).sql).toBe('ORDER BY `created_at`');
		});

		it('should reject a non-string parameter', () =>
		{
			expect(() => processor.substitute('SELECT ?#', [5])).toThrow(IdentifierTypeError);
			expect(() => processor.substitute('SELECT ?#', [5]))
				.toThrow('Identifier placeholder ?# requires a string parameter, got number');
		});
	});

	describe('array placeholder ?a', () =>
	{
		it('should expand a list into an IN list', () =>
		{
			expect(processor.substitute('WHERE id IN (?a)', [[1, 2, 3]])).toEqual({
				sql: 'WHERE id IN (?, ?, ?)',
				params: [1, 2, 3],
				consumed: 1,
			});
		});

		it('should expand a record into a SET list', () =>
		{
			expect(processor.substitute('UPDATE t SET ?a', [{ name: 'Ann', age: 30 }])).toEqual({
				sql: 'UPDATE t SET `name` = ?, `age` = ?',
				params: ['Ann', 30],
				consumed: 1,
			});
		});

		it('should treat a record keyed 0..n-1 as a list', () =>
		{
			expect(processor.substitute('IN (?a)', [{ 0: 'a', 1: 'b' }]).sql).toBe('IN (?, ?)');
		});

		it('should treat a map with numeric keys 0..n-1 as a list', () =>
		{
			const values = new Map<number, string>([[0, 'a'], [1, 'b']]);

			expect(processor.substitute('IN (?a)', [values]).sql).toBe('IN (?, ?)');
		});

		it('should treat a map with string keys as associative', () =>
		{
			const values = new Map<string, string>([['0', 'a']]);

			expect(processor.substitute('SET ?a', [values])).toEqual({
				sql: 'SET `0` = ?',
				params: ['a'],
				consumed: 1,
			});
		});

		it('should treat a sparse array as associative', () =>
		{
			const values: number[] = [];
			values[0] = 10;
			values[2] = 30;

			expect(processor.substitute('SET ?a', [values]).sql).toBe('SET `0` = ?, `2` = ?');
		});

		it('should unwrap typed values inside a list', () =>
		{
			expect(processor.substitute('IN (?a)', [[new UserId(7), 8]]).params).toEqual([7, 8]);
		});

		it('should reject an empty collection', () =>
		{
			expect(() => processor.substitute('IN (?a)', [[]])).toThrow(ArrayParamError);
			expect(() => processor.substitute('IN (?a)', [{}])).toThrow('Array placeholder ?a cannot be empty');
		});

		it('should reject a scalar', () =>
		{
			expect(() => processor.substitute('IN (?a)', [5]))
				.toThrow('Array placeholder ?a requires an array or mapping parameter, got number');
		});
	});

	describe('positional placeholder ?', () =>
	{
		it('should bind scalars as they are', () =>
		{
			const when = new Date('2024-01-02T03:04:05Z');

			expect(processor.substitute('VALUES (?, ?, ?, ?)', ['x', null, true, when]).params).toEqual(['x', null, true, when]);
		});

		it('should unwrap typed values', () =>
		{
			expect(processor.substitute('WHERE id = ?', [new UserId(42)]).params).toEqual([42]);
		});

		it('should reject a list or a mapping', () =>
		{
			expect(() => processor.substitute('WHERE id = ?', [[1, 2]])).toThrow(ArrayParamError);
			expect(() => processor.substitute('WHERE id = ?', [{ a: 1 }])).toThrow(ArrayParamError);
		});
	});

	describe('missing parameters', () =>
	{
		it('should report the placeholder and its position', () =>
		{
			expect(() => processor.substitute('a = ? AND b = ?', [1])).toThrow(MissingParameterError);
			expect(() => processor.substitute('a = ? AND b = ?', [1]))
				.toThrow('Missing parameter for placeholder ? at position 1');
		});

		it('should treat SKIP as a missing parameter', () =>
		{
			expect(() => processor.substitute('a IN (?a)', [SKIP]))
				.toThrow('Missing parameter for placeholder ?a at position 0');
		});
	});

	it('should leave braces as literal text', () =>
	{
		expect(processor.substitute('SELECT { ? }', [1]).sql).toBe('SELECT { ? }');
	});

	it('should report how many parameters were consumed', () =>
	{
		expect(processor.substitute('a = ?', [1, 2, 3]).consumed).toBe(1);
	});
});
