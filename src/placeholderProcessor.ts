import type { IdentifierQuoter } from './identifierQuoter';
import { ArrayParamError, IdentifierTypeError, MissingParameterError } from './errors';
import type { BoundValue, Param, Scalar, Skip } from './params';
import {
	collectionEntries, isAssociative, isNativeExtractable, isParamList, isParamMap, isParamRecord, isSkip, unwrapValue
} from './params';
import { tokenize, tokenText } from './templateLexer';
import { getLogger } from './logger';

/**
 * Result of placeholder substitution.
 */
export interface SubstitutionResult
{
	/** Driver-ready SQL using `?` for every bound value */
	sql: string;
	/** Bound values in placeholder order, typed wrappers unwrapped */
	params: BoundValue[];
	/** Number of input parameters the placeholders consumed */
	consumed: number;
}

/**
 * Rewrites `?_name`, `?#`, `?a` and `?` placeholders into driver-ready SQL.
 * Macro blocks must already be resolved; braces are treated as plain text here.
 */
export class PlaceholderProcessor
{
	private readonly logger = getLogger('PlaceholderProcessor');

	constructor(
		private readonly quoter: IdentifierQuoter,
		private readonly identifierPrefix = ''
	) { }

	getIdentifierPrefix(): string
	{
		return this.identifierPrefix;
	}

	substitute(query: string, params: readonly Param[]): SubstitutionResult
	{
		const sql: string[] = [];
		const bound: BoundValue[] = [];
		let index = 0;

		// SKIP only has meaning inside a macro block; one reaching a placeholder is no value at all.
		const next = (token: string): Exclude<Param, Skip> =>
		{
			const value = index < params.length ? params[index] : undefined;
			if (value === undefined || isSkip(value))
			{
				this.logger.error('Missing parameter for placeholder', { token, index, available: params.length });
				throw new MissingParameterError(token, index);
			}
			index++;
			return value;
		};

		for (const token of tokenize(query, { macros: false }))
		{
			switch (token.type)
			{
				case 'prefixed':
					sql.push(this.quoter.quoteIdentifier(this.identifierPrefix + token.name));
					break;

				case 'identifier':
					sql.push(this.quoter.quoteIdentifier(this.identifierValue(next('?#'))));
					break;

				case 'array':
					sql.push(this.expandArray(next('?a'), bound));
					break;

				case 'positional':
					bound.push(this.scalarValue(next('?')));
					sql.push('?');
					break;

				default:
					sql.push(tokenText(token));
			}
		}

		return { sql: sql.join(''), params: bound, consumed: index };
	}

	private identifierValue(param: Exclude<Param, Skip>): string
	{
		const value = isNativeExtractable(param) ? param.toNative() : param;
		if (typeof value !== 'string')
		{
			const message = `Identifier placeholder ?# requires a string parameter, got ${describeType(value)}`;
			this.logger.error(message);
			throw new IdentifierTypeError(message);
		}
		return value;
	}

	private scalarValue(param: Exclude<Param, Skip>): Scalar
	{
		if (isParamList(param) || isParamMap(param) || isParamRecord(param))
		{
			const message = 'Placeholder ? requires a scalar parameter; use ?a to expand arrays and mappings';
			this.logger.error(message);
			throw new ArrayParamError(message);
		}
		return unwrapValue(param);
	}

	/**
	 * Expands `?a` into a SET list (`key = ?, ...`) for associative collections or an
	 * IN list (`?, ?, ...`) for sequences, appending the unwrapped values to `bound`.
	 */
	private expandArray(param: Exclude<Param, Skip>, bound: BoundValue[]): string
	{
		const entries = collectionEntries(param);
		if (entries === undefined)
		{
			const message = `Array placeholder ?a requires an array or mapping parameter, got ${describeType(param)}`;
			this.logger.error(message);
			throw new ArrayParamError(message);
		}
		if (entries.length === 0)
		{
			this.logger.error('Array placeholder ?a cannot be empty');
			throw new ArrayParamError('Array placeholder ?a cannot be empty');
		}

		if (isAssociative(param, entries))
		{
			return entries.map(([key, value]) =>
			{
				bound.push(unwrapValue(value));
				return `${this.quoter.quoteIdentifier(String(key))} = ?`;
			}).join(', ');
		}

		return entries.map(([, value]) =>
		{
			bound.push(unwrapValue(value));
			return '?';
		}).join(', ');
	}
}

function describeType(value: unknown): string
{
	if (value === null) return 'null';
	if (Array.isArray(value)) return 'array';
	if (value instanceof Map) return 'map';
	return typeof value;
}
