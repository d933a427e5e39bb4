import type { Param } from './params';
import type { TemplateToken } from './templateLexer';
import { isSkip } from './params';
import { countPlaceholders, isPlaceholder, tokenText, tokenize } from './templateLexer';
import { getLogger } from './logger';

/**
 * Query and parameters after macro blocks have been resolved.
 */
export interface FilteredTemplate
{
	query: string;
	params: Param[];
}

interface Segment
{
	kind: 'text' | 'block';
	tokens: TemplateToken[];
}

/**
 * Resolves `{ ... }` macro blocks.
 *
 * A block is kept when none of the parameters aligned with its placeholders is `SKIP`;
 * otherwise its text and all of its parameters are removed. `SKIP` outside any block is
 * dropped from the parameter list on its own, leaving its placeholder without a value.
 *
 * @example
 * filter('SELECT * FROM t WHERE a = ? { AND b = ? }', [1, SKIP])
 * // => { query: 'SELECT * FROM t WHERE a = ? ', params: [1] }
 */
export class MacroProcessor
{
	private readonly logger = getLogger('MacroProcessor');

	filter(query: string, params: readonly Param[]): FilteredTemplate
	{
		const output: string[] = [];
		const kept: Param[] = [];
		let cursor = 0;
		let dropped = 0;

		for (const segment of this.segments(tokenize(query)))
		{
			if (segment.kind === 'text')
			{
				for (const token of segment.tokens)
				{
					output.push(tokenText(token));
					if (!isPlaceholder(token)) continue;

					if (cursor < params.length && !isSkip(params[cursor])) kept.push(params[cursor]);
					cursor++;
				}
				continue;
			}

			const needed = countPlaceholders(segment.tokens);
			const slice = params.slice(cursor, cursor + needed);
			cursor += needed;

			if (slice.some(isSkip))
			{
				dropped++;
				continue;
			}

			output.push(segment.tokens.map(tokenText).join(''));
			kept.push(...slice);
		}

		// Parameters beyond the last placeholder are carried over so the caller can detect
		// the count mismatch.
		for (let i = cursor; i < params.length; i++)
		{
			if (!isSkip(params[i])) kept.push(params[i]);
		}

		if (dropped > 0)
		{
			this.logger.debug('Macro blocks skipped', { dropped, remainingParams: kept.length });
		}

		return { query: output.join(''), params: kept };
	}

	/**
	 * Groups tokens into top-level text runs and macro blocks (delimiters removed).
	 */
	private segments(tokens: readonly TemplateToken[]): Segment[]
	{
		const segments: Segment[] = [];
		let current: Segment = { kind: 'text', tokens: [] };

		for (const token of tokens)
		{
			if (token.type === 'blockStart' || token.type === 'blockEnd')
			{
				if (current.tokens.length > 0) segments.push(current);
				current = { kind: token.type === 'blockStart' ? 'block' : 'text', tokens: [] };
				continue;
			}
			current.tokens.push(token);
		}

		if (current.tokens.length > 0) segments.push(current);
		return segments;
	}
}
