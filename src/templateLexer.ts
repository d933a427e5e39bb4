/**
 * @file Single-pass lexer for query templates.
 *
 * Grammar (everything else is literal SQL text):
 *   ?            positional scalar placeholder
 *   ?a           array placeholder (IN list or SET list)
 *   ?#           identifier placeholder
 *   ?_name       prefixed identifier, name = [A-Za-z_][A-Za-z0-9_]*
 *   { ... }      macro block, content up to the first `}`; blocks do not nest
 *
 * A `{` without a later `}`, and an empty `{}`, are literal text. The lexer has no notion
 * of SQL string literals: a `?` or brace inside quotes is still template syntax.
 */

export type TemplateToken =
	| { readonly type: 'literal'; readonly text: string }
	| { readonly type: 'positional' }
	| { readonly type: 'array' }
	| { readonly type: 'identifier' }
	| { readonly type: 'prefixed'; readonly name: string }
	| { readonly type: 'blockStart' }
	| { readonly type: 'blockEnd' };

export type PlaceholderToken = Extract<TemplateToken, { type: 'positional' | 'array' | 'identifier' }>;

export interface LexerOptions
{
	/** Recognise `{ ... }` macro blocks (default: true). When false braces are literal. */
	macros?: boolean;
}

const NAME_START = /[A-Za-z_]/;
const NAME_PART = /[A-Za-z0-9_]/;

/**
 * Splits a query template into tokens. Adjacent literal text is merged into one token.
 */
export function tokenize(query: string, options: LexerOptions = {}): TemplateToken[]
{
	const macros = options.macros ?? true;
	const tokens: TemplateToken[] = [];
	let literal = '';
	let inBlock = false;

	const push = (token: TemplateToken) =>
	{
		if (literal)
		{
			tokens.push({ type: 'literal', text: literal });
			literal = '';
		}
		tokens.push(token);
	};

	let i = 0;
	while (i < query.length)
	{
		const char = query[i];
		const next = query[i + 1];

		if (char === '?')
		{
			if (next === 'a')
			{
				push({ type: 'array' });
				i += 2;
			}
			else if (next === '#')
			{
				push({ type: 'identifier' });
				i += 2;
			}
			else if (next === '_' && i + 2 < query.length && NAME_START.test(query[i + 2]))
			{
				let end = i + 3;
				while (end < query.length && NAME_PART.test(query[end])) end++;
				push({ type: 'prefixed', name: query.slice(i + 2, end) });
				i = end;
			}
			else
			{
				push({ type: 'positional' });
				i += 1;
			}
			continue;
		}

		if (macros && char === '{' && !inBlock)
		{
			const close = query.indexOf('}', i + 1);
			if (close > i + 1)
			{
				push({ type: 'blockStart' });
				inBlock = true;
				i += 1;
				continue;
			}
		}
		else if (macros && char === '}' && inBlock)
		{
			push({ type: 'blockEnd' });
			inBlock = false;
			i += 1;
			continue;
		}

		literal += char;
		i += 1;
	}

	if (literal) tokens.push({ type: 'literal', text: literal });
	return tokens;
}

export function isPlaceholder(token: TemplateToken): token is PlaceholderToken
{
	return token.type === 'positional' || token.type === 'array' || token.type === 'identifier';
}

/**
 * Number of parameters the tokens consume. `?_name` consumes none.
 */
export function countPlaceholders(tokens: readonly TemplateToken[]): number
{
	return tokens.filter(isPlaceholder).length;
}

/**
 * Source text of a token, as it appeared in the template.
 */
export function tokenText(token: TemplateToken): string
{
	switch (token.type)
	{
		case 'literal':
			return token.text;
		case 'positional':
			return '?';
		case 'array':
			return '?a';
		case 'identifier':
			return '?#';
		case 'prefixed':
			return `?_${token.name}`;
		case 'blockStart':
			return '{';
		case 'blockEnd':
			return '}';
	}
}
