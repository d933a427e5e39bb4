/**
 * Location in user code that issued a query.
 */
export interface CallerInfo
{
	file: string;
	line: number;
	function: string;
}

const UNKNOWN_CALLER: CallerInfo = { file: 'unknown', line: 0, function: 'unknown' };

// "    at [async ]fn (/path/file.ts:12:5)" or "    at /path/file.ts:12:5"
const FRAME = /^\s*at (?:async )?(?:(.+?) \()?(.+?):(\d+):\d+\)?$/;

function normalizePath(file: string): string
{
	return file.startsWith('file://') ? decodeURIComponent(file.slice('file://'.length)) : file;
}

/**
 * Finds the first stack frame that is not in one of `internalFiles`.
 * @param internalFiles Absolute paths of library modules to step over.
 */
export function findCaller(internalFiles: readonly string[], stack = new Error().stack ?? ''): CallerInfo
{
	const internal = new Set([__filename, ...internalFiles].map(normalizePath));

	for (const line of stack.split('\n').slice(1))
	{
		const match = FRAME.exec(line);
		if (!match) continue;

		const [, fn, file, lineNumber] = match;
		const path = normalizePath(file);
		if (internal.has(path) || path.startsWith('node:')) continue;

		return {
			file: path,
			line: Number(lineNumber),
			function: fn ?? '<anonymous>',
		};
	}

	return UNKNOWN_CALLER;
}
