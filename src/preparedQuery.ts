/**
 * PreparedQuery - driver-ready statement produced by the template engine.
 *
 * Every macro block has been resolved and every special placeholder rewritten, so the
 * SQL contains only `?` markers, one per entry in `params`. Providers execute it as is
 * (PostgreSQL renumbers the markers to `$n`).
 *
 * @module preparedQuery
 */

import type { BoundValue } from './params';

export interface PreparedQuery
{
	/** SQL with `?` placeholders */
	sql: string;

	/** Parameter values in placeholder order */
	params: BoundValue[];
}
