/**
 * @file Parameter model for query templates.
 *
 * A parameter is one of: a scalar, a typed-value wrapper, a sequence (rendered as an
 * `IN (...)` list by `?a`), a mapping (rendered as a `SET` list by `?a`), or the `SKIP`
 * marker that removes the macro block it lands in.
 */

/**
 * Values handed to the driver.
 */
export type Scalar = string | number | bigint | boolean | null | Date | Uint8Array;

/**
 * Capability of domain value objects that hold a validated value and can expose the
 * underlying native one. Wrappers are unwrapped before anything reaches the driver.
 */
export interface NativeExtractable
{
	toNative(): Scalar;
}

/**
 * Convenience base class for typed-value wrappers.
 *
 * @example
 * class Email extends TypedValue<string> {
 *     constructor(value: string) { super(value.trim().toLowerCase()); }
 * }
 * await db.select('SELECT * FROM ?_users WHERE email = ?', new Email(' A@B.io '));
 */
export abstract class TypedValue<T extends Scalar = Scalar> implements NativeExtractable
{
	constructor(protected readonly value: T) { }

	toNative(): T
	{
		return this.value;
	}
}

/**
 * Marker that drops the enclosing `{ ... }` macro block together with its parameters.
 * Registered globally so separately loaded copies of the library agree on it.
 */
export const SKIP: unique symbol = Symbol.for('sqlstencil.skip');

export type Skip = typeof SKIP;

export type ScalarParam = Scalar | NativeExtractable;

export type ParamMapping = { readonly [key: string]: ScalarParam } | ReadonlyMap<string | number, ScalarParam>;

export type ParamList = readonly ScalarParam[];

export type Param = ScalarParam | ParamList | ParamMapping | Skip;

/**
 * Value bound to a driver placeholder after unwrapping.
 */
export type BoundValue = Scalar;

export function isSkip(value: unknown): value is Skip
{
	return value === SKIP;
}

export function isNativeExtractable(value: unknown): value is NativeExtractable
{
	return typeof value === 'object'
		&& value !== null
		&& 'toNative' in value
		&& typeof value.toNative === 'function';
}

/**
 * Replaces a typed-value wrapper with its native value; anything else passes through.
 */
export function unwrapValue(value: ScalarParam): Scalar
{
	return isNativeExtractable(value) ? value.toNative() : value;
}

export function isParamList(value: Param): value is ParamList
{
	return Array.isArray(value);
}

export function isParamMap(value: Param): value is ReadonlyMap<string | number, ScalarParam>
{
	return value instanceof Map;
}

/**
 * Plain objects only: dates, buffers, maps and typed-value wrappers are not records.
 */
export function isParamRecord(value: Param): value is { readonly [key: string]: ScalarParam }
{
	if (typeof value !== 'object' || value === null || Array.isArray(value) || isNativeExtractable(value)) return false;

	const proto: unknown = Object.getPrototypeOf(value);
	return proto === Object.prototype || proto === null;
}

export type CollectionEntry = readonly [key: string | number, value: ScalarParam];

/**
 * Entries of an array-like parameter in iteration order, or `undefined` if the value is
 * neither a sequence nor a mapping.
 */
export function collectionEntries(value: Param): CollectionEntry[] | undefined
{
	if (isParamList(value)) return Object.entries(value);
	if (isParamMap(value)) return Array.from(value.entries());
	if (isParamRecord(value)) return Object.entries(value);
	return undefined;
}

/**
 * A collection is associative unless its keys are exactly 0..n-1 in order.
 * Array and plain-object keys arrive as strings; Map keys must be actual numbers.
 */
export function isAssociative(value: Param, entries: readonly CollectionEntry[]): boolean
{
	if (isParamList(value) && entries.length !== value.length) return true;

	return entries.some(([key], index) =>
		isParamMap(value) ? key !== index : key !== String(index));
}
