/**
 * Merges two lists without duplicates. Items of `list1` come first, in their
 * original order, followed by the items of `list2` not already present.
 *
 * When `caseSensitive` is false, 'abc' and 'ABC' count as the same item and
 * the spelling found first (so `list1`'s, if it has one) is kept.
 */
export const mergeListsUnique = (
	list1: readonly string[],
	list2: readonly string[],
	caseSensitive = true
): string[] => {
	const seen = new Map<string, string>();

	for (const item of [...list1, ...list2]) {
		const key = caseSensitive ? item : item.toLowerCase();
		if (!seen.has(key)) {
			seen.set(key, item);
		}
	}

	return [...seen.values()];
};

/** Left-pads an integer with zeros to `digits` characters (sign excluded). */
export const padNumber = (value: number, digits: number) => {
	const sign = value < 0 ? '-' : '';
	return sign + String(Math.abs(value)).padStart(digits, '0');
};

export const kebabToCamel = (value: string) =>
	value.replace(/-+([a-zA-Z0-9])/g, (_, character: string) =>
		character.toUpperCase()
	);

export const escapeRegExp = (value: string) =>
	value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/** Joins entries into a string with one entry per line. */
export const formatMultiLine = (items: readonly string[]) => items.join('\n');
