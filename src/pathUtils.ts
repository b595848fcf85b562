/** A child index (arrays, tuples, maybes) or a dictionary key. */
export type PathSegment = string | number;

const PLAIN_NAME = /^[^.[\]"]+$/;
const PATH_TOKEN = /\[\d+\]|\["(?:[^"\\]|\\.)*"\]|[^.[\]"]+/g;

/** Writes `favorites[2]`, `[0].name` or `extras["a.b"]` for names that need quoting. */
export function buildPathKey(segments: readonly PathSegment[]): string {
	return segments
		.map((segment, index) => {
			if (typeof segment === 'number') {
				return `[${segment}]`;
			}

			if (!PLAIN_NAME.test(segment)) {
				return `[${JSON.stringify(segment)}]`;
			}

			return index === 0 ? segment : `.${segment}`;
		})
		.join('');
}

/** Appends a node path to a dotted prefix: `extras.dpi`, `favorites[2]`. */
export function appendPathKey(prefix: string, segments: readonly PathSegment[]): string {
	const pathKey = buildPathKey(segments);
	if (!pathKey || pathKey.startsWith('[')) {
		return `${prefix}${pathKey}`;
	}

	return `${prefix}.${pathKey}`;
}

export function parsePathKey(pathKey: string): PathSegment[] {
	const tokens = pathKey.match(PATH_TOKEN) ?? [];

	return tokens.map((token): PathSegment => {
		if (token.startsWith('["')) {
			const name: unknown = JSON.parse(token.slice(1, -1));
			return typeof name === 'string' ? name : token;
		}

		if (token.startsWith('[')) {
			return Number.parseInt(token.slice(1, -1), 10);
		}

		return token;
	});
}

/** Dotted display path, e.g. `org.example.app.favorites.2`. */
export function buildDisplayPath(schemaId: string, key: string, names: readonly string[]): string {
	return [schemaId, key, ...names].join('.');
}
