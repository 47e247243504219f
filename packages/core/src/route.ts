import { InvalidArgumentError } from "./errors";
import { MethodMap } from "./method-map";
import type { Dispatchable, PathVariables, RouteKind, TemplateOptions } from "./types";

/**
 * Patterns commonly used for template variables.
 */
export const TemplatePatterns = {
	/** URL-friendly characters: letters, digits, hyphen and underscore */
	SLUG: "[0-9a-zA-Z\\-_]+",
	/** Digits */
	NUM: "[0-9]+",
	/** Letters */
	ALPHA: "[a-zA-Z]+",
	/** Letters and digits */
	ALPHANUM: "[0-9a-zA-Z]+",
} as const;

/** Matches a URI template expression such as "{id}" */
const TEMPLATE_EXPRESSION = /\{([^{}]*)\}/g;

/** Valid template variable name; also a valid named capture group name */
const VARIABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Flags accepted on delimited patterns. "g" and "y" would make matching stateful. */
const PATTERN_FLAGS = /^[imsu]*$/;

/** Empty variables shared by static and prefix matches */
const NO_VARIABLES: PathVariables = Object.freeze({});

/**
 * A single registered path-matching rule bound to a dispatch target.
 *
 * The kind and matcher are fixed at construction; a compiled matcher is reused for every request.
 * Use `RouteFactory` to build routes from target strings.
 */
export class Route {
	private dispatchable: Dispatchable;

	private constructor(
		readonly target: string,
		readonly kind: RouteKind,
		/** Key in the kind-specific index: the prefix without "*" for prefix routes, the target otherwise */
		readonly key: string,
		private readonly pattern: RegExp | null,
		dispatchable?: Dispatchable
	) {
		this.dispatchable = dispatchable ?? { kind: "method-map", map: new MethodMap() };
	}

	/** Route matching exactly `target` */
	static exact(target: string, dispatchable?: Dispatchable): Route {
		return new Route(target, "static", target, null, dispatchable);
	}

	/** Route matching every path that starts with `target` minus its trailing "*" */
	static prefix(target: string, dispatchable?: Dispatchable): Route {
		const key = target.endsWith("*") ? target.slice(0, -1) : target;
		return new Route(target, "prefix", key, null, dispatchable);
	}

	/**
	 * Route matching a URI template such as "/cats/{id}".
	 *
	 * @throws {InvalidArgumentError} If the template is malformed
	 */
	static template(target: string, options: TemplateOptions = {}, dispatchable?: Dispatchable): Route {
		return new Route(target, "template", target, compileTemplate(target, options), dispatchable);
	}

	/**
	 * Route matching a delimited regular expression such as "~/cats/([0-9]+)~".
	 *
	 * @throws {InvalidArgumentError} If the expression is not delimited, uses unsupported flags or does not compile
	 */
	static pattern(target: string, dispatchable?: Dispatchable): Route {
		return new Route(target, "pattern", target, compilePattern(target), dispatchable);
	}

	/**
	 * Matches a request path against this route.
	 *
	 * @returns Extracted path variables on a match, null otherwise
	 */
	matchPath(path: string): PathVariables | null {
		switch (this.kind) {
			case "static":
				return path === this.key ? NO_VARIABLES : null;
			case "prefix":
				return path.startsWith(this.key) ? NO_VARIABLES : null;
			case "template":
			case "pattern":
				return this.matchPattern(path);
		}
	}

	getDispatchable(): Dispatchable {
		return this.dispatchable;
	}

	/**
	 * Binds a dispatchable to this route. Method maps merge into an existing method map;
	 * anything else replaces the current dispatchable.
	 */
	attach(dispatchable: Dispatchable): void {
		if (dispatchable.kind === "method-map" && this.dispatchable.kind === "method-map") {
			this.dispatchable.map.merge(dispatchable.map);
			return;
		}
		this.dispatchable = dispatchable;
	}

	/**
	 * Runs the compiled matcher. Named groups become variables; pattern routes also expose
	 * positional captures as "1", "2", ... Groups that did not take part in the match are left out.
	 * @private
	 */
	private matchPattern(path: string): PathVariables | null {
		if (!this.pattern) return null;

		const match = this.pattern.exec(path);
		if (!match) return null;

		const variables: PathVariables = {};
		if (this.kind === "pattern") {
			for (let i = 1; i < match.length; i++) {
				const value = match[i];
				if (value !== undefined) variables[String(i)] = value;
			}
		}
		if (match.groups) {
			for (const [name, value] of Object.entries(match.groups)) {
				if (value !== undefined) variables[name] = value;
			}
		}
		return variables;
	}
}

/**
 * Builds an anchored regular expression from a URI template.
 * Literal text is escaped; each "{name}" becomes a named capture group using the variable's own
 * pattern, the default pattern, or TemplatePatterns.SLUG.
 *
 * @example
 * ```typescript
 * compileTemplate("/cats/{id}", { variablePatterns: { id: TemplatePatterns.NUM } });
 * // /^\/cats\/(?<id>[0-9]+)$/
 * ```
 *
 * @throws {InvalidArgumentError} If a segment holds more than one expression, an expression holds more than
 *   one variable name, a name is invalid or a name is used twice
 */
export function compileTemplate(template: string, options: TemplateOptions = {}): RegExp {
	const defaultPattern = options.defaultPattern || TemplatePatterns.SLUG;
	const variablePatterns = options.variablePatterns ?? {};
	const segments = (template.startsWith("/") ? template.slice(1) : template).split("/");

	let source = "";
	for (const segment of segments) {
		source += "\\/";

		const expressions = [...segment.matchAll(TEMPLATE_EXPRESSION)];
		const expression = expressions[0];
		if (expression === undefined) {
			source += escapeRegExp(segment);
			continue;
		}
		if (expressions.length > 1) {
			throw new InvalidArgumentError(`Invalid URI template "${template}": segment "${segment}" contains more than one variable`);
		}

		const name = expression[1]?.trim() ?? "";
		if (!VARIABLE_NAME.test(name)) {
			throw new InvalidArgumentError(`Invalid URI template "${template}": "${expression[0]}" must contain exactly one variable name`);
		}

		const start = expression.index ?? 0;
		const pattern = variablePatterns[name] ?? defaultPattern;
		source += escapeRegExp(segment.slice(0, start));
		source += `(?<${name}>${pattern})`;
		source += escapeRegExp(segment.slice(start + expression[0].length));
	}

	try {
		return new RegExp(`^${source}$`);
	} catch (error) {
		throw new InvalidArgumentError(`Invalid URI template "${template}": ${error instanceof Error ? error.message : String(error)}`, { cause: error });
	}
}

/**
 * Compiles a delimited regular expression target, anchored at both ends.
 *
 * @example
 * ```typescript
 * compilePattern("~/cats/([0-9]+)~i"); // /^(?:\/cats\/([0-9]+))$/i
 * ```
 *
 * @throws {InvalidArgumentError} If the target is not delimited, carries unsupported flags or does not compile
 */
export function compilePattern(target: string): RegExp {
	const parts = splitDelimitedPattern(target);
	if (!parts) {
		throw new InvalidArgumentError(`Invalid pattern "${target}": expected a delimited regular expression`);
	}
	if (!PATTERN_FLAGS.test(parts.flags)) {
		throw new InvalidArgumentError(`Invalid pattern "${target}": unsupported flags "${parts.flags}"`);
	}

	try {
		return new RegExp(`^(?:${parts.source})$`, parts.flags);
	} catch (error) {
		throw new InvalidArgumentError(`Invalid pattern "${target}": ${error instanceof Error ? error.message : String(error)}`, { cause: error });
	}
}

/**
 * Splits "~source~flags" into its source and flags.
 * The delimiter is the first character and may not be a letter, digit, backslash, whitespace or "/".
 *
 * @returns The parts, or null when the target is not a delimited expression
 */
export function splitDelimitedPattern(target: string): { source: string; flags: string } | null {
	const delimiter = target[0];
	if (delimiter === undefined || /[A-Za-z0-9\\\s/]/.test(delimiter)) {
		return null;
	}

	const end = target.lastIndexOf(delimiter);
	if (end <= 0) return null;

	const flags = target.slice(end + 1);
	if (!/^[A-Za-z]*$/.test(flags)) return null;

	return { source: target.slice(1, end), flags };
}

function escapeRegExp(value: string): string {
	return value.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
}
