import { Route, splitDelimitedPattern } from "./route";
import type { RouteTable } from "./route-table";
import type { Dispatchable, RouteKind, TemplateOptions } from "./types";

/** Detects a URI template expression anywhere in a target */
const HAS_TEMPLATE_EXPRESSION = /\{[^{}]*\}/;

/**
 * Classifies route targets and builds the matching Route.
 *
 * - Delimited regular expressions ("~/cats/([0-9]+)~") create pattern routes
 * - Targets ending with "*" create prefix routes
 * - Targets containing URI variables ("/cats/{id}") create template routes
 * - Anything else creates a static route
 *
 * Subclass and pass to `new Router({ routeFactory })` to customize route construction.
 */
export class RouteFactory {
	/**
	 * Decides the kind of route a target describes.
	 *
	 * @example
	 * ```typescript
	 * factory.classify("/cats/"); // "static"
	 * factory.classify("/cats/*"); // "prefix"
	 * factory.classify("/cats/{id}"); // "template"
	 * factory.classify("~/cats/([0-9]+)~"); // "pattern"
	 * ```
	 */
	classify(target: string): RouteKind {
		if (splitDelimitedPattern(target)) return "pattern";
		if (target.endsWith("*")) return "prefix";
		if (HAS_TEMPLATE_EXPRESSION.test(target)) return "template";
		return "static";
	}

	/**
	 * Creates a route for the given target. Without a dispatchable the route starts with an empty method map.
	 *
	 * @param extra - Variable patterns, used by template routes only
	 * @throws {InvalidArgumentError} If the target is a malformed template or pattern
	 */
	create(target: string, dispatchable?: Dispatchable, extra?: TemplateOptions): Route {
		switch (this.classify(target)) {
			case "pattern":
				return Route.pattern(target, dispatchable);
			case "prefix":
				return Route.prefix(target, dispatchable);
			case "template":
				return Route.template(target, extra, dispatchable);
			case "static":
				return Route.exact(target, dispatchable);
		}
	}

	/**
	 * Resolves the route for `target` in `table`, creating and indexing it on first use.
	 * Registering the same target again attaches the new dispatchable to the existing route;
	 * the route keeps its original kind and matcher, and `extra` is ignored.
	 *
	 * @example
	 * ```typescript
	 * factory.register(table, "/cats/", toMethodMap({ GET: listCats }));
	 * factory.register(table, "/cats/", toMethodMap({ POST: createCat }));
	 * // one route, answering both GET and POST
	 * ```
	 */
	register(table: RouteTable, target: string, dispatchable: Dispatchable, extra?: TemplateOptions): Route {
		const existing = table.getRoute(target);
		if (existing) {
			existing.attach(dispatchable);
			return existing;
		}

		const route = this.create(target, dispatchable, extra);
		table.addRoute(route);
		return route;
	}
}
