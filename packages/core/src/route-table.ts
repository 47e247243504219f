import type { Route } from "./route";
import type { RouteMatch } from "./types";

/**
 * Owns every registered route, indexed by kind for lookup.
 *
 * - static routes: exact-path map, O(1)
 * - prefix routes: map keyed by prefix, scanned longest-first
 * - template and pattern routes: list scanned in registration order
 *
 * Every route also sits in a target map so repeated registrations resolve to the same Route.
 * The table is read-only while requests are matched; registration must not overlap with matching.
 */
export class RouteTable {
	/** Every route, keyed by its original target */
	private readonly routesByTarget = new Map<string, Route>();
	/** Static routes keyed by exact path */
	private readonly staticIndex = new Map<string, Route>();
	/** Prefix routes keyed by prefix (trailing "*" stripped) */
	private readonly prefixIndex = new Map<string, Route>();
	/** Template and pattern routes in registration order */
	private readonly patternRoutes: Route[] = [];
	/** Prefix keys sorted longest first; rebuilt lazily after registration */
	private prefixKeys: string[] | null = null;

	getRoute(target: string): Route | undefined {
		return this.routesByTarget.get(target);
	}

	/**
	 * All routes in registration order.
	 */
	getRoutes(): Route[] {
		return [...this.routesByTarget.values()];
	}

	/**
	 * Adds a route under its target and its kind's index.
	 * A route already registered for the same target is replaced.
	 */
	addRoute(route: Route): void {
		const existing = this.routesByTarget.get(route.target);
		if (existing) {
			this.removeFromIndex(existing);
		}

		this.routesByTarget.set(route.target, route);
		switch (route.kind) {
			case "static":
				this.staticIndex.set(route.key, route);
				break;
			case "prefix":
				this.prefixIndex.set(route.key, route);
				this.prefixKeys = null;
				break;
			case "template":
			case "pattern":
				this.patternRoutes.push(route);
				break;
		}
	}

	/**
	 * Finds the route for a request path. First match wins:
	 * 1. exact path
	 * 2. longest matching prefix
	 * 3. first template or pattern route, in registration order
	 *
	 * @returns The route and its path variables, or null when nothing matches
	 *
	 * @example
	 * ```typescript
	 * const match = table.match("/cats/42");
	 * if (match) {
	 *   console.log(match.route.target, match.pathVariables); // "/cats/{id}" { id: "42" }
	 * }
	 * ```
	 */
	match(path: string): RouteMatch | null {
		const exact = this.staticIndex.get(path);
		const exactVariables = exact?.matchPath(path);
		if (exact && exactVariables) {
			return { route: exact, pathVariables: exactVariables };
		}

		for (const prefix of this.getPrefixKeys()) {
			const route = this.prefixIndex.get(prefix);
			const pathVariables = route?.matchPath(path);
			if (route && pathVariables) {
				return { route, pathVariables };
			}
		}

		for (const route of this.patternRoutes) {
			const pathVariables = route.matchPath(path);
			if (pathVariables) {
				return { route, pathVariables };
			}
		}

		return null;
	}

	/**
	 * Prefix keys, longest first. Keys of equal length keep registration order.
	 * @private
	 */
	private getPrefixKeys(): string[] {
		if (!this.prefixKeys) {
			this.prefixKeys = [...this.prefixIndex.keys()].sort((a, b) => b.length - a.length);
		}
		return this.prefixKeys;
	}

	private removeFromIndex(route: Route): void {
		switch (route.kind) {
			case "static":
				this.staticIndex.delete(route.key);
				break;
			case "prefix":
				this.prefixIndex.delete(route.key);
				this.prefixKeys = null;
				break;
			case "template":
			case "pattern": {
				const index = this.patternRoutes.indexOf(route);
				if (index !== -1) this.patternRoutes.splice(index, 1);
				break;
			}
		}
	}
}
