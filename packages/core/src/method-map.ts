import { toDispatchable } from "./dispatcher";
import { InvalidArgumentError } from "./errors";
import type { Dispatchable, DispatchableInput, MethodHandlers } from "./types";

/** Verb token accepted in method lists */
const VERB_PATTERN = /^[A-Z]+$/;

/**
 * Maps HTTP verbs to dispatchables for a single route.
 *
 * Selection, in order: the exact verb, GET for a HEAD request, then the "*" entry.
 * The dispatcher answers anything left over itself: 200 with an Allow header for OPTIONS,
 * 405 with an Allow header for every other verb.
 *
 * @example
 * ```typescript
 * const map = new MethodMap()
 *   .register("GET", listCats)
 *   .register("PUT,PATCH", updateCats);
 *
 * map.getAllowedMethods(); // ["GET", "PUT", "PATCH", "HEAD", "OPTIONS"]
 * ```
 */
export class MethodMap {
	private readonly handlers = new Map<string, Dispatchable>();

	/**
	 * Registers a dispatchable for one verb or a comma-separated verb list.
	 * A verb registered again replaces the earlier entry.
	 *
	 * @throws {InvalidArgumentError} If the list is empty, malformed or repeats a verb
	 */
	register(methods: string, dispatchable: DispatchableInput): this {
		const resolved = toDispatchable(dispatchable);
		for (const method of parseMethodList(methods)) {
			this.handlers.set(method, resolved);
		}
		return this;
	}

	/**
	 * Registers every entry of a verb-to-handler mapping.
	 * The whole mapping is validated before anything is registered.
	 *
	 * @throws {InvalidArgumentError} If a key is malformed or a verb appears under more than one key
	 */
	addMap(handlers: MethodHandlers): this {
		const seen = new Set<string>();
		const entries: Array<[string[], DispatchableInput]> = [];

		for (const [methods, dispatchable] of Object.entries(handlers)) {
			const parsed = parseMethodList(methods);
			for (const method of parsed) {
				if (seen.has(method)) {
					throw new InvalidArgumentError(`Method ${method} is mapped more than once`);
				}
				seen.add(method);
			}
			entries.push([parsed, dispatchable]);
		}

		for (const [methods, dispatchable] of entries) {
			const resolved = toDispatchable(dispatchable);
			for (const method of methods) {
				this.handlers.set(method, resolved);
			}
		}
		return this;
	}

	/**
	 * Copies every entry of another map into this one. Entries of `other` win.
	 */
	merge(other: MethodMap): this {
		for (const [method, dispatchable] of other.handlers) {
			this.handlers.set(method, dispatchable);
		}
		return this;
	}

	has(method: string): boolean {
		return this.handlers.has(method.toUpperCase());
	}

	/**
	 * Picks the dispatchable for an upper-case verb, or undefined when nothing applies.
	 */
	select(method: string): Dispatchable | undefined {
		const exact = this.handlers.get(method);
		if (exact) return exact;

		if (method === "HEAD") {
			const get = this.handlers.get("GET");
			if (get) return get;
		}

		return this.handlers.get("*");
	}

	/**
	 * Verbs to advertise in an Allow header: mapped verbs in registration order,
	 * HEAD when GET is mapped, and OPTIONS last.
	 */
	getAllowedMethods(): string[] {
		const methods = [...this.handlers.keys()].filter((method) => method !== "*");
		if (methods.includes("GET") && !methods.includes("HEAD")) {
			methods.push("HEAD");
		}
		if (!methods.includes("OPTIONS")) {
			methods.push("OPTIONS");
		}
		return methods;
	}
}

/**
 * Splits and validates a comma-separated verb list.
 *
 * @example
 * ```typescript
 * parseMethodList("get, Post"); // ["GET", "POST"]
 * parseMethodList("GET,GET"); // throws InvalidArgumentError
 * ```
 */
export function parseMethodList(methods: string): string[] {
	const parsed: string[] = [];

	for (const part of methods.split(",")) {
		const method = part.trim().toUpperCase();
		if (method !== "*" && !VERB_PATTERN.test(method)) {
			throw new InvalidArgumentError(`Invalid method "${part.trim()}" in method list "${methods}"`);
		}
		if (parsed.includes(method)) {
			throw new InvalidArgumentError(`Method ${method} is listed more than once in "${methods}"`);
		}
		parsed.push(method);
	}

	return parsed;
}

/**
 * Builds a method-map dispatchable from a verb-to-handler mapping.
 *
 * @throws {InvalidArgumentError} If a key is malformed or a verb appears under more than one key
 */
export function toMethodMap(handlers: MethodHandlers): Dispatchable {
	return { kind: "method-map", map: new MethodMap().addMap(handlers) };
}
