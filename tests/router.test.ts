import { describe, expect, it, vi } from "vitest";
import {
	HttpException,
	HttpResponse,
	InvalidArgumentError,
	NotFoundException,
	Router,
	ServerRequest,
	UnauthorizedException,
	passThrough,
	toDispatchable,
	Dispatcher,
} from "../packages/core/src";
import type { Middleware, RequestMessage, ResponseMessage } from "../packages/core/src";

function dispatch(router: Router, target: string, method = "GET", headers: Record<string, string> = {}) {
	return router.dispatch(new ServerRequest({ method, target, headers }), new HttpResponse());
}

const hello: Middleware = (_request, response) => response.withBody("Hello World");

describe("Router", () => {
	describe("Basic Routing", () => {
		it("should answer a static route", () => {
			const router = new Router();
			router.add("/hello", hello);

			const res = dispatch(router, "/hello");
			expect(res.getStatusCode()).toBe(200);
			expect(res.getBody()).toBe("Hello World");
			expect(res.getHeader("Content-Length")).toBe("11");
		});

		it("should ignore the query string when matching", () => {
			const router = new Router();
			router.add("/hello", hello);

			expect(dispatch(router, "/hello?name=world").getBody()).toBe("Hello World");
		});

		it("should return 404 for an unmatched path", () => {
			const router = new Router();
			router.add("/hello", hello);

			const res = dispatch(router, "/goodbye");
			expect(res.getStatusCode()).toBe(404);
			expect(res.getBody()).toBeNull();
			expect(res.getHeader("Content-Length")).toBe("0");
		});

		it("should not treat a trailing slash as the same static path", () => {
			const router = new Router();
			router.add("/cats/", hello);

			expect(dispatch(router, "/cats").getStatusCode()).toBe(404);
			expect(dispatch(router, "/cats/").getStatusCode()).toBe(200);
		});

		it("should return a registered response value as-is", () => {
			const router = new Router();
			router.add("/teapot", new HttpResponse({ status: 418, body: "short and stout" }));

			const res = dispatch(router, "/teapot");
			expect(res.getStatusCode()).toBe(418);
			expect(res.getBody()).toBe("short and stout");
		});

		it("should run an array as a middleware chain", () => {
			const requireToken: Middleware = (request, response, next) => {
				if (request.getHeader("authorization") !== "Bearer test-secret") {
					return response.withStatus(401);
				}
				return next(request, response);
			};

			const router = new Router();
			router.add("/secure", [requireToken, (_request, response) => response.withBody("secret stuff")]);

			expect(dispatch(router, "/secure").getStatusCode()).toBe(401);

			const res = dispatch(router, "/secure", "GET", { authorization: "Bearer test-secret" });
			expect(res.getStatusCode()).toBe(200);
			expect(res.getBody()).toBe("secret stuff");
		});
	});

	describe("Route Kinds", () => {
		it("should extract template variables", () => {
			const router = new Router();
			router.add("/cats/{id}", (request, response) => response.withBody(`cat ${String(request.getAttribute("id"))}`));

			expect(dispatch(router, "/cats/42").getBody()).toBe("cat 42");
			expect(dispatch(router, "/cats/").getStatusCode()).toBe(404);
		});

		it("should honour per-variable template patterns", () => {
			const router = new Router();
			router.add("/cats/{id}", hello, { variablePatterns: { id: "[0-9]+" } });

			expect(dispatch(router, "/cats/42").getStatusCode()).toBe(200);
			expect(dispatch(router, "/cats/tom").getStatusCode()).toBe(404);
		});

		it("should prefer the longest matching prefix", () => {
			const router = new Router();
			router.add("/a/*", (_request, response) => response.withBody("a"));
			router.add("/a/b/*", (_request, response) => response.withBody("ab"));

			expect(dispatch(router, "/a/b/c").getBody()).toBe("ab");
			expect(dispatch(router, "/a/x").getBody()).toBe("a");
		});

		it("should prefer a static route over a template registered first", () => {
			const router = new Router();
			router.add("/cats/{id}", (_request, response) => response.withBody("template"));
			router.add("/cats/new", (_request, response) => response.withBody("static"));

			expect(dispatch(router, "/cats/new").getBody()).toBe("static");
			expect(dispatch(router, "/cats/7").getBody()).toBe("template");
		});

		it("should expose positional and named captures of a pattern route", () => {
			const router = new Router();
			router.add("~/posts/([0-9]+)/(?<slug>[a-z-]+)~", (request, response) =>
				response.withBody(`${String(request.getAttribute("1"))}:${String(request.getAttribute("slug"))}`)
			);

			expect(dispatch(router, "/posts/7/hello-world").getBody()).toBe("7:hello-world");
			expect(dispatch(router, "/posts/7/hello-world/extra").getStatusCode()).toBe(404);
		});

		it("should group path variables under one attribute when configured", () => {
			const router = new Router({ pathVariablesAttribute: "pathVariables" });
			let seen: RequestMessage | undefined;
			router.add("/cats/{id}", (request, response) => {
				seen = request;
				return response;
			});

			dispatch(router, "/cats/42");
			expect(seen?.getAttribute("pathVariables")).toEqual({ id: "42" });
			expect(seen?.getAttribute("id")).toBeUndefined();
		});

		it("should report routes with their kinds in registration order", () => {
			const router = new Router();
			router.add("/cats/", hello).add("/cats/*", hello).add("/cats/{id}", hello).add("~/dogs/([0-9]+)~", hello);

			expect(router.getRoutes()).toEqual([
				{ target: "/cats/", kind: "static" },
				{ target: "/cats/*", kind: "prefix" },
				{ target: "/cats/{id}", kind: "template" },
				{ target: "~/dogs/([0-9]+)~", kind: "pattern" },
			]);
		});
	});

	describe("Route Matching", () => {
		it("should return the same route object on repeated matches", () => {
			const router = new Router();
			router.add("/hello", hello);

			const first = router.match("/hello");
			const second = router.match("/hello");
			expect(first).not.toBeNull();
			expect(first?.route).toBe(second?.route);
			expect(first?.pathVariables).toEqual({});
		});

		it("should refresh the prefix order after a new prefix is added", () => {
			const router = new Router();
			router.add("/a/*", hello);
			expect(router.match("/a/b/c")?.route.target).toBe("/a/*");

			router.add("/a/b/*", hello);
			expect(router.match("/a/b/c")?.route.target).toBe("/a/b/*");
		});

		it("should return null when nothing matches", () => {
			const router = new Router();
			router.add("/hello", hello);

			expect(router.match("/nope")).toBeNull();
		});
	});

	describe("Method Maps", () => {
		const listCats: Middleware = (_request, response) => response.withBody("list");
		const createCat: Middleware = (_request, response) => response.withStatus(201).withBody("created");

		it("should dispatch by method", () => {
			const router = new Router();
			router.add("/cats/", { GET: listCats, POST: createCat });

			expect(dispatch(router, "/cats/").getBody()).toBe("list");

			const res = dispatch(router, "/cats/", "POST");
			expect(res.getStatusCode()).toBe(201);
			expect(res.getBody()).toBe("created");
		});

		it("should answer an unmapped method with 405 and an Allow header", () => {
			const router = new Router();
			router.add("/cats/", { GET: listCats });

			const res = dispatch(router, "/cats/", "PUT");
			expect(res.getStatusCode()).toBe(405);
			expect(res.getHeader("Allow")).toBe("GET, HEAD, OPTIONS");
			expect(res.getBody()).toBeNull();
		});

		it("should answer OPTIONS automatically", () => {
			const router = new Router();
			router.add("/cats/", { GET: listCats, POST: createCat });

			const res = dispatch(router, "/cats/", "OPTIONS");
			expect(res.getStatusCode()).toBe(200);
			expect(res.getHeader("Allow")).toBe("GET, POST, HEAD, OPTIONS");
		});

		it("should serve HEAD through GET without a body", () => {
			const router = new Router();
			router.add("/cats/", { GET: listCats });

			const res = dispatch(router, "/cats/", "HEAD");
			expect(res.getStatusCode()).toBe(200);
			expect(res.getBody()).toBeNull();
			expect(res.getHeader("Content-Length")).toBe("4");
		});

		it("should merge methods when the same target is registered twice", () => {
			const router = new Router();
			router.add("/cats/", { GET: listCats });
			router.add("/cats/", { POST: createCat });

			expect(router.getRoutes()).toHaveLength(1);
			expect(dispatch(router, "/cats/").getBody()).toBe("list");
			expect(dispatch(router, "/cats/", "POST").getStatusCode()).toBe(201);
			expect(dispatch(router, "/cats/", "DELETE").getHeader("Allow")).toBe("GET, POST, HEAD, OPTIONS");
		});

		it("should accept comma-separated verb lists and a wildcard", () => {
			const router = new Router();
			router.add("/cats/", {
				"PUT, PATCH": (_request, response) => response.withBody("updated"),
				"*": (_request, response) => response.withBody("fallback"),
			});

			expect(dispatch(router, "/cats/", "PATCH").getBody()).toBe("updated");
			expect(dispatch(router, "/cats/", "DELETE").getBody()).toBe("fallback");
		});

		it("should let a plain handler answer every method", () => {
			const router = new Router();
			router.add("/any", hello);

			expect(dispatch(router, "/any", "DELETE").getBody()).toBe("Hello World");
		});
	});

	describe("Registration Errors", () => {
		it("should reject a verb listed twice", () => {
			const router = new Router();
			expect(() => router.add("/cats/", { "GET,GET": hello })).toThrow(InvalidArgumentError);
		});

		it("should reject a verb mapped under two keys", () => {
			const router = new Router();
			expect(() => router.add("/cats/", { GET: hello, "get, POST": hello })).toThrow(InvalidArgumentError);
		});

		it("should reject a malformed verb", () => {
			const router = new Router();
			expect(() => router.add("/cats/", { "GET POST": hello })).toThrow(InvalidArgumentError);
		});

		it("should reject a template segment with two variables", () => {
			const router = new Router();
			expect(() => router.add("/cats/{a}{b}", hello)).toThrow(InvalidArgumentError);
		});

		it("should reject a template that repeats a variable name", () => {
			const router = new Router();
			expect(() => router.add("/cats/{id}/{id}", hello)).toThrow(InvalidArgumentError);
		});

		it("should reject pattern flags that make matching stateful", () => {
			const router = new Router();
			expect(() => router.add("~/cats/~g", hello)).toThrow(InvalidArgumentError);
		});
	});

	describe("Not Found Handling", () => {
		it("should return 404 without calling next", () => {
			const router = new Router();
			const next = vi.fn((_request: RequestMessage, response: ResponseMessage) => response);

			const res = router.dispatch(new ServerRequest({ target: "/missing" }), new HttpResponse(), next);
			expect(res.getStatusCode()).toBe(404);
			expect(next).not.toHaveBeenCalled();
		});

		it("should call next exactly once when continueOnNotFound is set", () => {
			const router = new Router({ continueOnNotFound: true });
			const next = vi.fn((_request: RequestMessage, response: ResponseMessage) => response.withStatus(418));

			const res = router.dispatch(new ServerRequest({ target: "/missing" }), new HttpResponse(), next);
			expect(next).toHaveBeenCalledTimes(1);
			expect(res.getStatusCode()).toBe(418);
		});

		it("should run the status handler for 404", () => {
			const router = new Router();
			router.setStatusHandler(404, (_request, response) => response.withBody("Page not found"));

			const res = dispatch(router, "/missing");
			expect(res.getStatusCode()).toBe(404);
			expect(res.getBody()).toBe("Page not found");
			expect(res.getHeader("Content-Length")).toBe("14");
		});
	});

	describe("Hooks", () => {
		it("should run stages in pipeline order", () => {
			const order: string[] = [];
			const router = new Router();
			router.addPreRouteHook((request, response, next) => {
				order.push("pre");
				return next(request, response);
			});
			router.addPostRouteHook((request, response, next) => {
				order.push("post");
				return next(request, response);
			});
			router.addResponsePreparationHook((request, response, next) => {
				order.push("prep");
				return next(request, response);
			});
			router.setStatusHandler(200, (request, response, next) => {
				order.push("status");
				return next(request, response);
			});
			router.add("/hello", (_request, response) => {
				order.push("route");
				return response;
			});

			dispatch(router, "/hello");
			expect(order).toEqual(["pre", "route", "status", "post", "prep"]);
		});

		it("should route the request a pre-route hook passes on", () => {
			const router = new Router();
			router.addPreRouteHook((request, response, next) => next(new ServerRequest({ method: request.getMethod(), target: "/hello" }), response));
			router.add("/hello", hello);

			expect(dispatch(router, "/old-hello").getBody()).toBe("Hello World");
		});

		it("should run custom preparation hooks after the default ones", () => {
			let contentLength: string | null = null;
			const router = new Router();
			router.addResponsePreparationHook((request, response, next) => {
				contentLength = response.getHeader("Content-Length");
				return next(request, response);
			});
			router.add("/hello", hello);

			dispatch(router, "/hello");
			expect(contentLength).toBe("11");
		});

		it("should replace the default preparation hooks when given", () => {
			const router = new Router({ responsePreparationHooks: [] });
			router.add("/hello", hello);

			expect(dispatch(router, "/hello").hasHeader("Content-Length")).toBe(false);
			expect(dispatch(router, "/hello", "HEAD").getBody()).toBe("Hello World");
		});
	});

	describe("Router Middleware", () => {
		it("should wrap matched routes", () => {
			const router = new Router();
			router.use((request, response, next) => next(request, response).withHeader("X-Powered-By", "switchyard"));
			router.add("/hello", hello);

			expect(dispatch(router, "/hello").getHeader("X-Powered-By")).toBe("switchyard");
			expect(dispatch(router, "/missing").hasHeader("X-Powered-By")).toBe(false);
		});

		it("should run middleware in registration order before the route", () => {
			const order: string[] = [];
			const router = new Router();
			router.use((request, response, next) => {
				order.push("first");
				return next(request, response);
			});
			router.use((request, response, next) => {
				order.push("second");
				return next(request, response);
			});
			router.add("/hello", (_request, response) => {
				order.push("route");
				return response;
			});

			dispatch(router, "/hello");
			expect(order).toEqual(["first", "second", "route"]);
		});

		it("should see path variables in router middleware", () => {
			let id: unknown;
			const router = new Router();
			router.use((request, response, next) => {
				id = request.getAttribute("id");
				return next(request, response);
			});
			router.add("/cats/{id}", hello);

			dispatch(router, "/cats/42");
			expect(id).toBe("42");
		});
	});

	describe("Error Handling", () => {
		it("should convert an HTTP exception into a response", () => {
			const router = new Router();
			router.add("/cats/{id}", () => {
				throw new NotFoundException("No cat with id 7");
			});

			const res = dispatch(router, "/cats/7");
			expect(res.getStatusCode()).toBe(404);
			expect(res.getBody()).toBe("No cat with id 7");
		});

		it("should use the default exception message", () => {
			const router = new Router();
			router.add("/admin", () => {
				throw new UnauthorizedException();
			});

			const res = dispatch(router, "/admin");
			expect(res.getStatusCode()).toBe(401);
			expect(res.getBody()).toBe("401 Unauthorized");
		});

		it("should convert foreign errors carrying a status code", () => {
			const router = new Router();
			router.add("/brew", () => {
				throw Object.assign(new Error("I'm a teapot"), { statusCode: 418 });
			});

			const res = dispatch(router, "/brew");
			expect(res.getStatusCode()).toBe(418);
			expect(res.getBody()).toBe("I'm a teapot");
		});

		it("should run status, post-route and preparation stages after a caught exception", () => {
			const seen: string[] = [];
			const router = new Router();
			router.setStatusHandler(404, (request, response, next) => {
				seen.push("status");
				return next(request, response.withHeader("X-Handled", "yes"));
			});
			router.addPostRouteHook((request, response, next) => {
				seen.push(`post ${response.getStatusCode()}`);
				return next(request, response);
			});
			router.add("/cats/{id}", () => {
				throw new NotFoundException("gone");
			});

			const res = dispatch(router, "/cats/7");
			expect(seen).toEqual(["status", "post 404"]);
			expect(res.getHeader("X-Handled")).toBe("yes");
			expect(res.getHeader("Content-Length")).toBe("4");
		});

		it("should let exceptions with a non-error status propagate", () => {
			const router = new Router();
			router.add("/odd", () => {
				throw new HttpException("odd", 999);
			});

			expect(() => dispatch(router, "/odd")).toThrow("odd");
			expect(() => router.handle(new Request("http://localhost/odd"))).toThrow(HttpException);
		});

		it("should let other errors propagate", () => {
			const post = vi.fn(passThrough);
			const router = new Router();
			router.addPostRouteHook(post);
			router.add("/boom", () => {
				throw new Error("boom");
			});

			expect(() => dispatch(router, "/boom")).toThrow("boom");
			expect(post).not.toHaveBeenCalled();
		});
	});

	describe("Nested Routers", () => {
		it("should mount a router under a prefix", () => {
			const api = new Router();
			api.add("/api/users", (_request, response) => response.withBody("users"));

			const router = new Router();
			router.add("/api/*", api);

			expect(dispatch(router, "/api/users").getBody()).toBe("users");
			expect(dispatch(router, "/api/other").getStatusCode()).toBe(404);
		});

		it("should resize the body an outer status handler writes", async () => {
			const api = new Router();
			api.add("/api/users", (_request, response) => response.withBody("users"));

			const router = new Router();
			router.add("/api/*", api);
			router.setStatusHandler(404, (_request, response) => response.withBody("Nothing here"));

			const res = dispatch(router, "/api/missing");
			expect(res.getStatusCode()).toBe(404);
			expect(res.getBody()).toBe("Nothing here");
			expect(res.getHeader("Content-Length")).toBe("12");

			const web = router.handle(new Request("http://localhost/api/missing"));
			expect(web.headers.get("content-length")).toBe("12");
			expect(await web.text()).toBe("Nothing here");
		});

		it("should keep the GET length for HEAD through nested routers", () => {
			const api = new Router();
			api.add("/api/users", { GET: (_request, response) => response.withBody("users") });

			const router = new Router();
			router.add("/api/*", api);

			const res = dispatch(router, "/api/users", "HEAD");
			expect(res.getBody()).toBeNull();
			expect(res.getHeader("Content-Length")).toBe("5");
		});

		it("should fall through to the outer chain when the inner router continues on not found", () => {
			const api = new Router({ continueOnNotFound: true });
			api.add("/api/users", (_request, response) => response.withBody("users"));

			const dispatcher = new Dispatcher();
			const app = toDispatchable([api, (_request: RequestMessage, response: ResponseMessage) => response.withBody("fallback")]);

			const res = dispatcher.dispatch(app, new ServerRequest({ target: "/other" }), new HttpResponse(), passThrough);
			expect(res.getBody()).toBe("fallback");
		});
	});

	describe("Fetch Adapter", () => {
		it("should handle a Fetch request", async () => {
			const router = new Router();
			router.add("/hello", hello);

			const res = router.handle(new Request("http://localhost/hello?x=1"));
			expect(res.status).toBe(200);
			expect(res.headers.get("content-length")).toBe("11");
			expect(await res.text()).toBe("Hello World");
		});

		it("should send no body for 204", () => {
			const router = new Router();
			router.add("/empty", new HttpResponse({ status: 204 }));

			const res = router.handle(new Request("http://localhost/empty", { method: "DELETE" }));
			expect(res.status).toBe(204);
			expect(res.body).toBeNull();
		});

		it("should send a status Fetch cannot carry as an empty 500", async () => {
			const router = new Router();
			router.add("/ws", new HttpResponse({ status: 101 }));

			const res = router.handle(new Request("http://localhost/ws"));
			expect(res.status).toBe(500);
			expect(await res.text()).toBe("");
		});

		it("should expose request headers to handlers", async () => {
			const router = new Router();
			router.add("/whoami", (request, response) => response.withBody(request.getHeader("x-user") ?? "anonymous"));

			const res = router.handle(new Request("http://localhost/whoami", { headers: { "X-User": "alice" } }));
			expect(await res.text()).toBe("alice");
		});
	});
});
