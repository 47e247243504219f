export { Router } from "./router";
export { Dispatcher, isMiddlewareObject, isResponseMessage, lazy, passThrough, toDispatchable } from "./dispatcher";
export { MethodMap, parseMethodList, toMethodMap } from "./method-map";
export { Route, TemplatePatterns, compilePattern, compileTemplate, splitDelimitedPattern } from "./route";
export { RouteFactory } from "./route-factory";
export { RouteTable } from "./route-table";
export { contentLengthPrep, defaultResponsePreparationHooks, headPrep } from "./response-prep";
export { HttpResponse, ServerRequest, extractPath, toWebResponse } from "./message";
export type { HttpResponseInit, ServerRequestInit } from "./message";
export * from "./errors";
export type * from "./types";
