import { stringify } from "yaml";
import type { HttpMethod, RouteDefinition } from "../types/app-schema";
import type { RouteSpec } from "../types/resources";

interface PathParameter {
  name: string;
  in: "path";
  required: true;
  type: "string";
}

interface SwaggerOperation {
  operationId: string;
  description?: string;
  parameters?: PathParameter[];
  responses: Record<string, { description: string }>;
}

export interface SwaggerDocument {
  swagger: "2.0";
  info: { title: string; description: string; version: string };
  schemes: string[];
  produces: string[];
  "x-google-backend": { address: string; path_translation: "APPEND_PATH_TO_ADDRESS" };
  paths: Record<string, Partial<Record<Lowercase<HttpMethod>, SwaggerOperation>>>;
}

export function pathParameters(routePath: string): string[] {
  return [...routePath.matchAll(/\{([^}/]+)\}/g)].flatMap((m) => (m[1] ? [m[1]] : []));
}

/**
 * Operation ids must be unique within a document; derive one from the
 * method and path when the route does not name it.
 */
export function defaultOperationId(method: HttpMethod, routePath: string): string {
  const segments = routePath
    .split("/")
    .map((s) => s.replace(/[{}]/g, "").replace(/[^A-Za-z0-9]+/g, "_"))
    .filter(Boolean);
  return [method.toLowerCase(), ...(segments.length ? segments : ["root"])].join("_");
}

function toLowerMethod(method: HttpMethod): Lowercase<HttpMethod> {
  switch (method) {
    case "GET":
      return "get";
    case "POST":
      return "post";
    case "PUT":
      return "put";
    case "PATCH":
      return "patch";
    case "DELETE":
      return "delete";
    case "OPTIONS":
      return "options";
    case "HEAD":
      return "head";
  }
}

function operationFor(route: RouteDefinition, method: HttpMethod): SwaggerOperation {
  const params = pathParameters(route.path);
  const op: SwaggerOperation = {
    operationId: route.operationId
      ? route.methods.length > 1
        ? `${route.operationId}_${method.toLowerCase()}`
        : route.operationId
      : defaultOperationId(method, route.path),
    responses: { "200": { description: "A successful response" } }
  };
  if (route.description) op.description = route.description;
  if (params.length) {
    op.parameters = params.map((name): PathParameter => ({ name, in: "path", required: true, type: "string" }));
  }
  return op;
}

/**
 * Swagger 2.0 document for an API Gateway config: every declared route is
 * forwarded to the function at `backendAddress`.
 */
export function buildSwaggerDocument(spec: Readonly<RouteSpec>): SwaggerDocument {
  const paths: SwaggerDocument["paths"] = {};
  const sorted = [...spec.routes].sort((a, b) => a.path.localeCompare(b.path));
  for (const route of sorted) {
    const entry = paths[route.path] ?? {};
    for (const method of route.methods) {
      entry[toLowerMethod(method)] = operationFor(route, method);
    }
    paths[route.path] = entry;
  }

  return {
    swagger: "2.0",
    info: {
      title: spec.title,
      description: `API for ${spec.title}`,
      version: "1.0.0"
    },
    schemes: ["https"],
    produces: ["application/json"],
    "x-google-backend": {
      address: spec.backendAddress,
      path_translation: "APPEND_PATH_TO_ADDRESS"
    },
    paths
  };
}

export function renderSwaggerYaml(doc: SwaggerDocument): string {
  return stringify(doc);
}
