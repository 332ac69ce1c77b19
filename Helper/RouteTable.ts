import { Request, Response } from 'express';

export const HTTP_METHODS = ['GET', 'POST', 'DELETE'] as const;
export type HttpMethod = typeof HTTP_METHODS[number];

export type RouteHandler = (req: Request, res: Response) => Promise<void>;

export type RouteMatch = {
  kind: 'exact' | 'prefix';
  path: string;
  handler: RouteHandler;
};

const isHttpMethod = (method: string): method is HttpMethod =>
  HTTP_METHODS.some((candidate) => candidate === method);

/**
 * Per-method path table. An exact path wins; otherwise the first registered
 * path that prefixes the request path, in registration order.
 */
export class RouteTable {
  private readonly routes: Record<HttpMethod, Map<string, RouteHandler>> = {
    GET: new Map(),
    POST: new Map(),
    DELETE: new Map(),
  };

  register(method: HttpMethod, path: string, handler: RouteHandler): this {
    this.routes[method].set(path, handler);
    return this;
  }

  get(path: string, handler: RouteHandler): this {
    return this.register('GET', path, handler);
  }

  post(path: string, handler: RouteHandler): this {
    return this.register('POST', path, handler);
  }

  delete(path: string, handler: RouteHandler): this {
    return this.register('DELETE', path, handler);
  }

  match(method: string, path: string): RouteMatch | null {
    if (!isHttpMethod(method)) {
      return null;
    }
    const routes = this.routes[method];

    const exact = routes.get(path);
    if (exact) {
      return { kind: 'exact', path, handler: exact };
    }

    for (const [prefix, handler] of routes) {
      if (path.startsWith(prefix)) {
        return { kind: 'prefix', path: prefix, handler };
      }
    }
    return null;
  }
}
