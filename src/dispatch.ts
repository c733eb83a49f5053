/**
 * Dispatch Surface
 * The shared route table plugins register into. Routing itself is express's
 * job; this class records who bound what so later registrants can look first.
 */

import express, { type RequestHandler, type Router } from 'express';

export const HOST_OWNER = 'host';

export type HttpMethod = 'get' | 'post' | 'put' | 'patch' | 'delete' | 'options' | 'head' | 'all';

export interface RouteBinding {
  method: HttpMethod;
  path: string;
  owner: string;
}

export class DispatchSurface {
  readonly router: Router;
  /** Bindings made through this view are attributed to this owner. */
  readonly owner: string;
  private bindings: RouteBinding[];
  private closed = false;

  constructor(router: Router = express.Router(), owner: string = HOST_OWNER, bindings: RouteBinding[] = []) {
    this.router = router;
    this.owner = owner;
    this.bindings = bindings;
  }

  addRoute(method: HttpMethod, routePath: string, ...handlers: RequestHandler[]): this {
    if (this.closed) {
      throw new Error(`Route table is closed to "${this.owner}": cannot bind ${method.toUpperCase()} ${routePath}`);
    }
    this.router.route(routePath)[method](...handlers);
    this.bindings.push({ method, path: routePath, owner: this.owner });
    return this;
  }

  get(routePath: string, ...handlers: RequestHandler[]): this {
    return this.addRoute('get', routePath, ...handlers);
  }

  post(routePath: string, ...handlers: RequestHandler[]): this {
    return this.addRoute('post', routePath, ...handlers);
  }

  put(routePath: string, ...handlers: RequestHandler[]): this {
    return this.addRoute('put', routePath, ...handlers);
  }

  patch(routePath: string, ...handlers: RequestHandler[]): this {
    return this.addRoute('patch', routePath, ...handlers);
  }

  delete(routePath: string, ...handlers: RequestHandler[]): this {
    return this.addRoute('delete', routePath, ...handlers);
  }

  all(routePath: string, ...handlers: RequestHandler[]): this {
    return this.addRoute('all', routePath, ...handlers);
  }

  /** Bindings in registration order. */
  routes(): RouteBinding[] {
    return [...this.bindings];
  }

  /** True if `routePath` is bound, for `method` or (when omitted) any method. */
  hasRoute(routePath: string, method?: HttpMethod): boolean {
    return this.bindings.some(
      (b) => b.path === routePath && (method === undefined || b.method === method || b.method === 'all'),
    );
  }

  routesOwnedBy(owner: string): RouteBinding[] {
    return this.bindings.filter((b) => b.owner === owner);
  }

  /** A view onto the same router and bindings whose routes belong to `owner`. */
  scope(owner: string): DispatchSurface {
    return new DispatchSurface(this.router, owner, this.bindings);
  }

  /** Refuse any further binding through this view. Other views are unaffected. */
  close(): void {
    this.closed = true;
  }

  get isClosed(): boolean {
    return this.closed;
  }
}
