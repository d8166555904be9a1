import type { Request, Response } from 'express';
import { ServiceErrors } from '../errors';

/**
 * Request handler wrapped by the chain. A returned promise is awaited by the
 * outer links, so async handlers report their errors to recovery.
 */
export type Handler = (req: Request, res: Response) => void | Promise<void>;

/**
 * One link: takes the next handler and returns a handler that wraps it.
 */
export type Middleware = (next: Handler) => Handler;

/**
 * Ordered middleware composition.
 *
 * The first link passed to `use` is the outermost: it sees the request first
 * and the response last. Composition happens in `apply`, i.e. when a route is
 * registered, so a link only wraps routes registered after it was added.
 * Once sealed (the service seals its chain on start) the chain rejects new
 * links; routes registered later still get the full chain.
 */
export class MiddlewareChain {
  private readonly links: Middleware[] = [];
  private sealed = false;

  constructor(links: Middleware[] = []) {
    this.links.push(...links);
  }

  use(...links: Middleware[]): this {
    if (this.sealed) {
      throw ServiceErrors.middlewareSealed();
    }
    this.links.push(...links);
    return this;
  }

  apply(handler: Handler): Handler {
    return this.links.reduceRight<Handler>((next, link) => link(next), handler);
  }

  seal(): void {
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  get length(): number {
    return this.links.length;
  }
}
