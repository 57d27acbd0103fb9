/**
 * Route Table
 *
 * Frozen, per-instance mapping from path pattern to handler.
 *
 * Patterns ending in "/" match their whole subtree (longest pattern wins);
 * every other pattern matches one path exactly.
 */

import path from 'path';
import type { RouteBinding, RouteHandler, RouteMatch, RouteSource } from './types';
import { ValidationError } from './types';

/**
 * Clean a request path: resolve "." and ".." segments and collapse repeated
 * slashes, keeping a trailing slash.
 */
export function cleanPath(requestPath: string): string {
  if (!requestPath) return '/';

  const rooted = requestPath.startsWith('/') ? requestPath : `/${requestPath}`;
  return path.posix.normalize(rooted);
}

export class RouteTable {
  private readonly exact = new Map<string, RouteBinding>();
  private readonly subtrees: RouteBinding[] = [];
  private readonly bindings: readonly RouteBinding[];

  constructor(bindings: RouteBinding[]) {
    for (const binding of bindings) {
      const existing = this.lookup(binding.pattern);
      if (existing) {
        throw new ValidationError(
          `route conflict: ${binding.pattern} is bound by both ${existing.source} and ${binding.source}`,
          { pattern: binding.pattern }
        );
      }

      if (binding.pattern.endsWith('/')) {
        this.subtrees.push(binding);
      } else {
        this.exact.set(binding.pattern, binding);
      }
    }

    // Longest prefix first
    this.subtrees.sort((a, b) => b.pattern.length - a.pattern.length);
    this.bindings = Object.freeze([...bindings]);
    Object.freeze(this);
  }

  /**
   * Match request path to a binding
   */
  match(requestPath: string): RouteMatch {
    const cleaned = cleanPath(requestPath);
    if (cleaned !== requestPath) {
      return { kind: 'redirect', location: cleaned };
    }

    const exact = this.exact.get(cleaned);
    if (exact) {
      return { kind: 'route', binding: exact };
    }

    // "/docs" with "/docs/" bound redirects to the subtree root
    if (!cleaned.endsWith('/') && this.subtrees.some((b) => b.pattern === `${cleaned}/`)) {
      return { kind: 'redirect', location: `${cleaned}/` };
    }

    for (const binding of this.subtrees) {
      if (cleaned.startsWith(binding.pattern)) {
        return { kind: 'route', binding };
      }
    }

    return { kind: 'none' };
  }

  /**
   * Binding registered for an exact pattern
   */
  lookup(pattern: string): RouteBinding | undefined {
    return this.exact.get(pattern) ?? this.subtrees.find((b) => b.pattern === pattern);
  }

  /**
   * Get all routes in registration order
   */
  getRoutes(): readonly RouteBinding[] {
    return this.bindings;
  }

  get size(): number {
    return this.bindings.length;
  }
}

/**
 * Accumulates bindings in precedence order and produces a RouteTable
 */
export class RouteTableBuilder {
  private readonly bindings: RouteBinding[] = [];

  add(pattern: string, source: RouteSource, handler: RouteHandler): this {
    this.bindings.push({ pattern, source, handler });
    return this;
  }

  build(): RouteTable {
    return new RouteTable(this.bindings);
  }
}
