import { statSync } from 'fs';
import path from 'path';

import { ResourceNotFoundError } from '../../errors';

export interface ResolverStrategy {
  /** Human-readable location, used in error messages. */
  readonly location: string;
  tryResolve(logicalPath: string): string | undefined;
}

/**
 * Looks a logical path up under one root directory. Only exact relative
 * matches count; absolute paths and paths that climb out of the root never
 * resolve.
 */
export class DirectoryStrategy implements ResolverStrategy {
  readonly location: string;

  constructor(root: string) {
    this.location = path.resolve(root);
  }

  tryResolve(logicalPath: string): string | undefined {
    if (!logicalPath || path.isAbsolute(logicalPath)) return undefined;
    const candidate = path.resolve(this.location, logicalPath);
    const relative = path.relative(this.location, candidate);
    if (relative.startsWith('..') || path.isAbsolute(relative)) return undefined;
    const stats = statSync(candidate, { throwIfNoEntry: false });
    return stats?.isFile() ? candidate : undefined;
  }
}

export interface ResourceRoots {
  overrideDir: string;
  bundledDir: string;
}

export class ResourceResolver {
  private readonly strategies: readonly ResolverStrategy[];

  constructor(strategies: readonly ResolverStrategy[]) {
    this.strategies = [...strategies];
  }

  /** User files in the override directory shadow the bundled defaults. */
  static fromRoots(roots: ResourceRoots): ResourceResolver {
    return new ResourceResolver([new DirectoryStrategy(roots.overrideDir), new DirectoryStrategy(roots.bundledDir)]);
  }

  resolve(logicalPath: string): string {
    for (const strategy of this.strategies) {
      const match = strategy.tryResolve(logicalPath);
      if (match) return match;
    }
    throw new ResourceNotFoundError(
      logicalPath,
      this.strategies.map((strategy) => strategy.location)
    );
  }

  get locations(): string[] {
    return this.strategies.map((strategy) => strategy.location);
  }
}
