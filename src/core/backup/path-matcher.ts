/**
 * Path normalization and containment checks used for exclusion decisions
 */

import * as path from "node:path";

export const DEFAULT_CACHE_SIZE = 4096;

export interface PathMatcherOptions {
  /** Platform whose path conventions apply (defaults to the running platform) */
  platform?: NodeJS.Platform;
  /** Maximum number of memoized inputs */
  cacheSize?: number;
}

interface SplitPath {
  root: string;
  parts: string[];
}

export class PathMatcher {
  private readonly impl: path.PlatformPath;
  private readonly caseInsensitive: boolean;
  private readonly cacheSize: number;
  private readonly cache = new Map<string, string>();

  constructor(options: PathMatcherOptions = {}) {
    const platform = options.platform ?? process.platform;
    this.caseInsensitive = platform === "win32";
    this.impl = this.caseInsensitive ? path.win32 : path.posix;
    this.cacheSize = Math.max(1, options.cacheSize ?? DEFAULT_CACHE_SIZE);
  }

  /**
   * Canonical form of a path: structurally normalized, without trailing
   * separators, lowercased on case-insensitive platforms.
   */
  normalize(input: string): string {
    const cached = this.cache.get(input);
    if (cached !== undefined) {
      return cached;
    }

    let normalized = this.impl.normalize(input);
    if (this.caseInsensitive) {
      normalized = normalized.toLowerCase();
    }
    normalized = this.stripTrailingSeparators(normalized);

    if (this.cache.size >= this.cacheSize) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) {
        this.cache.delete(oldest.value);
      }
    }
    this.cache.set(input, normalized);

    return normalized;
  }

  /**
   * True when `child` is `parent` itself or lies beneath it. Paths that
   * cannot be compared (absolute against relative, different drives) are
   * never under each other.
   */
  isUnder(child: string, parent: string): boolean {
    try {
      const normalizedParent = this.normalize(parent);
      return this.commonPath(this.normalize(child), normalizedParent) === normalizedParent;
    } catch {
      return false;
    }
  }

  get cachedEntries(): number {
    return this.cache.size;
  }

  private stripTrailingSeparators(value: string): string {
    const { root } = this.impl.parse(value);
    let end = value.length;
    while (end > root.length && this.isSeparator(value[end - 1])) {
      end--;
    }
    return value.slice(0, end);
  }

  private isSeparator(char: string | undefined): boolean {
    return char === this.impl.sep || char === "/";
  }

  private split(value: string): SplitPath {
    const { root } = this.impl.parse(value);
    const parts = value
      .slice(root.length)
      .split(this.impl.sep)
      .filter((part) => part.length > 0 && part !== ".");
    return { root, parts };
  }

  private commonPath(a: string, b: string): string {
    if (this.impl.isAbsolute(a) !== this.impl.isAbsolute(b)) {
      throw new Error("Can't mix absolute and relative paths");
    }

    const left = this.split(a);
    const right = this.split(b);
    if (left.root !== right.root) {
      throw new Error("Paths don't have the same drive");
    }

    const common: string[] = [];
    const length = Math.min(left.parts.length, right.parts.length);
    for (let i = 0; i < length; i++) {
      const part = left.parts[i];
      if (part === undefined || part !== right.parts[i]) break;
      common.push(part);
    }

    const joined = left.root + common.join(this.impl.sep);
    return joined.length > 0 ? joined : ".";
  }
}

/**
 * Shared matcher for the running platform
 */
export const defaultPathMatcher = new PathMatcher();
