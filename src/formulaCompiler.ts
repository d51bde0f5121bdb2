// formulaCompiler.ts
// Parse-once cache in front of the formula parser.
//
// A compiler owns its cache; trees are frozen before they are stored, so a
// tree handed to a caller stays valid after the cache evicts it.

import { decodeHTML } from "entities";
import { FormulaNode } from "./formulaAst";
import { parseFormula } from "./formulaParser";
import { LruCache } from "./lruCache";
import { loadEngineConfig } from "./config";
import type { Logger } from "./logger";

export const DEFAULT_CACHE_CAPACITY = 1024;

/**
 * Decode markup entities (`&gt;`, `&lt;`, `&amp;`, numeric references) so
 * formulas carried through HTML-safe channels parse as written.
 */
export function unescapeFormula(text: string): string {
  return decodeHTML(text);
}

export interface CompilerStats {
  size: number;
  capacity: number;
  hits: number;
  misses: number;
}

export interface FormulaCompilerOptions {
  /** Cache to compile through; takes precedence over `capacity`. */
  cache?: LruCache<string, FormulaNode>;
  capacity?: number;
  logger?: Logger;
}

export class FormulaCompiler {
  private readonly cache: LruCache<string, FormulaNode>;
  private readonly logger?: Logger;
  private hits = 0;
  private misses = 0;

  constructor(options: FormulaCompilerOptions = {}) {
    this.cache = options.cache ?? new LruCache(options.capacity ?? DEFAULT_CACHE_CAPACITY);
    this.logger = options.logger;
  }

  /**
   * Compile formula text into a tree, reusing the cached tree for text seen
   * before. The cache key is the unescaped text.
   */
  compile(text: string): FormulaNode {
    const source = unescapeFormula(text);
    const cached = this.cache.get(source);
    if (cached) {
      this.hits += 1;
      return cached;
    }

    this.misses += 1;
    const tree = parseFormula(source);
    this.cache.set(source, tree);
    this.logger?.debug({ formula: source, cacheSize: this.cache.size }, "compiled formula");
    return tree;
  }

  isCached(text: string): boolean {
    return this.cache.has(unescapeFormula(text));
  }

  stats(): CompilerStats {
    return {
      size: this.cache.size,
      capacity: this.cache.capacity,
      hits: this.hits,
      misses: this.misses,
    };
  }

  clear(): void {
    this.cache.clear();
    this.hits = 0;
    this.misses = 0;
  }
}

let sharedCompiler: FormulaCompiler | undefined;

/**
 * Process-wide compiler used when a caller does not pass its own. Created on
 * first use with the configured cache capacity and kept for the life of the
 * process.
 */
export function defaultCompiler(): FormulaCompiler {
  if (!sharedCompiler) {
    sharedCompiler = new FormulaCompiler({ capacity: loadEngineConfig().cacheCapacity });
  }
  return sharedCompiler;
}
