/**
 * Category tree cache shared by the filter builder, the subcategory resolver
 * and the category tools.
 */

import { silentLogger, type Logger } from "../../logger.js";
import type { Category, Subcategory, SubcategoryInfo } from "../../types.js";

export interface SubcategoryEntry {
  parentId: number;
  subcategory: Subcategory;
}

export class CategoryCache {
  private categories: Category[] = [];
  private readonly categoryById = new Map<number, Category>();
  private readonly subcategoryById = new Map<number, SubcategoryEntry>();
  private inflight: Promise<readonly Category[]> | null = null;

  constructor(private readonly logger: Logger = silentLogger) {}

  get loaded(): boolean {
    return this.categories.length > 0;
  }

  list(): readonly Category[] {
    return this.categories;
  }

  /**
   * Replace the cached tree.
   */
  set(categories: Category[]): void {
    this.categories = categories;
    this.categoryById.clear();
    this.subcategoryById.clear();

    for (const category of categories) {
      this.categoryById.set(category.id, category);
      for (const subcategory of category.subcategories) {
        this.subcategoryById.set(subcategory.id, { parentId: category.id, subcategory });
      }
    }
    this.logger.info(
      { categories: categories.length, subcategories: this.subcategoryById.size },
      "category cache loaded",
    );
  }

  /**
   * Load the tree through `loader` unless already loaded. Concurrent callers
   * share one in-flight load; a failed load leaves the cache empty.
   */
  async ensure(loader: () => Promise<Category[]>): Promise<readonly Category[]> {
    if (this.loaded) return this.categories;

    if (!this.inflight) {
      this.inflight = loader()
        .then((categories) => {
          this.set(categories);
          return this.categories;
        })
        .finally(() => {
          this.inflight = null;
        });
    }
    return this.inflight;
  }

  clear(): void {
    this.categories = [];
    this.categoryById.clear();
    this.subcategoryById.clear();
  }

  getCategory(id: number): Category | undefined {
    return this.categoryById.get(id);
  }

  getSubcategory(id: number): SubcategoryEntry | undefined {
    return this.subcategoryById.get(id);
  }

  /**
   * Lowercase subcategory name to id, in tree order.
   */
  subcategoryNameMap(): Map<string, number> {
    const map = new Map<string, number>();
    for (const [id, { subcategory }] of this.subcategoryById) {
      const key = subcategory.name.toLowerCase();
      if (!map.has(key)) map.set(key, id);
    }
    return map;
  }

  /**
   * Subcategory id to display name and parent category name.
   */
  subcategoryInfo(): Map<number, SubcategoryInfo> {
    const info = new Map<number, SubcategoryInfo>();
    for (const [id, { parentId, subcategory }] of this.subcategoryById) {
      info.set(id, {
        name: subcategory.name,
        category_name: this.categoryById.get(parentId)?.name ?? "",
      });
    }
    return info;
  }
}
