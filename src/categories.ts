/**
 * Category registry
 *
 * Serves the static table of cleanup categories. The table ships as
 * data/categories.json and is validated once when the registry is built;
 * categories are frozen afterwards.
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { patternNameFromGlob } from './pattern-discovery.js';
import {
  RISK_LEVELS,
  type Category,
  type CategoryExplanation,
  type FixedCategory,
  type RecursiveCategory,
  type RiskLevel,
} from './types.js';

const CATEGORIES_FILE = fileURLToPath(new URL('../data/categories.json', import.meta.url));

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function isRiskLevel(value: unknown): value is RiskLevel {
  return typeof value === 'string' && RISK_LEVELS.some(level => level === value);
}

function optionalString(record: JsonRecord, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Validate one raw category record.
 *
 * Exactly one scan strategy must be present: a non-empty `paths` list, or
 * `isRecursive` with non-empty `globPatterns` and `searchRoots`.
 *
 * @throws Error describing the first problem found
 */
export function parseCategory(raw: unknown): Category {
  if (!isRecord(raw)) {
    throw new Error('Category entry must be an object');
  }

  const { id, name, riskLevel } = raw;
  if (typeof id !== 'string' || id === '') {
    throw new Error('Category is missing an id');
  }
  if (typeof name !== 'string' || name === '') {
    throw new Error(`Category ${id} is missing a name`);
  }
  if (!isRiskLevel(riskLevel)) {
    throw new Error(`Category ${id} has invalid riskLevel: ${String(riskLevel)}`);
  }

  const common = {
    id,
    name,
    riskLevel,
    cleanupCommand: optionalString(raw, 'cleanupCommand'),
    description: optionalString(raw, 'description'),
    consequences: optionalString(raw, 'consequences'),
    recovery: optionalString(raw, 'recovery'),
  };

  const { paths } = raw;
  const hasPaths = isStringArray(paths) && paths.length > 0;

  if (raw.isRecursive === true) {
    if (hasPaths) {
      throw new Error(`Category ${id} declares both paths and recursive discovery`);
    }
    const { globPatterns, searchRoots, minSizeBytes } = raw;
    if (!isStringArray(globPatterns) || globPatterns.length === 0) {
      throw new Error(`Recursive category ${id} needs at least one glob pattern`);
    }
    if (globPatterns.some(glob => patternNameFromGlob(glob) === '')) {
      throw new Error(`Recursive category ${id} has an empty glob pattern`);
    }
    if (!isStringArray(searchRoots) || searchRoots.length === 0) {
      throw new Error(`Recursive category ${id} needs at least one search root`);
    }
    const minimum = typeof minSizeBytes === 'number' && minSizeBytes >= 0 ? minSizeBytes : 0;

    const category: RecursiveCategory = {
      ...common,
      isRecursive: true,
      globPatterns: [...globPatterns],
      searchRoots: [...searchRoots],
      minSizeBytes: minimum,
    };
    return category;
  }

  if (!isStringArray(paths) || paths.length === 0) {
    throw new Error(`Category ${id} needs at least one path`);
  }

  const category: FixedCategory = {
    ...common,
    paths: [...paths],
    externalTool: raw.externalTool === 'docker' ? 'docker' : undefined,
  };
  return category;
}

function freezeCategory(category: Category): Category {
  if (category.isRecursive) {
    Object.freeze(category.globPatterns);
    Object.freeze(category.searchRoots);
  } else {
    Object.freeze(category.paths);
  }
  return Object.freeze(category);
}

/**
 * Read and validate the bundled category table.
 */
export function loadCategories(file: string = CATEGORIES_FILE): Category[] {
  const parsed: unknown = JSON.parse(readFileSync(file, 'utf-8'));
  if (!Array.isArray(parsed)) {
    throw new Error(`${file} must contain an array of categories`);
  }
  return parsed.map(parseCategory);
}

/**
 * Read-only lookups over an immutable set of categories.
 */
export class CategoryRegistry {
  private readonly byId: ReadonlyMap<string, Category>;

  /**
   * @param categories - Categories to serve (defaults to data/categories.json)
   * @throws Error on duplicate ids or invalid entries
   */
  constructor(categories: readonly unknown[] = loadCategories()) {
    const byId = new Map<string, Category>();
    for (const raw of categories) {
      const category = freezeCategory(parseCategory(raw));
      if (byId.has(category.id)) {
        throw new Error(`Duplicate category id: ${category.id}`);
      }
      byId.set(category.id, category);
    }
    this.byId = byId;
  }

  get(id: string): Category | undefined {
    return this.byId.get(id);
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  /** All categories in declaration order */
  all(): Category[] {
    return [...this.byId.values()];
  }

  byRisk(level: RiskLevel): Category[] {
    return this.all().filter(category => category.riskLevel === level);
  }

  safe(): Category[] {
    return this.byRisk('safe');
  }

  review(): Category[] {
    return this.byRisk('review');
  }

  risky(): Category[] {
    return this.byRisk('risky');
  }

  /** Categories measured at fixed paths */
  fixed(): FixedCategory[] {
    const result: FixedCategory[] = [];
    for (const category of this.byId.values()) {
      if (!category.isRecursive) result.push(category);
    }
    return result;
  }

  /** Categories found by recursive discovery */
  recursive(): RecursiveCategory[] {
    const result: RecursiveCategory[] = [];
    for (const category of this.byId.values()) {
      if (category.isRecursive) result.push(category);
    }
    return result;
  }

  /**
   * Everything known about a category, flattened for display.
   */
  explain(id: string): CategoryExplanation | undefined {
    const category = this.get(id);
    if (!category) return undefined;

    return {
      id: category.id,
      name: category.name,
      riskLevel: category.riskLevel,
      paths: category.isRecursive ? [] : [...category.paths],
      isRecursive: category.isRecursive === true,
      globPatterns: category.isRecursive ? [...category.globPatterns] : [],
      searchRoots: category.isRecursive ? [...category.searchRoots] : [],
      minSizeBytes: category.isRecursive ? category.minSizeBytes : 0,
      cleanupCommand: category.cleanupCommand,
      description: category.description,
      consequences: category.consequences,
      recovery: category.recovery,
    };
  }
}
