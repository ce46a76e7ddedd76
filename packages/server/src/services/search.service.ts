import type { RecipeSearchQuery, RecipeWithDetails } from '@magic-chef/shared';
import type { RecipeRepository, RecipeSearchRepository, TagRepository } from '../repositories/index.js';

export class SearchService {
  constructor(
    private readonly recipes: RecipeRepository,
    private readonly searchIndex: RecipeSearchRepository,
    private readonly tags: TagRepository
  ) {}

  search(query: RecipeSearchQuery, viewerId: number | null): RecipeWithDetails[] {
    return this.recipes.findManyWithDetails(this.searchIndex.search(query, viewerId));
  }

  listTags(viewerId: number | null): string[] {
    return this.tags.findVisibleNames(viewerId);
  }
}
