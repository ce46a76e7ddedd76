import type { RecipeSearchQuery, RecipeWithDetails } from '@magic-chef/shared';
import { RecipeCard } from './RecipeCard.js';

interface SearchResultsProps {
  query: RecipeSearchQuery;
  results: readonly RecipeWithDetails[];
}

function describe(query: RecipeSearchQuery): string {
  return [query.q, query.tag && `#${query.tag}`, query.ingredient]
    .filter((part): part is string => typeof part === 'string' && part !== '')
    .join(', ');
}

export function SearchResults({ query, results }: SearchResultsProps): JSX.Element {
  const description = describe(query);
  if (description === '') {
    return <p className="search-hint">Type to search recipes.</p>;
  }
  if (results.length === 0) {
    return <p className="search-empty">No recipes found for {description}.</p>;
  }
  return (
    <section className="search-results">
      <p>
        {results.length} {results.length === 1 ? 'recipe' : 'recipes'} for {description}
      </p>
      {results.map((recipe) => (
        <RecipeCard key={recipe.id} recipe={recipe} />
      ))}
    </section>
  );
}
