import type { RecipeSearchQuery, RecipeWithDetails } from '@magic-chef/shared';
import { SearchResults } from '../components/SearchResults.js';

interface SearchPageProps {
  query: RecipeSearchQuery;
  results: readonly RecipeWithDetails[];
}

export function SearchPage({ query, results }: SearchPageProps): JSX.Element {
  return (
    <section>
      <h1>Search</h1>
      <form
        method="get"
        action="/search"
        hx-get="/search/results"
        hx-target="#search-results"
        hx-trigger="input changed delay:300ms from:find input, submit"
      >
        <div className="grid">
          <input type="search" name="q" defaultValue={query.q ?? ''} placeholder="Title, ingredient, step..." aria-label="Search text" />
          <input type="text" name="ingredient" defaultValue={query.ingredient ?? ''} placeholder="Ingredient" aria-label="Ingredient" />
          <input type="text" name="tag" defaultValue={query.tag ?? ''} placeholder="Tag" aria-label="Tag" />
        </div>
      </form>
      <div id="tag-list" hx-get="/search/tags" hx-trigger="load"></div>
      <div id="search-results">
        <SearchResults query={query} results={results} />
      </div>
    </section>
  );
}
