import type { Recipe, RecipeSortField, SortOrder } from '@magic-chef/shared';

interface TablePageProps {
  recipes: readonly Recipe[];
  sort: RecipeSortField;
  order: SortOrder;
}

const COLUMNS: { field: RecipeSortField; label: string }[] = [
  { field: 'title', label: 'Title' },
  { field: 'servings', label: 'Servings' },
  { field: 'created_at', label: 'Created' },
  { field: 'updated_at', label: 'Updated' },
];

function sortLink(field: RecipeSortField, current: RecipeSortField, order: SortOrder): string {
  const next = field === current && order === 'asc' ? 'desc' : 'asc';
  return `/table?sort=${field}&order=${next}`;
}

export function TablePage({ recipes, sort, order }: TablePageProps): JSX.Element {
  return (
    <section>
      <h1>All my recipes</h1>
      <p>
        <a href="/table/export.csv" download>
          Export as CSV
        </a>
      </p>
      <form id="bulk-form" method="post" action="/table/bulk-delete">
        <table className="recipe-table">
          <thead>
            <tr>
              <th scope="col"></th>
              {COLUMNS.map((column) => (
                <th key={column.field} scope="col">
                  <a href={sortLink(column.field, sort, order)}>
                    {column.label}
                    {column.field === sort && (order === 'asc' ? ' ▲' : ' ▼')}
                  </a>
                </th>
              ))}
            </tr>
          </thead>
          <tbody>
            {recipes.map((recipe) => (
              <tr key={recipe.id}>
                <td>
                  <input type="checkbox" name="recipe_ids" value={recipe.id} aria-label={`Select ${recipe.title}`} />
                </td>
                <td>
                  <a href={`/recipes/${recipe.id}`}>{recipe.title}</a>
                </td>
                <td>{recipe.servings}</td>
                <td>{recipe.created_at.slice(0, 10)}</td>
                <td>{recipe.updated_at.slice(0, 10)}</td>
              </tr>
            ))}
          </tbody>
        </table>
        <div className="grid">
          <input type="text" name="tag" placeholder="Tag for selected recipes" aria-label="Tag" />
          <button type="submit" formAction="/table/bulk-tag" className="secondary">
            Tag selected
          </button>
          <button type="submit" formAction="/table/bulk-delete" className="contrast">
            Delete selected
          </button>
        </div>
      </form>
    </section>
  );
}
