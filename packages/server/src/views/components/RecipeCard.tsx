import type { Recipe } from '@magic-chef/shared';

interface RecipeCardProps {
  recipe: Recipe;
  imageUrl?: string | undefined;
}

export function RecipeCard({ recipe, imageUrl }: RecipeCardProps): JSX.Element {
  return (
    <article className="recipe-card">
      {imageUrl !== undefined && <img src={imageUrl} alt="" />}
      <header>
        <a href={`/recipes/${recipe.id}`}>{recipe.title}</a>
      </header>
      {recipe.summary !== '' && <p>{recipe.summary}</p>}
      <footer>
        <small>
          {recipe.servings} servings
          {recipe.total_time_minutes !== null && ` · ${recipe.total_time_minutes} min`}
          {` · ${recipe.language.toUpperCase()}`}
          {recipe.is_public && ' · public'}
        </small>
      </footer>
    </article>
  );
}
