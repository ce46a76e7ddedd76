import { APP_NAME, type Recipe, type User } from '@magic-chef/shared';
import { RecipeCard } from '../components/RecipeCard.js';

interface HomePageProps {
  user: User | null;
  recipes: readonly Recipe[];
}

export function HomePage({ user, recipes }: HomePageProps): JSX.Element {
  if (!user) {
    return (
      <section>
        <h1>{APP_NAME}</h1>
        <p>Collect, search, translate and digitise your recipes.</p>
        <p>
          <a href="/auth/login">Log in</a> or <a href="/auth/register">create an account</a> to start
          your collection, or <a href="/search">search public recipes</a>.
        </p>
      </section>
    );
  }

  return (
    <section>
      <h1>My recipes</h1>
      {recipes.length === 0 ? (
        <p>
          No recipes yet. <a href="/recipes/new">Write one</a>, <a href="/ai">let the AI chef cook one
          up</a> or <a href="/digitiser">digitise a photo</a>.
        </p>
      ) : (
        <div className="recipe-grid">
          {recipes.map((recipe) => (
            <RecipeCard key={recipe.id} recipe={recipe} />
          ))}
        </div>
      )}
    </section>
  );
}
