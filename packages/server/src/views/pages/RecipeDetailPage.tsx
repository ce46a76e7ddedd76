import {
  LANGUAGE_NAMES,
  SUPPORTED_LANGUAGES,
  type RecipeWithDetails,
} from '@magic-chef/shared';
import type { RecipeImageView } from '../../services/index.js';
import { ImageBlock } from '../components/ImageBlock.js';

interface RecipeDetailPageProps {
  recipe: RecipeWithDetails;
  images: readonly RecipeImageView[];
  isOwner: boolean;
  loggedIn: boolean;
}

export function RecipeDetailPage({ recipe, images, isOwner, loggedIn }: RecipeDetailPageProps): JSX.Element {
  const targets = SUPPORTED_LANGUAGES.filter((code) => code !== recipe.language);

  return (
    <article className="recipe-detail">
      <header>
        <h1>{recipe.title}</h1>
        <p>
          <small>
            {recipe.servings} servings
            {recipe.total_time_minutes !== null && ` · ${recipe.total_time_minutes} min`}
            {` · ${LANGUAGE_NAMES[recipe.language]}`}
            {recipe.is_public ? ' · public' : ' · private'}
          </small>
        </p>
        {recipe.summary !== '' && <p className="summary">{recipe.summary}</p>}
      </header>

      <ImageBlock recipeId={recipe.id} images={images} editable={false} />

      <section>
        <h2>Ingredients</h2>
        <ul className="ingredients">
          {recipe.ingredients.map((ingredient, index) => (
            <li key={index}>
              {ingredient.quantity !== '' && <strong>{ingredient.quantity}</strong>} {ingredient.name}
            </li>
          ))}
        </ul>
      </section>

      <section>
        <h2>Steps</h2>
        <ol className="steps">
          {recipe.steps.map((step) => (
            <li key={step.position}>{step.instruction}</li>
          ))}
        </ol>
      </section>

      {recipe.notes.length > 0 && (
        <section>
          <h2>Notes</h2>
          <ul className="notes">
            {recipe.notes.map((note, index) => (
              <li key={index}>{note}</li>
            ))}
          </ul>
        </section>
      )}

      {recipe.tags.length > 0 && (
        <p className="tags">
          {recipe.tags.map((tag) => (
            <a key={tag} href={`/search?tag=${encodeURIComponent(tag)}`} className="tag">
              #{tag}
            </a>
          ))}
        </p>
      )}

      <footer className="recipe-actions">
        {isOwner && (
          <>
            <a role="button" href={`/recipes/${recipe.id}/edit`}>Edit</a>
            <form method="post" action={`/recipes/${recipe.id}/delete`}>
              <button
                type="submit"
                className="secondary"
                hx-post={`/recipes/${recipe.id}/delete`}
                hx-confirm="Delete this recipe?"
              >
                Delete
              </button>
            </form>
          </>
        )}
        {loggedIn && !isOwner && (
          <form method="post" action={`/recipes/${recipe.id}/copy`}>
            <button type="submit" hx-post={`/recipes/${recipe.id}/copy`}>
              Save to my recipes
            </button>
          </form>
        )}
        {loggedIn && (
          <form
            className="translate-form"
            hx-post={`/recipes/${recipe.id}/translate`}
            method="post"
            action={`/recipes/${recipe.id}/translate`}
          >
            <select name="target_lang" aria-label="Target language">
              {targets.map((code) => (
                <option key={code} value={code}>
                  {LANGUAGE_NAMES[code]}
                </option>
              ))}
            </select>
            <button type="submit" className="outline">Translate</button>
          </form>
        )}
      </footer>
    </article>
  );
}
